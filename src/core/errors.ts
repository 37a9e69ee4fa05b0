/**
 * Error Types
 * Every error here is terminal for the run that raises it
 */

export type ConfigurationSource = 'substitutions' | 'exclusions';

export class ConfigurationFormatError extends Error {
  readonly source: ConfigurationSource;
  readonly path?: string;

  constructor(source: ConfigurationSource, message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = 'ConfigurationFormatError';
    this.source = source;
    this.path = path;
  }
}

export type EventParseErrorKind = 'missing-field' | 'malformed-summary' | 'invalid-timestamp';

export interface EventParseErrorDetails {
  field?: string;
  rawText?: string;
  uid?: string;
}

export class EventParseError extends Error {
  readonly kind: EventParseErrorKind;
  readonly field?: string;
  readonly rawText?: string;
  readonly uid?: string;

  constructor(kind: EventParseErrorKind, message: string, details: EventParseErrorDetails = {}) {
    super(message);
    this.name = 'EventParseError';
    this.kind = kind;
    this.field = details.field;
    this.rawText = details.rawText;
    this.uid = details.uid;
  }
}

export class EmptyInputError extends Error {
  constructor(message = 'No events to assemble into a timetable') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

export class DataIntegrityError extends Error {
  readonly uid: string;

  constructor(uid: string, message: string) {
    super(message);
    this.name = 'DataIntegrityError';
    this.uid = uid;
  }
}

export class CalendarFormatError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = 'CalendarFormatError';
    this.source = source;
  }
}

export class XmlContentError extends Error {
  readonly element: string;

  constructor(element: string, message: string) {
    super(message);
    this.name = 'XmlContentError';
    this.element = element;
  }
}
