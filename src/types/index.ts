/**
 * Core Type Definitions for the Timetable Feed Import
 * All domain models and interfaces are defined here
 */

import type { DateTime } from 'luxon';

// ========================================
// Constants
// ========================================

/** Every timestamp handed to the timetable is expressed in this zone */
export const TIMETABLE_TIMEZONE = 'Europe/London';

/** Reserved substitution scope consulted when a part has no match */
export const GLOBAL_SCOPE = '__all__';

// ========================================
// Calendar Records
// ========================================

/**
 * One decoded calendar entry, before any interpretation of its summary.
 * Fields the feed omitted stay undefined.
 */
export interface RawCalendarRecord {
  summary?: string;
  start?: DateTime;
  end?: DateTime;
  uid?: string;
}

// ========================================
// Events
// ========================================

export interface TimetableEvent {
  readonly part: string;
  readonly paper: string;
  readonly name: string;
  readonly eventType: string;
  readonly staffName: string;
  readonly location: string;
  readonly start: DateTime;
  readonly end: DateTime;
  readonly uid: string;
}

/** The five text fields the summary grammar captures */
export type SummaryFields = Pick<
  TimetableEvent,
  'part' | 'paper' | 'name' | 'eventType' | 'staffName' | 'location'
>;

// ========================================
// Substitutions
// ========================================

export type SubstitutionCategory = 'parts' | 'papers' | 'event_types';

export type SubstitutionScopeTable = Partial<Record<SubstitutionCategory, Record<string, string>>>;

/** scope (part or GLOBAL_SCOPE) -> category -> raw value -> display value */
export type SubstitutionTable = Record<string, SubstitutionScopeTable>;

export interface Substitutor {
  lookup(scope: string, category: SubstitutionCategory, value: string): string;
}

// ========================================
// Exclusions
// ========================================

/** Event fields an exclusion rule may constrain, keyed by their config names */
export const EXCLUSION_FIELDS = {
  part: 'part',
  paper: 'paper',
  name: 'name',
  event_type: 'eventType',
  staff_name: 'staffName',
  location: 'location',
  uid: 'uid',
} as const satisfies Record<string, keyof TimetableEvent>;

export type ExclusionField = keyof typeof EXCLUSION_FIELDS;

export const EXCLUSION_FIELD_NAMES: readonly ExclusionField[] = [
  'part',
  'paper',
  'name',
  'event_type',
  'staff_name',
  'location',
  'uid',
];

export type ExclusionRule = Partial<Record<ExclusionField, string>>;

export interface Excluder {
  isExcluded(event: TimetableEvent): boolean;
}

// ========================================
// Timetable Tree
// ========================================

export interface TimetableEventEntry {
  uniqueId: string;
  name: string;
  location: string;
  lecturer: string;
  date: string; // yyyy-MM-dd
  start: string; // HH:mm:ss
  end: string; // HH:mm:ss
  type: string;
}

export interface TimetableSeries {
  uniqueId: string;
  name: string;
  events: TimetableEventEntry[];
}

export interface ModulePath {
  tripos: string;
  part: string;
}

export interface TimetableModule {
  path: ModulePath;
  name: string;
  series: TimetableSeries[];
}

export interface ModuleList {
  modules: TimetableModule[];
}

// ========================================
// Pipeline
// ========================================

export interface CalendarSource {
  name: string;
  content: string;
}

export interface SkippedRecord {
  source: string;
  uid?: string;
  reason: string;
}

export interface PipelineResult {
  timetable: ModuleList;
  eventsParsed: number;
  eventsExcluded: number;
  skipped: SkippedRecord[];
}
