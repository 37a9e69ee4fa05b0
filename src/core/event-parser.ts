/**
 * Event Record Parser
 * Turns one raw calendar record into a TimetableEvent
 *
 * Summaries follow the department's fixed layout:
 *
 *   1CW/Example Lecture[3]L Dr Smith (LR1)
 *   | |  |               |  | |         |
 *   | |  series name     |  | staff     location
 *   | paper              |  type code
 *   part                 teaching week (discarded)
 */

import type { DateTime } from 'luxon';
import { TIMETABLE_TIMEZONE } from '../types/index.js';
import type { RawCalendarRecord, SummaryFields, TimetableEvent } from '../types/index.js';
import { EventParseError } from './errors.js';

// Greedy: the series name runs to the last [week] block, the location is the last (...)
export const SUMMARY_PATTERN = /^(\d)([A-Z0-9]+)\/(.+)\[(\d+)\]([A-Z+]+) (.*)\((.*)\)$/;

/**
 * Extract the five summary fields, or null if the text does not follow the layout
 */
export function matchSummary(summary: string): SummaryFields | null {
  const match = SUMMARY_PATTERN.exec(summary);
  if (!match) return null;

  const [, part, paper, name, , eventType, staffName, location] = match;
  return { part, paper, name, eventType, staffName: staffName.trimEnd(), location };
}

/**
 * Render fields back into the summary layout
 */
export function formatSummary(fields: SummaryFields, week: number = 1): string {
  return `${fields.part}${fields.paper}/${fields.name}[${week}]${fields.eventType} ${fields.staffName} (${fields.location})`;
}

export function parseEventRecord(record: RawCalendarRecord): TimetableEvent {
  const { summary, uid } = record;

  if (summary === undefined) {
    throw new EventParseError('missing-field', 'Event has no SUMMARY', { field: 'summary', uid });
  }

  const fields = matchSummary(summary);
  if (!fields) {
    throw new EventParseError(
      'malformed-summary',
      `SUMMARY did not match expected format: ${JSON.stringify(summary)}`,
      { rawText: summary, uid }
    );
  }

  if (record.start === undefined) {
    throw new EventParseError('missing-field', 'Event has no DTSTART', { field: 'start', rawText: summary, uid });
  }
  if (record.end === undefined) {
    throw new EventParseError('missing-field', 'Event has no DTEND', { field: 'end', rawText: summary, uid });
  }
  if (uid === undefined) {
    throw new EventParseError('missing-field', 'Event has no UID', { field: 'uid', rawText: summary });
  }

  return {
    ...fields,
    start: toTimetableZone(record.start, 'start', summary, uid),
    end: toTimetableZone(record.end, 'end', summary, uid),
    uid,
  };
}

/**
 * The timetable expects local times, so every timestamp is moved into
 * TIMETABLE_TIMEZONE here rather than trusting the feed.
 */
function toTimetableZone(value: DateTime, field: 'start' | 'end', rawText: string, uid: string): DateTime {
  if (!value.isValid) {
    throw new EventParseError(
      'invalid-timestamp',
      `Event ${field} is not a valid date-time: ${value.invalidExplanation ?? value.invalidReason ?? 'unknown'}`,
      { field, rawText, uid }
    );
  }

  const local = value.setZone(TIMETABLE_TIMEZONE);
  if (!local.isValid || local.zoneName !== TIMETABLE_TIMEZONE) {
    throw new EventParseError(
      'invalid-timestamp',
      `Event ${field} could not be expressed in ${TIMETABLE_TIMEZONE}`,
      { field, rawText, uid }
    );
  }
  return local;
}
