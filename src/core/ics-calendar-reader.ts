/**
 * ICS Calendar Reader
 *
 * Decodes iCalendar text into raw calendar records. Summaries are left
 * untouched here; interpreting them is the event parser's job.
 */

import ICAL from 'ical.js';
import { DateTime } from 'luxon';
import { TIMETABLE_TIMEZONE } from '../types/index.js';
import type { RawCalendarRecord } from '../types/index.js';
import { CalendarFormatError } from './errors.js';

type IcalComponent = InstanceType<typeof ICAL.Component>;

/**
 * Parse ICS data into one raw record per VEVENT, in document order
 */
export function readIcsCalendar(icsData: string, sourceName?: string): RawCalendarRecord[] {
  let calendar: IcalComponent;
  try {
    calendar = new ICAL.Component(ICAL.parse(icsData));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new CalendarFormatError(`Unable to parse iCalendar data: ${reason}`, sourceName);
  }

  if (calendar.name !== 'vcalendar') {
    throw new CalendarFormatError('Top level component is not a VCALENDAR', sourceName);
  }

  return calendar.getAllSubcomponents('vevent').map((vevent) => ({
    summary: readText(vevent, 'summary'),
    start: readTimestamp(vevent, 'dtstart'),
    end: readTimestamp(vevent, 'dtend'),
    uid: readText(vevent, 'uid'),
  }));
}

function readText(vevent: IcalComponent, name: string): string | undefined {
  const value = vevent.getFirstPropertyValue(name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read DTSTART/DTEND as a luxon DateTime.
 *
 * The wall-clock fields are reinterpreted in the zone the property names:
 * UTC for "Z" values, the TZID parameter when present, and the timetable's
 * own zone for floating times. An unknown TZID yields an invalid DateTime
 * rather than a guess.
 */
function readTimestamp(vevent: IcalComponent, name: 'dtstart' | 'dtend'): DateTime | undefined {
  const property = vevent.getFirstProperty(name);
  if (!property) return undefined;

  const value = property.getFirstValue();
  if (!(value instanceof ICAL.Time)) {
    return DateTime.invalid(`${name.toUpperCase()} is not a date-time value`);
  }

  const tzid = property.getParameter('tzid');
  let zone: string;
  if (value.zone?.tzid === 'UTC') {
    zone = 'utc';
  } else if (typeof tzid === 'string' && tzid.length > 0) {
    zone = tzid;
  } else {
    zone = TIMETABLE_TIMEZONE;
  }

  return DateTime.fromObject(
    {
      year: value.year,
      month: value.month,
      day: value.day,
      hour: value.hour,
      minute: value.minute,
      second: value.second,
    },
    { zone }
  );
}
