/**
 * Timetable Assembler
 * Sorts events and nests them as part -> paper (module) -> series -> event
 */

import type {
  ModuleList,
  TimetableEvent,
  TimetableEventEntry,
  TimetableModule,
  TimetableSeries,
} from '../types/index.js';
import { ExternalIdGenerator } from '../utils/external-id.js';
import { DataIntegrityError, EmptyInputError } from './errors.js';

interface Group<K, T> {
  key: K;
  items: T[];
}

/**
 * Split into runs of consecutive items sharing a key. Equal keys that are
 * not adjacent form separate groups, so callers sort first.
 */
export function groupConsecutive<K, T>(items: readonly T[], keyOf: (item: T) => K): Group<K, T>[] {
  const groups: Group<K, T>[] = [];
  for (const item of items) {
    const key = keyOf(item);
    const last = groups[groups.length - 1];
    if (last && last.key === key) {
      last.items.push(item);
    } else {
      groups.push({ key, items: [item] });
    }
  }
  return groups;
}

// Code-unit order, not locale order
function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order by (part, paper, name, start)
 */
export function compareEvents(a: TimetableEvent, b: TimetableEvent): number {
  return (
    compareText(a.part, b.part) ||
    compareText(a.paper, b.paper) ||
    compareText(a.name, b.name) ||
    a.start.toMillis() - b.start.toMillis()
  );
}

export class TimetableAssembler {
  constructor(private readonly triposName: string) {}

  assemble(events: readonly TimetableEvent[]): ModuleList {
    if (events.length === 0) {
      throw new EmptyInputError();
    }

    const sorted = [...events].sort(compareEvents);

    const modules = groupConsecutive(sorted, (event) => event.part).flatMap((partGroup) =>
      groupConsecutive(partGroup.items, (event) => event.paper).map((paperGroup) =>
        this.buildModule(partGroup.key, paperGroup.key, paperGroup.items)
      )
    );

    return { modules };
  }

  private buildModule(part: string, paper: string, events: TimetableEvent[]): TimetableModule {
    return {
      path: { tripos: this.triposName, part },
      name: paper,
      series: groupConsecutive(events, (event) => event.name).map((group) =>
        this.buildSeries(part, paper, group.key, group.items)
      ),
    };
  }

  private buildSeries(part: string, paper: string, name: string, events: TimetableEvent[]): TimetableSeries {
    return {
      uniqueId: ExternalIdGenerator.forSeries(this.triposName, part, paper, name),
      name,
      events: events.map(buildEventEntry),
    };
  }
}

export function buildEventEntry(event: TimetableEvent): TimetableEventEntry {
  // The timetable import has no notion of an event spanning midnight
  if (!event.start.hasSame(event.end, 'day')) {
    throw new DataIntegrityError(
      event.uid,
      `Event ${event.uid} starts on ${event.start.toISODate()} but ends on ${event.end.toISODate()}`
    );
  }

  return {
    uniqueId: event.uid,
    name: event.name,
    location: event.location,
    lecturer: event.staffName,
    date: event.start.toFormat('yyyy-MM-dd'),
    start: event.start.toFormat('HH:mm:ss'),
    end: event.end.toFormat('HH:mm:ss'),
    type: event.eventType,
  };
}

/**
 * Convenience wrapper matching the pipeline's single-call usage
 */
export function assembleTimetable(triposName: string, events: readonly TimetableEvent[]): ModuleList {
  return new TimetableAssembler(triposName).assemble(events);
}
