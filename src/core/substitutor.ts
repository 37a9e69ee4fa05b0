/**
 * Substitutor
 * Maps feed codes (parts, papers, event types) to their display names
 *
 * Lookups try the event's own part first, then the GLOBAL_SCOPE table, and
 * fall back to the raw value when neither has a match.
 */

import { GLOBAL_SCOPE } from '../types/index.js';
import type {
  SubstitutionCategory,
  SubstitutionTable,
  Substitutor,
  TimetableEvent,
} from '../types/index.js';

export class TableSubstitutor implements Substitutor {
  private readonly table: SubstitutionTable;

  constructor(table: SubstitutionTable) {
    this.table = table;
  }

  lookup(scope: string, category: SubstitutionCategory, value: string): string {
    const scoped = this.find(scope, category, value);
    if (scoped !== undefined) return scoped;

    if (scope !== GLOBAL_SCOPE) {
      const global = this.find(GLOBAL_SCOPE, category, value);
      if (global !== undefined) return global;
    }

    return value;
  }

  private find(scope: string, category: SubstitutionCategory, value: string): string | undefined {
    if (!Object.hasOwn(this.table, scope)) return undefined;
    const entries = this.table[scope][category];
    if (!entries || !Object.hasOwn(entries, value)) return undefined;
    return entries[value];
  }
}

/**
 * Used when no substitution file is configured
 */
export class NullSubstitutor implements Substitutor {
  lookup(_scope: string, _category: SubstitutionCategory, value: string): string {
    return value;
  }
}

/**
 * Re-derive an event with display names for part, paper and event type.
 * All three lookups are scoped by the event's original part code, even
 * though the part itself may be renamed by the first lookup.
 */
export function applySubstitutions(event: TimetableEvent, substitutor: Substitutor): TimetableEvent {
  const scope = event.part;
  return {
    ...event,
    part: substitutor.lookup(scope, 'parts', event.part),
    paper: substitutor.lookup(scope, 'papers', event.paper),
    eventType: substitutor.lookup(scope, 'event_types', event.eventType),
  };
}
