/**
 * Excluder
 * Drops events matching any configured exclusion rule
 */

import { EXCLUSION_FIELDS, EXCLUSION_FIELD_NAMES } from '../types/index.js';
import type { ExclusionRule, Excluder, TimetableEvent } from '../types/index.js';

export class RuleExcluder implements Excluder {
  private readonly rules: readonly ExclusionRule[];

  constructor(rules: readonly ExclusionRule[]) {
    this.rules = rules;
  }

  /**
   * True when every field of at least one rule equals the event's value.
   * A rule with no fields therefore matches everything.
   */
  isExcluded(event: TimetableEvent): boolean {
    return this.rules.some((rule) => ruleMatches(rule, event));
  }
}

export class NullExcluder implements Excluder {
  isExcluded(_event: TimetableEvent): boolean {
    return false;
  }
}

function ruleMatches(rule: ExclusionRule, event: TimetableEvent): boolean {
  return EXCLUSION_FIELD_NAMES.every((key) => {
    const required = rule[key];
    return required === undefined || event[EXCLUSION_FIELDS[key]] === required;
  });
}
