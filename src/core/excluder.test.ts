import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { NullExcluder, RuleExcluder } from './excluder.js';
import { applySubstitutions, TableSubstitutor } from './substitutor.js';
import type { ExclusionRule, TimetableEvent } from '../types/index.js';

function makeEvent(overrides: Partial<TimetableEvent> = {}): TimetableEvent {
  return {
    part: 'IA',
    paper: 'Coursework',
    name: 'Drawing',
    eventType: 'class',
    staffName: 'Dr Smith',
    location: 'DPO',
    start: DateTime.fromISO('2024-01-15T09:00:00', { zone: 'Europe/London' }),
    end: DateTime.fromISO('2024-01-15T10:00:00', { zone: 'Europe/London' }),
    uid: 'evt-1@example.test',
    ...overrides,
  };
}

describe('RuleExcluder', () => {
  it('excludes when every field of a rule matches', () => {
    const excluder = new RuleExcluder([{ paper: 'Coursework', event_type: 'class' }]);

    expect(excluder.isExcluded(makeEvent())).toBe(true);
  });

  it('keeps events that match only some fields of a rule', () => {
    const excluder = new RuleExcluder([{ paper: 'Coursework', event_type: 'class' }]);

    expect(excluder.isExcluded(makeEvent({ eventType: 'lecture' }))).toBe(false);
    expect(excluder.isExcluded(makeEvent({ paper: 'Paper 1' }))).toBe(false);
  });

  it('excludes when any one rule matches', () => {
    const excluder = new RuleExcluder([{ location: 'LR0' }, { staff_name: 'Dr Smith' }]);

    expect(excluder.isExcluded(makeEvent())).toBe(true);
  });

  it('maps snake_case rule keys onto event fields', () => {
    expect(new RuleExcluder([{ name: 'Drawing' }]).isExcluded(makeEvent())).toBe(true);
    expect(new RuleExcluder([{ uid: 'evt-1@example.test' }]).isExcluded(makeEvent())).toBe(true);
    expect(new RuleExcluder([{ part: 'IB' }]).isExcluded(makeEvent())).toBe(false);
  });

  it('treats an empty rule as matching everything', () => {
    const excluder = new RuleExcluder([{}]);

    expect(excluder.isExcluded(makeEvent())).toBe(true);
    expect(excluder.isExcluded(makeEvent({ part: 'IIB', paper: '4M12' }))).toBe(true);
  });

  it('excludes nothing without rules', () => {
    expect(new RuleExcluder([]).isExcluded(makeEvent())).toBe(false);
  });

  it('only ever adds exclusions as rules are added', () => {
    const events = [
      makeEvent(),
      makeEvent({ eventType: 'lecture' }),
      makeEvent({ paper: 'Paper 1', location: 'LR0' }),
      makeEvent({ part: 'IB', staffName: 'Prof Jones' }),
    ];
    const rules: ExclusionRule[] = [
      { paper: 'Coursework', event_type: 'class' },
      { location: 'LR0' },
      { part: 'IB', staff_name: 'Someone else' },
    ];

    for (let count = 0; count < rules.length; count++) {
      const before = new RuleExcluder(rules.slice(0, count));
      const after = new RuleExcluder(rules.slice(0, count + 1));
      for (const event of events) {
        if (before.isExcluded(event)) {
          expect(after.isExcluded(event)).toBe(true);
        }
      }
    }
  });

  it('compares against substituted values', () => {
    const raw = makeEvent({ part: '1', paper: 'CW', eventType: 'L' });

    const partsOnly = applySubstitutions(raw, new TableSubstitutor({ __all__: { parts: { '1': 'IA' } } }));
    expect(partsOnly.part).toBe('IA');
    expect(new RuleExcluder([{ event_type: 'L' }]).isExcluded(partsOnly)).toBe(true);

    const withTypes = applySubstitutions(
      raw,
      new TableSubstitutor({ __all__: { parts: { '1': 'IA' }, event_types: { L: 'lecture' } } })
    );
    expect(new RuleExcluder([{ event_type: 'L' }]).isExcluded(withTypes)).toBe(false);
    expect(new RuleExcluder([{ event_type: 'lecture', part: 'IA' }]).isExcluded(withTypes)).toBe(true);
  });
});

describe('NullExcluder', () => {
  it('never excludes', () => {
    expect(new NullExcluder().isExcluded(makeEvent())).toBe(false);
  });
});
