/**
 * Tests for ExternalIdGenerator
 */

import { describe, it, expect } from 'vitest';
import { ExternalIdGenerator } from './external-id.js';

describe('ExternalIdGenerator', () => {
  it('should generate consistent ids for same inputs', () => {
    const id1 = ExternalIdGenerator.forSeries('engineering', 'IA', 'CW', 'Example Lecture');
    const id2 = ExternalIdGenerator.forSeries('engineering', 'IA', 'CW', 'Example Lecture');

    expect(id1).toBe(id2);
  });

  it('should match ids generated by earlier imports', () => {
    expect(ExternalIdGenerator.forSeries('engineering', 'IA', 'CW', 'Example Lecture')).toBe(
      'a56c8e0cf78ec3ad51dfbe303e4dc98c'
    );
    expect(ExternalIdGenerator.forSeries('Modern & Medieval', 'IA', 'P1', 'Mechanics')).toBe(
      '151c9b05f152504bcf92bf0829c03cca'
    );
  });

  it('should generate different ids when any one input changes', () => {
    const base = ExternalIdGenerator.forSeries('engineering', 'IA', 'CW', 'Example Lecture');

    expect(ExternalIdGenerator.forSeries('natsci', 'IA', 'CW', 'Example Lecture')).toBe(
      'fc3ebbf820fff6cf24cdb308cd46a7de'
    );
    expect(ExternalIdGenerator.forSeries('engineering', 'IB', 'CW', 'Example Lecture')).toBe(
      '1d2759c53ef83c754eaa89c9d47e188c'
    );
    expect(ExternalIdGenerator.forSeries('engineering', 'IA', 'P1', 'Example Lecture')).toBe(
      '373a033853a4beb285e2d85bd1f10075'
    );
    expect(ExternalIdGenerator.forSeries('engineering', 'IA', 'CW', 'Example Lectures')).toBe(
      '211b467a1f4212d2af924117ab1bce64'
    );
    expect(base).not.toBe(ExternalIdGenerator.forSeries('engineering', '1', 'CW', 'Example Lecture'));
  });

  it('should produce 32 hex characters', () => {
    expect(ExternalIdGenerator.forSeries('', '', '', '')).toMatch(/^[0-9a-f]{32}$/);
  });
});
