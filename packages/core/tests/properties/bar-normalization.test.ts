/**
 * Property Tests for Bar Normalization
 * ====================================
 *
 * Invariants:
 * 1. Every input row is either kept or counted as dropped
 * 2. Output is sorted by timestamp
 */

import { describe, it } from 'vitest';
import fc from 'fast-check';
import { normalizeBars, type BarInput } from '../../src/index.js';

const maybeNumber = fc.option(fc.double({ min: 0, max: 1000, noNaN: true }), { nil: null });

const barInput: fc.Arbitrary<BarInput> = fc.record({
  timestamp: fc.option(fc.integer({ min: 0, max: 2_000_000_000_000 }), { nil: null }),
  open: maybeNumber,
  high: maybeNumber,
  low: maybeNumber,
  close: maybeNumber,
  volume: maybeNumber,
});

describe('normalizeBars - Property Tests', () => {
  it('accounts for every input row', () => {
    fc.assert(
      fc.property(fc.array(barInput, { maxLength: 50 }), (inputs) => {
        const { bars, dropped } = normalizeBars(inputs);
        return bars.length + dropped === inputs.length;
      })
    );
  });

  it('returns bars sorted by timestamp', () => {
    fc.assert(
      fc.property(fc.array(barInput, { maxLength: 50 }), (inputs) => {
        const { bars } = normalizeBars(inputs);
        return bars.every((bar, i) => i === 0 || (bars[i - 1]?.timestamp ?? -Infinity) <= bar.timestamp);
      })
    );
  });
});
