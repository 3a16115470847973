/**
 * Risk Engine property tests
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { RiskEngine } from '../../src/safety/risk-engine.js';
import { TEST_LIMITS } from '../helpers/fixtures.js';

const symbolArb = fc.constantFrom('AAPL', 'MSFT', 'GOOG', 'TSLA');

const orderArb = fc.record({
  symbol: symbolArb,
  side: fc.constantFrom('buy' as const, 'sell' as const),
  quantity: fc.double({ min: 0.01, max: 500, noNaN: true }),
  type: fc.constant('market' as const),
});

describe('RiskEngine properties', () => {
  const engine = new RiskEngine(TEST_LIMITS);

  it('approves a subset of the proposal and blocks exactly when something is violated', () => {
    fc.assert(
      fc.property(
        fc.array(orderArb, { maxLength: 8 }),
        fc.double({ min: -1000, max: 200000, noNaN: true }),
        fc.array(fc.double({ min: 1, max: 1000, noNaN: true }), { maxLength: 10 }),
        (orders, cash, curve) => {
          const result = engine.assess(
            { cash, positions: [] },
            orders,
            { AAPL: 100, MSFT: 250, GOOG: 50, TSLA: 10 },
            curve
          );

          for (const approved of result.approved_trades) {
            expect(orders).toContain(approved);
          }
          expect(result.risk_score).toBeGreaterThanOrEqual(0);
          expect(result.risk_score).toBeLessThanOrEqual(1);
          expect(result.risk_level === 'BLOCK').toBe(result.violations.length > 0);
          if (result.drawdown_blocked) {
            expect(result.approved_trades).toEqual([]);
          }
        }
      )
    );
  });
});
