/**
 * Shared test fixtures for trading tests
 */

import type { RiskSettings, BrokerSettings } from '@stratgate/utils';
import type { PortfolioState, StrategySpec } from '@stratgate/core';

export const TEST_LIMITS: RiskSettings = {
  maxTradeNotional: 10000,
  maxPortfolioExposure: 0.5,
  maxPositionPerSymbol: 0.25,
  maxDrawdownThreshold: 0.25,
  blacklist: [],
  fallbackReferencePrice: 100,
  warningScore: 0.7,
};

export const TEST_BROKER_SETTINGS: BrokerSettings = {
  primary: 'alpaca',
  failoverEnabled: true,
  failoverList: ['paper'],
  healthCheckTimeoutMs: 20,
  fillTimeoutMs: 1000,
  fillPollIntervalMs: 10,
};

export function cashOnly(cash: number): PortfolioState {
  return { cash, positions: [] };
}

export function makeStrategy(overrides: Partial<StrategySpec> = {}): StrategySpec {
  return {
    strategy_id: 'test-strategy',
    universe: ['AAPL'],
    rules: [],
    params: { position_sizing: 'fixed_fraction', fraction: 0.02, timeframe: '1d' },
    ...overrides,
  };
}

/**
 * Deterministic clock whose sleep advances time
 */
export function fakeClock(start = 0): { now: () => number; sleep: (ms: number) => Promise<void>; sleeps: number[] } {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
    sleeps,
  };
}
