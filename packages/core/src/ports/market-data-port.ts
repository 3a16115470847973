/**
 * Market Data Port
 *
 * Loads historical bars for a universe. Fetching and caching are the
 * adapter's concern; the pipeline only ever sees the in-memory map.
 */

import type { BarsBySymbol } from '../domain/market.js';

export interface MarketDataPort {
  /**
   * Bars per symbol between start and end (epoch ms, inclusive), sorted by timestamp
   */
  load(universe: string[], start: number, end: number): Promise<BarsBySymbol>;
}
