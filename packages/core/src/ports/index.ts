/**
 * Ports Barrel Export
 *
 * Collaborators the pipeline talks to; adapters implement these interfaces.
 */

export type { StrategySourcePort, StrategyContext } from './strategy-source-port.js';
export type { MarketDataPort } from './market-data-port.js';
export type { ResultSinkPort } from './result-sink-port.js';
