/**
 * @stratgate/trading - Risk gating and order execution
 *
 * Public API exports for the trading package
 */

// Risk
export * from './safety/risk-engine.js';
export * from './safety/execution-guard.js';

// Order generation
export * from './execution/order-generator.js';

// Portfolio valuation
export * from './positions/portfolio-value.js';

// Brokers
export * from './brokers/alpaca-broker.js';
export * from './brokers/paper-broker.js';
export * from './brokers/broker-registry.js';
export * from './brokers/broker-manager.js';

// Types
export * from './types.js';
