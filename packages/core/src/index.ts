/**
 * @stratgate/core
 *
 * Domain types (zod schemas with inferred types), timeframe helpers, the kill
 * switch, the active-run registry and collaborator ports.
 */

export * from './domain/index.js';
export * from './time/timeframe.js';
export * from './governance/kill-switch.js';
export * from './runs/active-run-registry.js';
export * from './ports/index.js';
