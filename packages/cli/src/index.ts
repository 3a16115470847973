/**
 * @stratgate/cli - Command-line interface
 *
 * Public API exports for the CLI package
 */

export * from './command-defs/strategy.js';
export * from './core/command-context.js';
export * from './core/coerce.js';
export * from './core/error-handler.js';
export * from './core/input-loader.js';
export * from './core/output-formatter.js';
export * from './core/program.js';
export * from './handlers/strategy/evaluate-strategy.js';
export * from './handlers/data/check-quality.js';
export * from './handlers/scenarios/list-scenarios.js';
