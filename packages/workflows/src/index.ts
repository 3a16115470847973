/**
 * @stratgate/workflows
 *
 * Orchestration of the strategy validation, risk-gating and execution pipeline.
 */

export { StrategyPipeline, latestPrices } from './pipeline/StrategyPipeline.js';
export type { GatingOptions, PipelineOptions, StrategyPipelineDeps } from './pipeline/StrategyPipeline.js';
export * from './sinks/index.js';
