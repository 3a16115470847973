export * from './market.js';
export * from './strategy.js';
export * from './backtest.js';
export * from './scenarios.js';
export * from './portfolio.js';
export * from './quality.js';
export type { CandidateResult, PipelineStage, StageError } from './candidate.js';
