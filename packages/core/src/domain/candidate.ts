/**
 * Pipeline output for one strategy candidate
 */

import type { BacktestResult, WalkForwardResult } from './backtest.js';
import type { Fill, Order, RiskAssessment } from './portfolio.js';
import type { QualityReport } from './quality.js';
import type { GatingResult } from './scenarios.js';
import type { StrategySpec } from './strategy.js';

export type PipelineStage = 'validation' | 'gating';

export interface StageError {
  stage: PipelineStage;
  error: string;
}

export interface CandidateResult {
  run_id: string;
  strategy: StrategySpec;
  data_quality: Record<string, QualityReport>;
  backtest: BacktestResult;
  validation?: WalkForwardResult;
  gating?: GatingResult;
  proposed_orders: Order[];
  risk: RiskAssessment;
  execution_fills: Fill[];
  execution_error?: string;
  stage_errors: StageError[];
}
