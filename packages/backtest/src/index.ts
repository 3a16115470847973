/**
 * @stratgate/backtest
 *
 * Data quality screening, indicators, the backtest engine, walk-forward
 * validation and scenario gating.
 */

// Data quality
export { DataQualityChecker, checkFreshness } from './integrity/data-quality.js';
export type { DataQualityConfig } from './integrity/data-quality.js';

// Indicators
export {
  sma,
  ema,
  calculateReturns,
  zscore,
  momentum,
  evaluateIndicator,
  numberParam,
  INDICATOR_NAMES,
} from './indicators/series.js';
export type { IndicatorName } from './indicators/series.js';

// Engine
export { Backtester, DEFAULT_INITIAL_CAPITAL, resolveSymbols } from './engine/backtester.js';
export type { BacktesterOptions } from './engine/backtester.js';
export { assertRuleSupported, compileRule, ruleCondition, allOf, anyOf } from './engine/rule-eval.js';
export type { RuleCondition, SignalFn } from './engine/rule-eval.js';
export { computeMetrics, periodReturns, sharpeRatio, maxDrawdown } from './metrics/performance.js';

// Validation
export {
  WalkForwardValidator,
  ValidationConfigSchema,
  splitData,
  createWindows,
  sliceBars,
  aggregateMetrics,
} from './validation/walk-forward.js';
export type {
  ValidationConfig,
  ValidationConfigInput,
  SplitFractions,
  DataSplits,
  WindowOptions,
  WalkForwardWindow,
} from './validation/walk-forward.js';

// Scenarios
export {
  getScenario,
  listScenarios,
  SCENARIO_2008_CRISIS,
  SCENARIO_2020_COVID,
  SCENARIO_2022_BEAR,
} from './scenarios/registry.js';
export {
  ScenarioGatingEngine,
  getDefaultGatingRules,
  checkGatingRule,
  ruleApplies,
  scenarioBounds,
  NO_DATA_VIOLATION,
} from './scenarios/gating.js';
