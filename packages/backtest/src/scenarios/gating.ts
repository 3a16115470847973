/**
 * Scenario Gating
 *
 * Replays a strategy over each stress scenario and checks the resulting
 * metrics against gating rules. A strategy passes only when every scenario
 * finishes with zero violations.
 */

import { DateTime } from 'luxon';
import { createLogger } from '@stratgate/utils';
import {
  ZERO_METRICS,
  type BarsBySymbol,
  type GatingOperator,
  type GatingResult,
  type GatingRule,
  type Scenario,
  type ScenarioResult,
  type StrategySpec,
  type TransactionCosts,
} from '@stratgate/core';
import { Backtester } from '../engine/backtester.js';
import { sliceBars } from '../validation/walk-forward.js';

const logger = createLogger('backtest:gating');

const EQUALITY_TOLERANCE = 1e-4;

export const NO_DATA_VIOLATION = 'No data available for scenario date range';

export function getDefaultGatingRules(): GatingRule[] {
  return [
    { metric: 'max_drawdown', operator: '<', threshold: 0.5, scenario_tags: ['crisis'] },
    { metric: 'sharpe', operator: '>', threshold: 0.5 },
    { metric: 'total_return', operator: '>', threshold: -0.2, scenario_tags: ['crisis'] },
  ];
}

/**
 * Scenario date range as inclusive epoch-ms bounds (whole days, UTC)
 */
export function scenarioBounds(scenario: Scenario): [number, number] {
  const start = DateTime.fromISO(scenario.start_date, { zone: 'utc' }).startOf('day');
  const end = DateTime.fromISO(scenario.end_date, { zone: 'utc' }).endOf('day');
  return [start.toMillis(), end.toMillis()];
}

export function ruleApplies(rule: GatingRule, scenario: Scenario): boolean {
  const tags = rule.scenario_tags ?? [];
  return tags.length === 0 || tags.some((tag) => scenario.tags.includes(tag));
}

function violates(operator: GatingOperator, value: number, threshold: number): boolean {
  switch (operator) {
    case '<':
      return value >= threshold;
    case '<=':
      return value > threshold;
    case '>':
      return value <= threshold;
    case '>=':
      return value < threshold;
    case '==':
      return Math.abs(value - threshold) > EQUALITY_TOLERANCE;
  }
}

/**
 * Violation message when the metric fails the rule, else undefined
 */
export function checkGatingRule(rule: GatingRule, result: ScenarioResult): string | undefined {
  if (!ruleApplies(rule, result.scenario)) return undefined;

  const metrics = result.backtest.metrics;
  const value =
    rule.metric === 'max_drawdown'
      ? metrics.max_drawdown
      : rule.metric === 'sharpe'
        ? metrics.sharpe
        : metrics.total_return;

  if (value === undefined) {
    return `Metric ${rule.metric} is not available`;
  }

  const violated = violates(rule.operator, value, rule.threshold);

  return violated
    ? `Scenario ${result.scenario.name}: ${rule.metric} = ${value.toFixed(4)} violates rule ${rule.metric} ${rule.operator} ${rule.threshold}`
    : undefined;
}

export class ScenarioGatingEngine {
  constructor(private readonly backtester: Backtester = new Backtester()) {}

  /**
   * Backtest the strategy on one scenario's slice of the data (no rules applied)
   */
  evaluateScenario(
    strategy: StrategySpec,
    scenario: Scenario,
    barsBySymbol: BarsBySymbol,
    costs: Partial<TransactionCosts> = {}
  ): ScenarioResult {
    const [from, to] = scenarioBounds(scenario);
    const scenarioData = sliceBars(barsBySymbol, from, to);

    if (Object.keys(scenarioData).length === 0) {
      logger.warn('No data available for scenario', { scenarioId: scenario.scenario_id });
      return {
        scenario,
        backtest: { strategy, metrics: { ...ZERO_METRICS }, trade_log: [], equity_curve: [] },
        passed: false,
        violations: [NO_DATA_VIOLATION],
      };
    }

    return {
      scenario,
      backtest: this.backtester.run(strategy, scenarioData, costs),
      passed: true,
      violations: [],
    };
  }

  evaluate(
    strategy: StrategySpec,
    scenarios: Scenario[],
    barsBySymbol: BarsBySymbol,
    rules: GatingRule[] = getDefaultGatingRules(),
    costs: Partial<TransactionCosts> = {}
  ): GatingResult {
    logger.info('Evaluating scenarios', { scenarios: scenarios.length, rules: rules.length });

    const scenarioResults = scenarios.map((scenario): ScenarioResult => {
      const result = this.evaluateScenario(strategy, scenario, barsBySymbol, costs);
      // A scenario without data keeps its no-data violation; rules are not checked
      if (!result.passed) return result;

      const violations = rules
        .map((rule) => checkGatingRule(rule, result))
        .filter((violation): violation is string => violation !== undefined);
      return { ...result, passed: violations.length === 0, violations };
    });

    const overallPassed = scenarioResults.every((result) => result.passed);
    const blockingViolations = scenarioResults
      .filter((result) => !result.passed)
      .flatMap((result) => result.violations);

    logger.info('Gating evaluation complete', {
      overallPassed,
      blockingViolations: blockingViolations.length,
    });

    return {
      passed: overallPassed,
      scenario_results: scenarioResults,
      overall_passed: overallPassed,
      blocking_violations: blockingViolations,
    };
  }
}
