/**
 * Rule Evaluation
 *
 * Turns a strategy rule into a per-bar signal. The indicator series is computed
 * once per symbol; the signal at bar i compares a left series with a right
 * series:
 *
 * - `sma` / `ema` without a `threshold`: close price against the average
 *   ("price above its 20-bar SMA")
 * - everything else: indicator value against `threshold` (default 0)
 *
 * Conditions: above, below, crosses_above, crosses_below. A NaN on either side
 * means no signal.
 */

import { ValidationError } from '@stratgate/utils';
import type { StrategyRule } from '@stratgate/core';
import { INDICATOR_NAMES, evaluateIndicator } from '../indicators/series.js';

export type RuleCondition = 'above' | 'below' | 'crosses_above' | 'crosses_below';

const CONDITIONS: readonly RuleCondition[] = ['above', 'below', 'crosses_above', 'crosses_below'];

export type SignalFn = (index: number) => boolean;

function isCondition(value: unknown): value is RuleCondition {
  return CONDITIONS.some((condition) => condition === value);
}

export function ruleCondition(rule: StrategyRule): RuleCondition {
  const raw = rule.params.condition ?? rule.params.direction ?? 'above';
  if (!isCondition(raw)) {
    throw new ValidationError(`Unknown rule condition: ${String(raw)}`, {
      indicator: rule.indicator,
      condition: raw,
    });
  }
  return raw;
}

/**
 * Reject a rule whose indicator or condition the engine cannot evaluate
 */
export function assertRuleSupported(rule: StrategyRule): void {
  const indicator = rule.indicator.toLowerCase();
  if (!INDICATOR_NAMES.some((known) => known === indicator)) {
    throw new ValidationError(`Unknown indicator: ${rule.indicator}`, {
      indicator: rule.indicator,
      supported: INDICATOR_NAMES.join(', '),
    });
  }
  ruleCondition(rule);
}

function comparesToPrice(rule: StrategyRule): boolean {
  const indicator = rule.indicator.toLowerCase();
  return (indicator === 'sma' || indicator === 'ema') && typeof rule.params.threshold !== 'number';
}

/**
 * Precompute a rule's series and return its per-bar signal
 */
export function compileRule(rule: StrategyRule, closes: number[]): SignalFn {
  const condition = ruleCondition(rule);
  const values = evaluateIndicator(rule.indicator, closes, rule.params);

  let left: number[];
  let right: (index: number) => number;
  if (comparesToPrice(rule)) {
    left = closes;
    right = (index) => values[index] ?? Number.NaN;
  } else {
    const threshold = typeof rule.params.threshold === 'number' ? rule.params.threshold : 0;
    left = values;
    right = () => threshold;
  }

  return (index) => {
    const current = left[index] ?? Number.NaN;
    const reference = right(index);
    if (Number.isNaN(current) || Number.isNaN(reference)) return false;

    switch (condition) {
      case 'above':
        return current > reference;
      case 'below':
        return current < reference;
      case 'crosses_above':
      case 'crosses_below': {
        if (index < 1) return false;
        const previous = left[index - 1] ?? Number.NaN;
        const previousReference = right(index - 1);
        if (Number.isNaN(previous) || Number.isNaN(previousReference)) return false;
        return condition === 'crosses_above'
          ? previous <= previousReference && current > reference
          : previous >= previousReference && current < reference;
      }
    }
  };
}

/**
 * Signal that fires only when every rule fires (false for an empty rule set)
 */
export function allOf(signals: SignalFn[]): SignalFn {
  return (index) => signals.length > 0 && signals.every((signal) => signal(index));
}

/**
 * Signal that fires when any rule fires
 */
export function anyOf(signals: SignalFn[]): SignalFn {
  return (index) => signals.some((signal) => signal(index));
}
