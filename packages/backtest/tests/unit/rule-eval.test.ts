import { describe, it, expect } from 'vitest';
import { ValidationError } from '@stratgate/utils';
import type { StrategyRule } from '@stratgate/core';
import { assertRuleSupported, compileRule, ruleCondition, allOf, anyOf } from '../../src/engine/rule-eval.js';

const rule = (indicator: string, params: StrategyRule['params']): StrategyRule => ({
  type: 'entry',
  indicator,
  params,
});

function signals(fn: (index: number) => boolean, length: number): boolean[] {
  return Array.from({ length }, (_, i) => fn(i));
}

describe('ruleCondition', () => {
  it('defaults to above', () => {
    expect(ruleCondition(rule('price', {}))).toBe('above');
  });

  it('accepts direction as an alias', () => {
    expect(ruleCondition(rule('momentum', { direction: 'below' }))).toBe('below');
  });

  it('rejects unknown conditions', () => {
    expect(() => ruleCondition(rule('price', { condition: 'sideways' }))).toThrow(ValidationError);
  });
});

describe('assertRuleSupported', () => {
  it('accepts known indicators in any case', () => {
    expect(() => assertRuleSupported(rule('SMA', { window: 5 }))).not.toThrow();
  });

  it('rejects an unknown indicator', () => {
    expect(() => assertRuleSupported(rule('rsi', {}))).toThrow('Unknown indicator: rsi');
  });

  it('rejects an unknown condition', () => {
    expect(() => assertRuleSupported(rule('price', { condition: 'sideways' }))).toThrow(ValidationError);
  });
});

describe('compileRule', () => {
  it('compares price with a threshold', () => {
    const fn = compileRule(rule('price', { condition: 'above', threshold: 10 }), [9, 10, 11]);
    expect(signals(fn, 3)).toEqual([false, false, true]);
  });

  it('compares close with its moving average when no threshold is given', () => {
    const closes = [10, 10, 10, 12, 8];
    const fn = compileRule(rule('sma', { window: 3 }), closes);
    // sma: NaN, NaN, 10, 10.667, 10
    expect(signals(fn, 5)).toEqual([false, false, false, true, false]);
  });

  it('compares the average itself with an explicit threshold', () => {
    const fn = compileRule(rule('sma', { window: 2, threshold: 10.5, condition: 'above' }), [10, 10, 12]);
    expect(signals(fn, 3)).toEqual([false, false, true]);
  });

  it('detects crosses above and below', () => {
    const closes = [8, 12, 12, 8];
    const up = compileRule(rule('price', { condition: 'crosses_above', threshold: 10 }), closes);
    const down = compileRule(rule('price', { condition: 'crosses_below', threshold: 10 }), closes);
    expect(signals(up, 4)).toEqual([false, true, false, false]);
    expect(signals(down, 4)).toEqual([false, false, false, true]);
  });

  it('never fires on NaN values', () => {
    const fn = compileRule(rule('momentum', { lookback: 2, condition: 'below', threshold: 100 }), [1, 2, 3]);
    expect(signals(fn, 3)).toEqual([false, false, true]);
  });
});

describe('signal combinators', () => {
  const yes = () => true;
  const no = () => false;

  it('allOf needs every signal and at least one', () => {
    expect(allOf([yes, yes])(0)).toBe(true);
    expect(allOf([yes, no])(0)).toBe(false);
    expect(allOf([])(0)).toBe(false);
  });

  it('anyOf needs one signal', () => {
    expect(anyOf([no, yes])(0)).toBe(true);
    expect(anyOf([])(0)).toBe(false);
  });
});
