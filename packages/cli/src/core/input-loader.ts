/**
 * Input loading for strategy and bar files
 */

import {
  BarsBySymbolSchema,
  PortfolioStateSchema,
  StrategySpecSchema,
  normalizeBars,
  type BarInput,
  type BarsBySymbol,
  type PortfolioState,
  type StrategySpec,
} from '@stratgate/core';
import { ValidationError, createLogger } from '@stratgate/utils';
import { coerceJson } from './coerce.js';

const logger = createLogger('cli:input');

export type ReadTextFile = (path: string) => Promise<string>;

function issues(error: { issues: { path: (string | number)[]; message: string }[] }): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export async function loadStrategy(path: string, readFile: ReadTextFile): Promise<StrategySpec> {
  const parsed = StrategySpecSchema.safeParse(coerceJson(await readFile(path), path));
  if (!parsed.success) {
    throw new ValidationError(`Invalid strategy in ${path}: ${issues(parsed.error)}`, { path });
  }
  return parsed.data;
}

/**
 * Raw bars per symbol, exactly as written in the file (for quality checks)
 */
export async function loadRawBars(path: string, readFile: ReadTextFile): Promise<Record<string, BarInput[]>> {
  const parsed = BarsBySymbolSchema.safeParse(coerceJson(await readFile(path), path));
  if (!parsed.success) {
    throw new ValidationError(`Invalid bars in ${path}: ${issues(parsed.error)}`, { path });
  }
  return parsed.data;
}

/**
 * Complete, sorted bars per symbol; incomplete rows are dropped with a warning
 */
export function toBarsBySymbol(raw: Record<string, BarInput[]>): BarsBySymbol {
  const bars: BarsBySymbol = {};
  for (const [symbol, inputs] of Object.entries(raw)) {
    const normalized = normalizeBars(inputs);
    if (normalized.dropped > 0) {
      logger.warn('Dropped incomplete bars', { symbol, dropped: normalized.dropped });
    }
    bars[symbol] = normalized.bars;
  }
  return bars;
}

export function cashPortfolio(cash: number): PortfolioState {
  return PortfolioStateSchema.parse({ cash, positions: [] });
}
