import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { BacktestOptions } from './types.js';

export const DEFAULT_BACKTEST_OPTIONS: Readonly<BacktestOptions> = Object.freeze({
  initialCapital: 10_000,
  commission: 0,
  slippage: 0,
  minimumBars: 2,
  minimumTrades: 1,
  tradingPeriodsPerYear: 252,
  riskFreeRate: 0,
});

export const BacktestOptionsSchema = z.object({
  initialCapital: z.number().finite().positive(),
  commission: z.number().finite().min(0),
  slippage: z.number().min(0).lt(1),
  minimumBars: z.number().int().min(1),
  minimumTrades: z.number().int().min(0),
  tradingPeriodsPerYear: z.number().int().positive(),
  riskFreeRate: z.number().finite().min(0).max(1),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merges overrides onto the defaults and validates the result.
 * Throws ConfigurationError naming every invalid field.
 */
export function parseBacktestOptions(overrides: Partial<BacktestOptions> = {}): BacktestOptions {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  const merged = { ...DEFAULT_BACKTEST_OPTIONS, ...defined };
  const parsed = BacktestOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid backtest options: ${describeIssues(parsed.error)}`, {
      fields: parsed.error.issues.map((i) => i.path.join('.')),
    });
  }
  return parsed.data;
}
