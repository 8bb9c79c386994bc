import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from './errors.js';
import { type RankingOptions, type RankingReport, rankStrategies } from './ranking.js';
import type { BacktestStrategy, Bar } from './types.js';

const log = createLogger('optimizer');

export type ParameterSet = Readonly<Record<string, number>>;
export type ParameterGrid = Readonly<Record<string, readonly number[]>>;

/**
 * Cartesian product of the grid, keys varying slowest-first in insertion order:
 * { a: [1, 2], b: [3] } → [{ a: 1, b: 3 }, { a: 2, b: 3 }].
 */
export function expandGrid(grid: ParameterGrid): ParameterSet[] {
  const keys = Object.keys(grid);
  if (keys.length === 0) {
    throw new ConfigurationError('Parameter grid has no parameters');
  }

  let combos: Record<string, number>[] = [{}];
  for (const key of keys) {
    const values = grid[key];
    if (values.length === 0) {
      throw new ConfigurationError(`Parameter "${key}" has no values`, { key });
    }
    const next: Record<string, number>[] = [];
    for (const combo of combos) {
      for (const value of values) {
        next.push({ ...combo, [key]: value });
      }
    }
    combos = next;
  }
  return combos;
}

export function formatParameters(params: ParameterSet): string {
  return Object.entries(params)
    .map(([k, v]) => `${k}=${v}`)
    .join(',');
}

export interface OptimizeInput<S extends BacktestStrategy> {
  bars: readonly Bar[];
  symbol?: string;
  grid: ParameterGrid;
  build: (params: ParameterSet) => S;
  ranking?: RankingOptions;
}

export interface OptimizationReport extends RankingReport {
  /** Strategy name → the parameters it was built with. */
  parameters: ReadonlyMap<string, ParameterSet>;
}

/**
 * Builds one strategy per grid combination and ranks them against each other.
 * Each variant's name is the built strategy's name with its parameters appended.
 */
export function optimizeParameters<S extends BacktestStrategy>(
  input: OptimizeInput<S>,
): OptimizationReport {
  const combos = expandGrid(input.grid);
  const parameters = new Map<string, ParameterSet>();

  const variants: BacktestStrategy[] = combos.map((params) => {
    const base = input.build(params);
    const name = `${base.name}[${formatParameters(params)}]`;
    parameters.set(name, params);
    return {
      name,
      requiredIndicators: base.requiredIndicators,
      minimumBars: base.minimumBars,
      evaluate: (view, position) => base.evaluate(view, position),
    };
  });

  log.info({ combinations: variants.length }, 'Optimizing strategy parameters');

  const report = rankStrategies(input.bars, variants, {
    ...input.ranking,
    symbol: input.symbol ?? input.ranking?.symbol,
  });
  return { ...report, parameters };
}
