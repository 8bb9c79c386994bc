import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { validateBars } from './bar-series.js';
import { BacktestEngine } from './engine.js';
import { ConfigurationError, type SerializedError, serializeError } from './errors.js';
import { describeIssues, parseBacktestOptions } from './options.js';
import type { BacktestOptions, BacktestResult, BacktestStrategy, Bar } from './types.js';

const log = createLogger('strategy-ranking');

export const RANKING_METRICS = [
  'totalReturnPct',
  'sharpeRatio',
  'winRate',
  'profitFactor',
  'maxDrawdownPct',
] as const;

export type RankingMetric = (typeof RANKING_METRICS)[number];

export interface RankingOptions {
  symbol?: string;
  metric?: RankingMetric;
  tieBreaker?: RankingMetric;
  minimumTrades?: number;
  backtest?: Partial<BacktestOptions>;
}

export interface RankedOutcome {
  status: 'ranked';
  strategyName: string;
  rank: number;
  result: BacktestResult;
}

export interface InsufficientSampleOutcome {
  status: 'insufficient_sample';
  strategyName: string;
  result: BacktestResult;
}

export interface FailedOutcome {
  status: 'failed';
  strategyName: string;
  error: SerializedError;
}

export type StrategyOutcome = RankedOutcome | InsufficientSampleOutcome | FailedOutcome;

export interface RankingReport {
  symbol: string;
  metric: RankingMetric;
  tieBreaker: RankingMetric;
  minimumTrades: number;
  /** Ranked results, best first. */
  ranked: readonly RankedOutcome[];
  /** Every strategy in input order, including excluded and failed ones. */
  outcomes: readonly StrategyOutcome[];
}

const RankingOptionsSchema = z.object({
  metric: z.enum(RANKING_METRICS),
  tieBreaker: z.enum(RANKING_METRICS),
  minimumTrades: z.number().int().min(0),
});

export function metricValue(result: BacktestResult, metric: RankingMetric): number {
  return result.metrics[metric];
}

/**
 * Descending by the primary metric, then by the tie-breaker, then by strategy
 * name so the order never depends on evaluation order.
 */
export function compareResults(
  a: BacktestResult,
  b: BacktestResult,
  metric: RankingMetric,
  tieBreaker: RankingMetric,
): number {
  const primary = compareDescending(metricValue(a, metric), metricValue(b, metric));
  if (primary !== 0) return primary;
  const secondary = compareDescending(metricValue(a, tieBreaker), metricValue(b, tieBreaker));
  if (secondary !== 0) return secondary;
  return a.strategyName < b.strategyName ? -1 : a.strategyName > b.strategyName ? 1 : 0;
}

function compareDescending(a: number, b: number): number {
  if (a === b) return 0;
  return a > b ? -1 : 1;
}

/**
 * Ranks already-computed results. Results with fewer than `minimumTrades`
 * trades are kept as insufficient-sample outcomes and left out of the ranking.
 */
export function rankResults(
  results: readonly BacktestResult[],
  metric: RankingMetric,
  tieBreaker: RankingMetric,
  minimumTrades: number,
): { ranked: RankedOutcome[]; excluded: InsufficientSampleOutcome[] } {
  const eligible: BacktestResult[] = [];
  const excluded: InsufficientSampleOutcome[] = [];

  for (const result of results) {
    if (result.trades.length < minimumTrades || result.trades.length === 0) {
      excluded.push({
        status: 'insufficient_sample',
        strategyName: result.strategyName,
        result,
      });
    } else {
      eligible.push(result);
    }
  }

  const ranked = [...eligible]
    .sort((a, b) => compareResults(a, b, metric, tieBreaker))
    .map((result, i) => ({
      status: 'ranked' as const,
      strategyName: result.strategyName,
      rank: i + 1,
      result,
    }));

  return { ranked, excluded };
}

/**
 * Runs every strategy over the same bars and ranks the results.
 *
 * Batch-level problems (invalid options, duplicate strategy names, a dataset
 * that no strategy could replay) throw before any strategy runs. Anything that
 * goes wrong inside a single strategy's run is recorded as a failed outcome
 * and the batch carries on.
 */
export function rankStrategies(
  bars: readonly Bar[],
  strategies: readonly BacktestStrategy[],
  options: RankingOptions = {},
): RankingReport {
  const backtestOptions = parseBacktestOptions(options.backtest);
  const parsed = RankingOptionsSchema.safeParse({
    metric: options.metric ?? 'totalReturnPct',
    tieBreaker: options.tieBreaker ?? 'sharpeRatio',
    minimumTrades: options.minimumTrades ?? backtestOptions.minimumTrades,
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ranking options: ${describeIssues(parsed.error)}`);
  }
  const { metric, tieBreaker, minimumTrades } = parsed.data;
  const symbol = options.symbol ?? 'UNKNOWN';

  if (strategies.length === 0) {
    throw new ConfigurationError('No strategies to rank');
  }
  const seen = new Set<string>();
  for (const s of strategies) {
    if (seen.has(s.name)) {
      throw new ConfigurationError(`Duplicate strategy name: ${s.name}`, { name: s.name });
    }
    seen.add(s.name);
  }

  // Ordering and price problems affect every strategy equally: fail the batch.
  validateBars(bars, 1);

  log.info(
    { symbol, strategies: strategies.length, metric, minimumTrades, bars: bars.length },
    'Ranking strategies',
  );

  const completed: BacktestResult[] = [];
  const failures = new Map<string, FailedOutcome>();

  for (const strategy of strategies) {
    try {
      const engine = new BacktestEngine({
        strategy,
        symbol,
        options: { ...backtestOptions, minimumTrades },
      });
      completed.push(engine.run(bars));
    } catch (err) {
      const error = serializeError(err);
      log.warn({ symbol, strategy: strategy.name, error }, 'Strategy run failed');
      failures.set(strategy.name, { status: 'failed', strategyName: strategy.name, error });
    }
  }

  const { ranked, excluded } = rankResults(completed, metric, tieBreaker, minimumTrades);

  const byName = new Map<string, StrategyOutcome>();
  for (const o of ranked) byName.set(o.strategyName, o);
  for (const o of excluded) byName.set(o.strategyName, o);
  for (const [name, o] of failures) byName.set(name, o);

  const outcomes: StrategyOutcome[] = [];
  for (const s of strategies) {
    const outcome = byName.get(s.name);
    if (outcome) outcomes.push(outcome);
  }

  log.info(
    {
      symbol,
      ranked: ranked.length,
      insufficientSample: excluded.length,
      failed: failures.size,
      best: ranked[0]?.strategyName ?? null,
    },
    'Ranking complete',
  );

  return Object.freeze({
    symbol,
    metric,
    tieBreaker,
    minimumTrades,
    ranked: Object.freeze(ranked),
    outcomes: Object.freeze(outcomes),
  });
}
