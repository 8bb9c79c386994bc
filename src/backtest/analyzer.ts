import { mean, round, stdDev } from '../utils/helpers.js';
import type { EquityPoint, PerformanceMetrics, Trade } from './types.js';

// ── Pure metric functions ────────────────────────────────────────────────

export function computeTotalReturnPct(initialCapital: number, finalCapital: number): number {
  return ((finalCapital - initialCapital) / initialCapital) * 100;
}

/**
 * Win rate as a fraction. With no trades the rate is 0 and the sample is
 * flagged as insufficient instead of dividing by zero.
 */
export function computeWinRate(trades: readonly Pick<Trade, 'realizedPnl'>[]): {
  winRate: number;
  insufficientSample: boolean;
} {
  if (trades.length === 0) return { winRate: 0, insufficientSample: true };
  const wins = trades.filter((t) => t.realizedPnl > 0).length;
  return { winRate: wins / trades.length, insufficientSample: false };
}

/**
 * Profit Factor: sum(winning pnl) / abs(sum(losing pnl)).
 * Returns Number.POSITIVE_INFINITY when there are gains but no losing trades,
 * and 0 when there are no gains at all (including the no-trade case).
 * Callers that serialize the value must special-case Infinity.
 */
export function computeProfitFactor(trades: readonly Pick<Trade, 'realizedPnl'>[]): number {
  let grossProfit = 0;
  let grossLoss = 0;
  for (const t of trades) {
    if (t.realizedPnl > 0) grossProfit += t.realizedPnl;
    else if (t.realizedPnl < 0) grossLoss += -t.realizedPnl;
  }

  if (grossLoss === 0) {
    return grossProfit > 0 ? Number.POSITIVE_INFINITY : 0;
  }
  return grossProfit / grossLoss;
}

/**
 * Largest peak-to-trough decline of an equity series, as a negative
 * percentage (0 when the series never falls below a prior peak).
 * One pass with a running maximum, seeded with `startingEquity` when given so
 * a loss on the very first point still counts.
 */
export function computeMaxDrawdownPct(equity: readonly number[], startingEquity?: number): number {
  let peak = startingEquity ?? Number.NEGATIVE_INFINITY;
  let maxDrawdown = 0;

  for (const value of equity) {
    if (value > peak) peak = value;
    if (peak > 0) {
      const dd = ((value - peak) / peak) * 100;
      if (dd < maxDrawdown) maxDrawdown = dd;
    }
  }

  return maxDrawdown;
}

/** Per-bar fractional changes of an equity series; steps from a non-positive value are skipped. */
export function computePeriodReturns(equity: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equity.length; i++) {
    const prev = equity[i - 1];
    if (prev > 0) {
      returns.push((equity[i] - prev) / prev);
    }
  }
  return returns;
}

/**
 * Sharpe ratio: mean(excess return) / stdev(excess return) * sqrt(periodsPerYear).
 * Population standard deviation. Returns 0 (never NaN) for fewer than two
 * returns or zero deviation.
 */
export function computeSharpe(
  returns: readonly number[],
  periodsPerYear: number,
  riskFreeAnnual = 0,
): number {
  if (returns.length < 2) return 0;

  const riskFreePerPeriod = riskFreeAnnual / periodsPerYear;
  const excess = returns.map((r) => r - riskFreePerPeriod);
  const deviation = stdDev(excess);
  if (deviation === 0 || !Number.isFinite(deviation)) return 0;

  return (mean(excess) / deviation) * Math.sqrt(periodsPerYear);
}

/**
 * Sortino ratio: like Sharpe but divides by downside deviation only.
 * Returns null with fewer than 5 returns or when there is no downside.
 */
export function computeSortino(
  returns: readonly number[],
  periodsPerYear: number,
  riskFreeAnnual = 0,
): number | null {
  if (returns.length < 5) return null;

  const riskFreePerPeriod = riskFreeAnnual / periodsPerYear;
  const excess = returns.map((r) => r - riskFreePerPeriod);
  const negative = excess.filter((r) => r < 0);
  if (negative.length === 0) return mean(excess) > 0 ? null : 0;

  const downsideDeviation = Math.sqrt(
    negative.reduce((sum, r) => sum + r ** 2, 0) / excess.length,
  );
  if (downsideDeviation === 0) return 0;

  return (mean(excess) / downsideDeviation) * Math.sqrt(periodsPerYear);
}

/**
 * Calmar ratio: annualized mean return / |max drawdown|.
 * Returns null with fewer than 5 returns or no drawdown.
 */
export function computeCalmar(
  returns: readonly number[],
  maxDrawdownPct: number,
  periodsPerYear: number,
): number | null {
  if (returns.length < 5 || maxDrawdownPct >= 0) return null;
  return (mean(returns) * periodsPerYear) / Math.abs(maxDrawdownPct / 100);
}

/**
 * SQN (System Quality Number): sqrt(n) * mean / stdev of per-trade returns.
 * Returns null with fewer than 5 trades.
 */
export function computeSQN(tradeReturns: readonly number[]): number | null {
  const n = tradeReturns.length;
  if (n < 5) return null;
  const deviation = stdDev(tradeReturns);
  if (deviation === 0) return 0;
  return Math.sqrt(n) * (mean(tradeReturns) / deviation);
}

/** Dollar expectancy per trade: winRate * avgWin - lossRate * avgLoss. */
export function computeExpectancy(trades: readonly Pick<Trade, 'realizedPnl'>[]): {
  expectancy: number | null;
  avgWin: number | null;
  avgLoss: number | null;
} {
  if (trades.length === 0) return { expectancy: null, avgWin: null, avgLoss: null };

  const wins = trades.filter((t) => t.realizedPnl > 0).map((t) => t.realizedPnl);
  const losses = trades.filter((t) => t.realizedPnl < 0).map((t) => Math.abs(t.realizedPnl));

  const avgWin = wins.length > 0 ? mean(wins) : 0;
  const avgLoss = losses.length > 0 ? mean(losses) : 0;
  const expectancy =
    (wins.length / trades.length) * avgWin - (losses.length / trades.length) * avgLoss;

  return {
    expectancy: round(expectancy, 2),
    avgWin: wins.length > 0 ? round(avgWin, 2) : null,
    avgLoss: losses.length > 0 ? round(avgLoss, 2) : null,
  };
}

// ── Aggregate ───────────────────────────────────────────────────────────

export interface AnalyzeInput {
  trades: readonly Trade[];
  equityCurve: readonly EquityPoint[];
  initialCapital: number;
  tradingPeriodsPerYear: number;
  riskFreeRate?: number;
  minimumTrades?: number;
}

function roundOrNull(n: number | null, decimals: number): number | null {
  return n == null ? null : round(n, decimals);
}

/**
 * Derives every scalar metric from the closed trades and the equity curve.
 * Does not replay anything.
 */
export function analyzePerformance(input: AnalyzeInput): PerformanceMetrics {
  const { trades, equityCurve, initialCapital, tradingPeriodsPerYear } = input;
  const riskFreeRate = input.riskFreeRate ?? 0;
  const minimumTrades = Math.max(1, input.minimumTrades ?? 1);

  const equity = equityCurve.map((p) => p.equity);
  const finalCapital = equity.length > 0 ? equity[equity.length - 1] : initialCapital;
  const returns = computePeriodReturns(equity);

  const { winRate } = computeWinRate(trades);
  const maxDrawdownPct = computeMaxDrawdownPct(equity, initialCapital);
  const tradeReturns = trades.map((t) => t.realizedPnlPct);
  const { expectancy, avgWin, avgLoss } = computeExpectancy(trades);

  const winCount = trades.filter((t) => t.realizedPnl > 0).length;
  const lossCount = trades.filter((t) => t.realizedPnl < 0).length;

  return {
    totalTrades: trades.length,
    winCount,
    lossCount,
    winRate: round(winRate, 4),
    totalPnl: round(
      trades.reduce((sum, t) => sum + t.realizedPnl, 0),
      2,
    ),
    totalReturnPct: round(computeTotalReturnPct(initialCapital, finalCapital), 4),
    maxDrawdownPct: round(maxDrawdownPct, 4),
    sharpeRatio: round(computeSharpe(returns, tradingPeriodsPerYear, riskFreeRate), 4),
    sortinoRatio: roundOrNull(computeSortino(returns, tradingPeriodsPerYear, riskFreeRate), 4),
    calmarRatio: roundOrNull(computeCalmar(returns, maxDrawdownPct, tradingPeriodsPerYear), 4),
    sqn: roundOrNull(computeSQN(tradeReturns), 4),
    expectancy,
    profitFactor: round(computeProfitFactor(trades), 4),
    avgWin,
    avgLoss,
    avgHoldingBars: round(mean(trades.map((t) => t.holdingBars)), 2),
    bestTradePct: trades.length > 0 ? round(Math.max(...tradeReturns), 4) : null,
    worstTradePct: trades.length > 0 ? round(Math.min(...tradeReturns), 4) : null,
    insufficientSample: trades.length < minimumTrades,
  };
}
