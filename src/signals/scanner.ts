import { computeProfitFactor, computeWinRate } from '../backtest/analyzer.js';
import { BacktestEngine } from '../backtest/engine.js';
import { serializeError } from '../backtest/errors.js';
import type { BacktestOptions, BacktestResult, Bar, Trade } from '../backtest/types.js';
import type { Strategy } from '../strategies/types.js';
import { round } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import { type AlertAction, CONFIDENCE_ORDER, type Confidence, type SignalAlert } from './types.js';

const log = createLogger('signal-scanner');

export interface ScannerOptions {
  minimumTrades?: number;
  minConfidence?: Confidence;
  backtest?: Partial<BacktestOptions>;
}

export interface HistoricalStats {
  closedTrades: number;
  winRate: number;
  profitFactor: number;
  totalReturnPct: number;
}

const ACTION_ORDER: Readonly<Record<AlertAction, number>> = { BUY: 0, SELL: 1, WATCH: 2 };

export function classifyConfidence(stats: HistoricalStats, minimumTrades: number): Confidence {
  if (
    stats.closedTrades >= Math.max(1, minimumTrades) &&
    stats.winRate >= 0.6 &&
    stats.profitFactor >= 1.5
  ) {
    return 'HIGH';
  }
  if (stats.totalReturnPct > 0) return 'MEDIUM';
  return 'LOW';
}

/**
 * What the strategy is doing on the last bar: an entry filled there (BUY),
 * an exit signalled there (SELL), a position opened earlier and still held
 * (WATCH), or nothing.
 */
export function lastBarAction(
  result: BacktestResult,
): { action: AlertAction; trade: Trade } | null {
  const lastIndex = result.barsProcessed - 1;
  const trade = result.trades[result.trades.length - 1];
  if (!trade || trade.exitIndex !== lastIndex) return null;

  if (trade.exitReason === 'signal') return { action: 'SELL', trade };
  return { action: trade.entryIndex === lastIndex ? 'BUY' : 'WATCH', trade };
}

function historicalStats(result: BacktestResult): HistoricalStats {
  const closed = result.trades.filter((t) => t.exitReason === 'signal');
  return {
    closedTrades: closed.length,
    winRate: round(computeWinRate(closed).winRate, 4),
    profitFactor: round(computeProfitFactor(closed), 4),
    totalReturnPct: result.metrics.totalReturnPct,
  };
}

export function sortAlerts(alerts: readonly SignalAlert[]): SignalAlert[] {
  return [...alerts].sort(
    (a, b) =>
      CONFIDENCE_ORDER[b.confidence] - CONFIDENCE_ORDER[a.confidence] ||
      ACTION_ORDER[a.action] - ACTION_ORDER[b.action] ||
      b.totalReturnPct - a.totalReturnPct ||
      (a.symbol < b.symbol ? -1 : a.symbol > b.symbol ? 1 : 0) ||
      (a.strategyName < b.strategyName ? -1 : a.strategyName > b.strategyName ? 1 : 0),
  );
}

export class SignalScanner {
  private readonly minimumTrades: number;
  private readonly minConfidence: Confidence;
  private readonly backtest: Partial<BacktestOptions>;

  constructor(options: ScannerOptions = {}) {
    this.minimumTrades = options.minimumTrades ?? 3;
    this.minConfidence = options.minConfidence ?? 'LOW';
    this.backtest = options.backtest ?? {};
  }

  scanSymbol(symbol: string, bars: readonly Bar[], strategies: readonly Strategy[]): SignalAlert[] {
    const alerts: SignalAlert[] = [];
    const last = bars[bars.length - 1];
    if (!last) {
      log.warn({ symbol }, 'No bars to scan');
      return alerts;
    }

    for (const strategy of strategies) {
      let result: BacktestResult;
      try {
        result = new BacktestEngine({ strategy, symbol, options: this.backtest }).run(bars);
      } catch (err) {
        log.warn({ symbol, strategy: strategy.name, error: serializeError(err) }, 'Scan failed');
        continue;
      }

      const state = lastBarAction(result);
      if (!state) continue;

      const stats = historicalStats(result);
      const confidence = classifyConfidence(stats, this.minimumTrades);
      if (CONFIDENCE_ORDER[confidence] < CONFIDENCE_ORDER[this.minConfidence]) continue;

      const indicators: Record<string, number> = {};
      for (const name of strategy.requiredIndicators) {
        const v = last.indicators[name];
        if (v !== undefined && Number.isFinite(v)) indicators[name] = round(v, 4);
      }

      const { action, trade } = state;
      alerts.push({
        symbol,
        strategyName: strategy.name,
        action,
        confidence,
        date: last.date,
        close: last.close,
        reason:
          action === 'BUY'
            ? strategy.description
            : action === 'SELL'
              ? `Exit signal after ${trade.holdingBars} bars (${round(trade.realizedPnlPct * 100, 2)}%)`
              : `Holding since ${trade.entryDate} at ${round(trade.entryPrice, 2)}`,
        indicators,
        ...stats,
        ...(action === 'WATCH' ? { entryDate: trade.entryDate, entryPrice: trade.entryPrice } : {}),
      });
    }

    log.info({ symbol, strategies: strategies.length, alerts: alerts.length }, 'Scanned symbol');
    return sortAlerts(alerts);
  }

  scanAll(data: ReadonlyMap<string, readonly Bar[]>, strategies: readonly Strategy[]): SignalAlert[] {
    const alerts: SignalAlert[] = [];
    for (const [symbol, bars] of data) {
      alerts.push(...this.scanSymbol(symbol, bars, strategies));
    }
    return sortAlerts(alerts);
  }
}
