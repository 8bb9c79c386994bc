import { createLogger } from '../utils/logger.js';
import { analyzePerformance } from './analyzer.js';
import { createBarView, isWarm, validateBars } from './bar-series.js';
import { InsufficientCapitalError } from './errors.js';
import { parseBacktestOptions } from './options.js';
import { closePosition, markToMarket, openPosition } from './position-tracker.js';
import type {
  BacktestOptions,
  BacktestResult,
  BacktestStrategy,
  Bar,
  EquityPoint,
  Position,
  Trade,
} from './types.js';

const log = createLogger('backtest-engine');

export interface BacktestEngineOptions {
  strategy: BacktestStrategy;
  symbol?: string;
  options?: Partial<BacktestOptions>;
}

/**
 * Replays one bar sequence against one strategy, long-only, at most one
 * position at a time. Each call to run() is independent: no state survives
 * between runs, so the same inputs always give the same result.
 */
export class BacktestEngine {
  private readonly strategy: BacktestStrategy;
  private readonly symbol: string;
  private readonly options: BacktestOptions;

  constructor(params: BacktestEngineOptions) {
    this.strategy = params.strategy;
    this.symbol = params.symbol ?? 'UNKNOWN';
    this.options = parseBacktestOptions(params.options);
  }

  get minimumBars(): number {
    return Math.max(this.options.minimumBars, this.strategy.minimumBars ?? 0);
  }

  run(bars: readonly Bar[]): BacktestResult {
    const { options, strategy } = this;
    validateBars(bars, this.minimumBars);

    const required = strategy.requiredIndicators ?? [];
    const lastIndex = bars.length - 1;

    log.info(
      {
        symbol: this.symbol,
        strategy: strategy.name,
        bars: bars.length,
        from: bars[0].date,
        to: bars[lastIndex].date,
        initialCapital: options.initialCapital,
      },
      'Starting backtest',
    );

    let capital = options.initialCapital;
    let position: Position | null = null;
    let warmupBars = 0;
    let rejectedEntries = 0;
    let forcedExit = false;
    const trades: Trade[] = [];
    const equityCurve: EquityPoint[] = [];

    for (let i = 0; i < bars.length; i++) {
      const view = createBarView(bars, i);

      if (!isWarm(view, required)) {
        warmupBars++;
      } else {
        const signal = strategy.evaluate(view, position);

        if (signal === 'BUY' && position === null) {
          try {
            position = openPosition(view, capital, options.commission, options.slippage);
            log.debug(
              { date: view.date, price: position.entryPrice, quantity: position.quantity },
              'Entry filled',
            );
          } catch (err) {
            if (!(err instanceof InsufficientCapitalError)) throw err;
            rejectedEntries++;
            log.warn({ date: view.date, capital, strategy: strategy.name }, err.message);
          }
        } else if (signal === 'SELL' && position !== null) {
          const trade = closePosition(position, view, options.commission, options.slippage);
          capital = position.capitalAtEntry + trade.realizedPnl;
          position = null;
          trades.push(trade);
          log.debug(
            { date: view.date, price: trade.exitPrice, pnl: trade.realizedPnl },
            'Exit filled',
          );
        }
      }

      if (i === lastIndex && position !== null) {
        const trade = closePosition(
          position,
          view,
          options.commission,
          options.slippage,
          'forced_exit',
        );
        capital = position.capitalAtEntry + trade.realizedPnl;
        position = null;
        trades.push(trade);
        forcedExit = true;
        log.warn(
          { symbol: this.symbol, strategy: strategy.name, date: view.date, pnl: trade.realizedPnl },
          'Position still open on the last bar; closed at final close (forced exit)',
        );
      }

      const equity: number = position !== null ? markToMarket(position, view.close) : capital;
      equityCurve.push(Object.freeze({ date: view.date, equity }));
    }

    const metrics = analyzePerformance({
      trades,
      equityCurve,
      initialCapital: options.initialCapital,
      tradingPeriodsPerYear: options.tradingPeriodsPerYear,
      riskFreeRate: options.riskFreeRate,
      minimumTrades: options.minimumTrades,
    });

    log.info(
      {
        symbol: this.symbol,
        strategy: strategy.name,
        trades: trades.length,
        finalCapital: capital,
        returnPct: metrics.totalReturnPct,
      },
      'Backtest complete',
    );

    return Object.freeze({
      symbol: this.symbol,
      strategyName: strategy.name,
      startDate: bars[0].date,
      endDate: bars[lastIndex].date,
      barsProcessed: bars.length,
      warmupBars,
      initialCapital: options.initialCapital,
      finalCapital: capital,
      options: Object.freeze({ ...options }),
      metrics: Object.freeze(metrics),
      flags: Object.freeze({
        forcedExit,
        insufficientSample: metrics.insufficientSample,
        rejectedEntries,
      }),
      trades: Object.freeze(trades),
      equityCurve: Object.freeze(equityCurve),
    });
  }
}

export function runBacktest(
  bars: readonly Bar[],
  strategy: BacktestStrategy,
  options: Partial<BacktestOptions> = {},
  symbol?: string,
): BacktestResult {
  return new BacktestEngine({ strategy, symbol, options }).run(bars);
}
