import { describe, expect, it, vi } from 'vitest';
import type { BacktestStrategy, BarView } from '../../src/backtest/types.js';

// Mock the logger
vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }),
}));

import { BacktestEngine, runBacktest } from '../../src/backtest/engine.js';
import { ConfigurationError, DataError, LookaheadError } from '../../src/backtest/errors.js';
import { constant, makeBars, roundTrips, scripted } from '../helpers/bars.js';

describe('BacktestEngine', () => {
  // ── End-to-end scenarios ─────────────────────────────────────────────────

  describe('single round trip', () => {
    const bars = makeBars([100, 100, 100, 102, 105, 110, 108]);
    const strategy = scripted('scripted', { 2: 'BUY', 5: 'SELL' });

    it('records exactly one trade with a 10% gain', () => {
      const result = runBacktest(bars, strategy, { initialCapital: 10_000 });

      expect(result.trades).toHaveLength(1);
      const [trade] = result.trades;
      expect(trade.entryIndex).toBe(2);
      expect(trade.exitIndex).toBe(5);
      expect(trade.entryPrice).toBe(100);
      expect(trade.exitPrice).toBe(110);
      expect(trade.quantity).toBe(100);
      expect(trade.realizedPnl).toBe(1000);
      expect(trade.realizedPnlPct).toBeCloseTo(0.1, 10);
      expect(trade.holdingBars).toBe(3);
      expect(trade.exitReason).toBe('signal');
      expect(result.finalCapital).toBe(11_000);
      expect(result.flags.forcedExit).toBe(false);
    });

    it('marks equity to market while holding and stays flat after the exit', () => {
      const result = runBacktest(bars, strategy, { initialCapital: 10_000 });
      expect(result.equityCurve.map((p) => p.equity)).toEqual([
        10_000, 10_000, 10_000, 10_200, 10_500, 11_000, 11_000,
      ]);
      expect(result.equityCurve[0].date).toBe('2024-01-01');
      expect(result.metrics.totalReturnPct).toBe(10);
      expect(result.metrics.maxDrawdownPct).toBe(0);
      expect(result.metrics.winRate).toBe(1);
      expect(result.metrics.profitFactor).toBe(Number.POSITIVE_INFINITY);
    });

    it('reports the replayed range', () => {
      const result = runBacktest(bars, strategy, {}, 'TEST');
      expect(result.symbol).toBe('TEST');
      expect(result.strategyName).toBe('scripted');
      expect(result.startDate).toBe('2024-01-01');
      expect(result.endDate).toBe('2024-01-07');
      expect(result.barsProcessed).toBe(7);
      expect(result.warmupBars).toBe(0);
    });
  });

  describe('HOLD-only strategy', () => {
    it('produces no trades and a flat equity curve', () => {
      const result = runBacktest(makeBars([50, 55, 45, 60]), constant('idle', 'HOLD'), {
        initialCapital: 5000,
      });

      expect(result.trades).toHaveLength(0);
      expect(result.equityCurve.map((p) => p.equity)).toEqual([5000, 5000, 5000, 5000]);
      expect(result.finalCapital).toBe(5000);
      expect(result.metrics.totalReturnPct).toBe(0);
      expect(result.metrics.winRate).toBe(0);
      expect(result.metrics.profitFactor).toBe(0);
      expect(result.metrics.sharpeRatio).toBe(0);
      expect(result.flags.insufficientSample).toBe(true);
      expect(result.metrics.insufficientSample).toBe(true);
    });
  });

  describe('position open on the last bar', () => {
    it('closes it at the final close and flags a forced exit', () => {
      const result = runBacktest(makeBars([100, 100, 110, 120]), scripted('hodl', { 1: 'BUY' }), {
        initialCapital: 10_000,
      });

      expect(result.trades).toHaveLength(1);
      const [trade] = result.trades;
      expect(trade.exitIndex).toBe(3);
      expect(trade.exitPrice).toBe(120);
      expect(trade.realizedPnl).toBe(2000);
      expect(trade.exitReason).toBe('forced_exit');
      expect(result.flags.forcedExit).toBe(true);
      expect(result.finalCapital).toBe(12_000);
      expect(result.equityCurve.map((p) => p.equity)).toEqual([10_000, 10_000, 11_000, 12_000]);
    });

    it('applies commission and slippage to the forced exit too', () => {
      const result = runBacktest(makeBars([100, 100, 120]), scripted('hodl', { 1: 'BUY' }), {
        initialCapital: 10_000,
        commission: 10,
        slippage: 0.01,
      });

      const [trade] = result.trades;
      expect(trade.exitPrice).toBeCloseTo(118.8, 10);
      expect(trade.commission).toBe(20);
      expect(result.finalCapital).toBeCloseTo(10_000 + trade.realizedPnl, 8);
    });
  });

  // ── Costs ────────────────────────────────────────────────────────────────

  describe('commission and slippage', () => {
    const bars = makeBars([100, 100, 110]);
    const strategy = scripted('s', { 1: 'BUY', 2: 'SELL' });

    it('deducts commission on entry and on exit', () => {
      const result = runBacktest(bars, strategy, { initialCapital: 10_000, commission: 10 });
      const [trade] = result.trades;

      expect(trade.quantity).toBeCloseTo(99.9, 10);
      expect(trade.realizedPnl).toBeCloseTo(979, 8);
      expect(trade.commission).toBe(20);
      expect(result.finalCapital).toBeCloseTo(10_979, 8);
    });

    it('fills entries above and exits below the close', () => {
      const result = runBacktest(bars, strategy, { initialCapital: 10_000, slippage: 0.01 });
      const [trade] = result.trades;

      expect(trade.entryPrice).toBeCloseTo(101, 10);
      expect(trade.exitPrice).toBeCloseTo(108.9, 10);
      expect(trade.realizedPnl).toBeCloseTo((10_000 / 101) * 7.9, 8);
    });
  });

  // ── Invariants ───────────────────────────────────────────────────────────

  describe('invariants', () => {
    const closes = [100, 101, 99, 103, 104, 98, 97, 105, 110];

    it('conserves capital across many trades', () => {
      const result = runBacktest(makeBars(closes), roundTrips('rt', 2), {
        initialCapital: 10_000,
        commission: 5,
        slippage: 0.001,
      });

      const totalPnl = result.trades.reduce((sum, t) => sum + t.realizedPnl, 0);
      expect(result.finalCapital).toBeCloseTo(10_000 + totalPnl, 8);
      expect(result.equityCurve[result.equityCurve.length - 1].equity).toBeCloseTo(
        result.finalCapital,
        8,
      );
    });

    it('never holds more than one position', () => {
      const result = runBacktest(makeBars(closes), roundTrips('rt', 2));

      expect(result.trades.map((t) => [t.entryIndex, t.exitIndex])).toEqual([
        [0, 2],
        [3, 5],
        [6, 8],
      ]);
      for (let i = 1; i < result.trades.length; i++) {
        expect(result.trades[i].entryIndex).toBeGreaterThan(result.trades[i - 1].exitIndex);
      }
    });

    it('treats BUY while holding and SELL while flat as HOLD', () => {
      const result = runBacktest(
        makeBars([10, 10, 10, 12, 12]),
        scripted('noisy', { 0: 'SELL', 1: 'BUY', 2: 'BUY', 3: 'SELL', 4: 'SELL' }),
      );

      expect(result.trades).toHaveLength(1);
      expect(result.trades[0].entryIndex).toBe(1);
      expect(result.trades[0].exitIndex).toBe(3);
    });

    it('gives identical results for identical inputs', () => {
      const bars = makeBars(closes);
      const engine = new BacktestEngine({ strategy: roundTrips('rt', 3), options: { commission: 1 } });

      expect(engine.run(bars)).toEqual(engine.run(bars));
    });

    it('returns frozen results', () => {
      const result = runBacktest(makeBars(closes), roundTrips('rt', 2));
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.trades)).toBe(true);
      expect(Object.isFrozen(result.equityCurve)).toBe(true);
      expect(Object.isFrozen(result.metrics)).toBe(true);
    });

    it('reports drawdown from the mark-to-market equity curve', () => {
      const result = runBacktest(
        makeBars([100, 100, 120, 90, 100]),
        scripted('dd', { 1: 'BUY', 4: 'SELL' }),
        { initialCapital: 10_000 },
      );
      expect(result.equityCurve.map((p) => p.equity)).toEqual([
        10_000, 10_000, 12_000, 9000, 10_000,
      ]);
      expect(result.metrics.maxDrawdownPct).toBe(-25);
    });

    it('counts entry costs on the first bar as drawdown from the starting capital', () => {
      const result = runBacktest(makeBars([100, 100, 100, 100]), scripted('x', { 0: 'BUY' }), {
        initialCapital: 10_000,
        commission: 100,
      });
      expect(result.equityCurve[0].equity).toBe(9900);
      expect(result.finalCapital).toBe(9800);
      expect(result.metrics.totalReturnPct).toBe(-2);
      expect(result.metrics.maxDrawdownPct).toBe(-2);
    });
  });

  // ── Strategy isolation ───────────────────────────────────────────────────

  describe('no lookahead', () => {
    it('only lets the strategy reach the current and earlier bars', () => {
      const seen: Array<{ index: number; reachable: string[] }> = [];
      const probe: BacktestStrategy = {
        name: 'probe',
        evaluate: (view: BarView) => {
          const reachable: string[] = [view.date];
          for (let prev = view.previous(); prev; prev = prev.previous()) {
            reachable.push(prev.date);
          }
          seen.push({ index: view.index, reachable });
          return 'HOLD';
        },
      };

      const bars = makeBars([1, 2, 3, 4]);
      runBacktest(bars, probe);

      expect(seen).toHaveLength(4);
      for (const { index, reachable } of seen) {
        expect(reachable).toHaveLength(index + 1);
        for (const date of reachable) {
          expect(date <= bars[index].date).toBe(true);
        }
      }
    });

    it('fails closed when a strategy asks for the current or a future bar', () => {
      const peeker: BacktestStrategy = {
        name: 'peeker',
        evaluate: (view) => (view.previous(-1) ? 'BUY' : 'HOLD'),
      };
      expect(() => runBacktest(makeBars([1, 2, 3]), peeker)).toThrow(LookaheadError);
    });

    it('hands out frozen views with no route to the bar array', () => {
      const keys: string[][] = [];
      runBacktest(makeBars([1, 2]), {
        name: 'keys',
        evaluate: (view) => {
          expect(Object.isFrozen(view)).toBe(true);
          keys.push(Object.keys(view).sort());
          return 'HOLD';
        },
      });
      expect(keys[0]).toEqual([
        'close',
        'date',
        'has',
        'high',
        'index',
        'low',
        'open',
        'previous',
        'value',
        'volume',
        'window',
      ]);
    });

    it('propagates errors thrown by the strategy', () => {
      const broken: BacktestStrategy = {
        name: 'broken',
        evaluate: () => {
          throw new Error('boom');
        },
      };
      expect(() => runBacktest(makeBars([1, 2]), broken)).toThrow('boom');
    });
  });

  // ── Warm-up ──────────────────────────────────────────────────────────────

  describe('warm-up bars', () => {
    it('does not consult the strategy until required indicators are defined', () => {
      const evaluate = vi.fn().mockReturnValue('HOLD');
      const bars = makeBars([10, 11, 12, 13, 14], [{}, { sma: undefined }, { sma: 11 }, { sma: 12 }, { sma: 13 }]);

      const result = runBacktest(bars, { name: 'warm', requiredIndicators: ['sma'], evaluate });

      expect(result.warmupBars).toBe(2);
      expect(evaluate).toHaveBeenCalledTimes(3);
      expect(evaluate.mock.calls[0][0].index).toBe(2);
      expect(result.equityCurve).toHaveLength(5);
    });

    it('treats NaN indicator values as undefined', () => {
      const evaluate = vi.fn().mockReturnValue('HOLD');
      const bars = makeBars([10, 11, 12], [{ sma: Number.NaN }, { sma: 10 }, { sma: 11 }]);

      const result = runBacktest(bars, { name: 'nan', requiredIndicators: ['sma'], evaluate });
      expect(result.warmupBars).toBe(1);
    });
  });

  // ── Errors ───────────────────────────────────────────────────────────────

  describe('insufficient capital', () => {
    it('rejects entries that commission would consume and keeps running', () => {
      const result = runBacktest(makeBars([10, 11, 12]), constant('eager', 'BUY'), {
        initialCapital: 100,
        commission: 100,
      });

      expect(result.trades).toHaveLength(0);
      expect(result.flags.rejectedEntries).toBe(3);
      expect(result.finalCapital).toBe(100);
    });
  });

  describe('configuration errors', () => {
    const strategy = constant('idle', 'HOLD');

    it('rejects non-positive capital', () => {
      expect(() => new BacktestEngine({ strategy, options: { initialCapital: 0 } })).toThrow(
        ConfigurationError,
      );
    });

    it('rejects negative commission and slippage of 1 or more', () => {
      expect(() => new BacktestEngine({ strategy, options: { commission: -1 } })).toThrow(
        /commission/,
      );
      expect(() => new BacktestEngine({ strategy, options: { slippage: 1 } })).toThrow(/slippage/);
    });

    it('rejects a fractional minimum trade count', () => {
      expect(() => new BacktestEngine({ strategy, options: { minimumTrades: 1.5 } })).toThrow(
        /minimumTrades/,
      );
    });
  });

  describe('data errors', () => {
    const strategy = constant('idle', 'HOLD');

    it('rejects an empty sequence', () => {
      expect(() => runBacktest([], strategy)).toThrow('Bar sequence is empty');
    });

    it('rejects duplicate timestamps', () => {
      const bars = makeBars([1, 2, 3]);
      bars[2] = { ...bars[2], date: bars[1].date };
      expect(() => runBacktest(bars, strategy)).toThrow('Duplicate timestamp 2024-01-02 at bar 2');
    });

    it('rejects out-of-order timestamps', () => {
      const bars = makeBars([1, 2, 3]);
      [bars[1], bars[2]] = [bars[2], bars[1]];
      expect(() => runBacktest(bars, strategy)).toThrow(DataError);
    });

    it('rejects fewer bars than the strategy needs', () => {
      const engine = new BacktestEngine({ strategy: { ...strategy, minimumBars: 5 } });
      expect(engine.minimumBars).toBe(5);
      expect(() => engine.run(makeBars([1, 2, 3]))).toThrow('Need at least 5 bars, got 3');
    });
  });
});
