import type {
  BacktestStrategy,
  Bar,
  BarView,
  Candle,
  Position,
  Signal,
} from '../../src/backtest/types.js';
import { type Strategy, defineStrategy } from '../../src/strategies/types.js';

/** ISO date `offset` calendar days after 2024-01-01. */
export function dayAfterStart(offset: number): string {
  const d = new Date(Date.UTC(2024, 0, 1 + offset));
  return d.toISOString().slice(0, 10);
}

export function makeCandles(closes: readonly number[], volume = 1000): Candle[] {
  return closes.map((close, i) => ({
    date: dayAfterStart(i),
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume,
  }));
}

/** Bars with the given closes; `indicators[i]` becomes bar i's indicator record. */
export function makeBars(
  closes: readonly number[],
  indicators: ReadonlyArray<Record<string, number | undefined>> = [],
): Bar[] {
  return makeCandles(closes).map((c, i) => ({ ...c, indicators: indicators[i] ?? {} }));
}

/** Emits the scripted signal at each listed bar index, HOLD elsewhere. */
export function scripted(
  name: string,
  signals: Readonly<Record<number, Signal>>,
  extra: Partial<BacktestStrategy> = {},
): BacktestStrategy {
  return {
    name,
    ...extra,
    evaluate: (view: BarView) => signals[view.index] ?? 'HOLD',
  };
}

export function constant(name: string, signal: Signal): BacktestStrategy {
  return { name, evaluate: () => signal };
}

/** BUY while flat, SELL `hold` bars after each entry. */
export function roundTrips(name: string, hold: number): BacktestStrategy {
  return {
    name,
    evaluate: (view: BarView, position: Position | null) => {
      if (position === null) return 'BUY';
      return view.index - position.entryIndex >= hold ? 'SELL' : 'HOLD';
    },
  };
}

/** Buys at the listed bar indices while flat and sells at the listed ones while holding. */
export function indexStrategy(
  name: string,
  buys: readonly number[],
  sells: readonly number[],
  requiredIndicators: readonly string[] = [],
): Strategy {
  return defineStrategy({
    name,
    description: `${name} entry`,
    category: 'momentum',
    requiredIndicators,
    entry: (view) => buys.includes(view.index),
    exit: (view) => sells.includes(view.index),
  });
}
