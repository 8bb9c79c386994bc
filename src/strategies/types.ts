import type { BacktestStrategy, BarView, Position, Signal } from '../backtest/types.js';

export type StrategyCategory = 'momentum' | 'trend' | 'volatility' | 'volume' | 'combination';

export const STRATEGY_CATEGORIES: readonly StrategyCategory[] = [
  'momentum',
  'trend',
  'volatility',
  'volume',
  'combination',
];

export interface Strategy extends BacktestStrategy {
  readonly description: string;
  readonly category: StrategyCategory;
  readonly requiredIndicators: readonly string[];
}

export interface StrategyDefinition {
  name: string;
  description: string;
  category: StrategyCategory;
  requiredIndicators: readonly string[];
  minimumBars?: number;
  /** Entry condition, consulted only while flat. */
  entry: (view: BarView) => boolean;
  /** Exit condition, consulted only while holding. */
  exit: (view: BarView, position: Position) => boolean;
}

/**
 * Turns entry/exit predicates into a strategy that only emits BUY while flat
 * and SELL while holding.
 */
export function defineStrategy(def: StrategyDefinition): Strategy {
  const evaluate = (view: BarView, position: Position | null): Signal => {
    if (position === null) return def.entry(view) ? 'BUY' : 'HOLD';
    return def.exit(view, position) ? 'SELL' : 'HOLD';
  };

  return Object.freeze({
    name: def.name,
    description: def.description,
    category: def.category,
    requiredIndicators: Object.freeze([...def.requiredIndicators]),
    minimumBars: def.minimumBars,
    evaluate,
  });
}
