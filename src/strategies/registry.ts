import { ConfigurationError } from '../backtest/errors.js';
import type { ParameterGrid, ParameterSet } from '../backtest/optimizer.js';
import { createLogger } from '../utils/logger.js';
import { bbRsiCombo, maMacdCombo, multiIndicator, rsiMacdConfluence, trendMomentumCombo } from './combo.js';
import {
  cciReversal,
  macdCrossover,
  macdHistogram,
  macdZeroCross,
  rocMomentum,
  rsiExtreme,
  rsiMomentum,
  rsiOversoldBounce,
  stochasticCrossover,
  williamsR,
} from './momentum.js';
import {
  abcPattern,
  adxStrongTrend,
  adxTrendStart,
  emaFastCross,
  priceAboveSma,
  smaGoldenCross,
  smaTripleCross,
  trendFollowing,
} from './trend.js';
import type { Strategy, StrategyCategory } from './types.js';
import { atrVolatilityBreakout, bbBounce, bbMeanReversion, bbWidthExpansion, keltnerBreakout } from './volatility.js';
import {
  breakoutConfirmation,
  mfiFlow,
  momentumBreakout,
  obvTrend,
  volumeSurge,
} from './volume.js';

const log = createLogger('strategy-registry');

export type StrategyFactory = (params?: ParameterSet) => Strategy;

/** Every built-in strategy, keyed by name, built from its parameters. */
export const BUILTIN_FACTORIES: Readonly<Record<string, StrategyFactory>> = Object.freeze({
  rsi_oversold_bounce: (p = {}) => rsiOversoldBounce(p),
  rsi_momentum: (p = {}) => rsiMomentum(p),
  rsi_extreme: (p = {}) => rsiExtreme(p),
  stochastic_crossover: (p = {}) => stochasticCrossover(p),
  macd_crossover: () => macdCrossover(),
  macd_histogram: () => macdHistogram(),
  macd_zero_cross: () => macdZeroCross(),
  cci_reversal: (p = {}) => cciReversal(p),
  williams_r: (p = {}) => williamsR(p),
  roc_momentum: () => rocMomentum(),
  sma_golden_cross: () => smaGoldenCross(),
  ema_fast_cross: () => emaFastCross(),
  sma_triple_cross: () => smaTripleCross(),
  price_above_sma: () => priceAboveSma(),
  adx_strong_trend: (p = {}) => adxStrongTrend(p),
  adx_trend_start: (p = {}) => adxTrendStart(p),
  trend_following: (p = {}) => trendFollowing(p),
  abc_pattern: (p = {}) => abcPattern(p),
  bb_bounce: (p = {}) => bbBounce(p),
  bb_width_expansion: () => bbWidthExpansion(),
  bb_mean_reversion: (p = {}) => bbMeanReversion(p),
  keltner_breakout: () => keltnerBreakout(),
  atr_volatility_breakout: (p = {}) => atrVolatilityBreakout(p),
  obv_trend: () => obvTrend(),
  volume_surge: (p = {}) => volumeSurge(p),
  mfi_flow: (p = {}) => mfiFlow(p),
  momentum_breakout: (p = {}) => momentumBreakout(p),
  breakout_confirmation: (p = {}) => breakoutConfirmation(p),
  trend_momentum_combo: (p = {}) => trendMomentumCombo(p),
  ma_macd_combo: () => maMacdCombo(),
  bb_rsi_combo: (p = {}) => bbRsiCombo(p),
  rsi_macd_confluence: (p = {}) => rsiMacdConfluence(p),
  multi_indicator: (p = {}) => multiIndicator(p),
});

/** Search spaces for the strategies worth tuning from the command line. */
export const DEFAULT_GRIDS: Readonly<Record<string, ParameterGrid>> = Object.freeze({
  rsi_oversold_bounce: { oversold: [25, 30, 35], overbought: [65, 70, 75] },
  rsi_extreme: { oversold: [15, 20, 25], overbought: [75, 80, 85] },
  rsi_momentum: { threshold: [45, 50, 55] },
  stochastic_crossover: { oversold: [15, 20, 25], overbought: [75, 80, 85] },
  cci_reversal: { oversold: [-150, -100], overbought: [100, 150] },
  williams_r: { oversold: [-90, -80], overbought: [-20, -10] },
  adx_strong_trend: { adxThreshold: [20, 25, 30] },
  volume_surge: { multiplier: [1.5, 2, 2.5, 3] },
  atr_volatility_breakout: { lookback: [5, 10, 20], multiplier: [1.5, 2, 2.5] },
  momentum_breakout: { lookback: [10, 20], volumeRatio: [1.2, 1.5, 2] },
  bb_mean_reversion: { rsiOversold: [30, 35, 40], rsiOverbought: [60, 65, 70] },
  abc_pattern: { swingLength: [3, 5, 10], minRetrace: [0.382, 0.5], maxRetrace: [0.618, 0.786] },
  breakout_confirmation: { window: [10, 20], confirmBars: [1, 2, 3], volumeMultiplier: [1, 1.2, 1.5] },
});

export class StrategyRegistry {
  private readonly strategies = new Map<string, Strategy>();

  register(strategy: Strategy): this {
    if (this.strategies.has(strategy.name)) {
      throw new ConfigurationError(`Strategy already registered: ${strategy.name}`, {
        name: strategy.name,
      });
    }
    this.strategies.set(strategy.name, strategy);
    return this;
  }

  get(name: string): Strategy {
    const strategy = this.strategies.get(name);
    if (!strategy) {
      throw new ConfigurationError(`Unknown strategy: ${name}`, {
        name,
        available: [...this.strategies.keys()],
      });
    }
    return strategy;
  }

  has(name: string): boolean {
    return this.strategies.has(name);
  }

  list(): Strategy[] {
    return [...this.strategies.values()];
  }

  names(): string[] {
    return [...this.strategies.keys()];
  }

  byCategory(category: StrategyCategory): Strategy[] {
    return this.list().filter((s) => s.category === category);
  }

  /** The named strategies in the order given, or every registered one. */
  select(names?: readonly string[]): Strategy[] {
    if (!names || names.length === 0) return this.list();
    return names.map((n) => this.get(n));
  }

  get size(): number {
    return this.strategies.size;
  }
}

export function createDefaultRegistry(): StrategyRegistry {
  const registry = new StrategyRegistry();
  for (const factory of Object.values(BUILTIN_FACTORIES)) {
    registry.register(factory());
  }
  log.debug({ count: registry.size }, 'Registered built-in strategies');
  return registry;
}

export function getStrategyFactory(name: string): StrategyFactory {
  const factory = BUILTIN_FACTORIES[name];
  if (!factory) {
    throw new ConfigurationError(`Unknown strategy: ${name}`, { name });
  }
  return factory;
}
