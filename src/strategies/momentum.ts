import { change, crossedAbove, crossedBelow, num, withDefaults } from './helpers.js';
import { type Strategy, defineStrategy } from './types.js';

// ─── RSI ─────────────────────────────────────────────────

export interface RsiBandParams {
  oversold: number;
  overbought: number;
}

export function rsiOversoldBounce(params: Partial<RsiBandParams> = {}): Strategy {
  const p = withDefaults({ oversold: 30, overbought: 70 }, params);
  return defineStrategy({
    name: 'rsi_oversold_bounce',
    description: `Buy when RSI is below ${p.oversold}, sell above ${p.overbought}`,
    category: 'momentum',
    requiredIndicators: ['rsi_14'],
    entry: (v) => num(v, 'rsi_14') < p.oversold,
    exit: (v) => num(v, 'rsi_14') > p.overbought,
  });
}

export function rsiMomentum(params: Partial<{ threshold: number }> = {}): Strategy {
  const p = withDefaults({ threshold: 50 }, params);
  return defineStrategy({
    name: 'rsi_momentum',
    description: `Buy when RSI is above ${p.threshold} and rising, sell when it drops below`,
    category: 'momentum',
    requiredIndicators: ['rsi_14'],
    entry: (v) => num(v, 'rsi_14') > p.threshold && (change(v, 'rsi_14') ?? 0) > 0,
    exit: (v) => num(v, 'rsi_14') < p.threshold,
  });
}

export function rsiExtreme(params: Partial<RsiBandParams> = {}): Strategy {
  const p = withDefaults({ oversold: 20, overbought: 80 }, params);
  return defineStrategy({
    name: 'rsi_extreme',
    description: `Contrarian: buy RSI below ${p.oversold}, sell above ${p.overbought}`,
    category: 'momentum',
    requiredIndicators: ['rsi_14'],
    entry: (v) => num(v, 'rsi_14') < p.oversold,
    exit: (v) => num(v, 'rsi_14') > p.overbought,
  });
}

// ─── Stochastic ──────────────────────────────────────────

export function stochasticCrossover(params: Partial<RsiBandParams> = {}): Strategy {
  const p = withDefaults({ oversold: 20, overbought: 80 }, params);
  return defineStrategy({
    name: 'stochastic_crossover',
    description: `Buy when %K crosses above %D below ${p.oversold}, sell on the reverse cross above ${p.overbought}`,
    category: 'momentum',
    requiredIndicators: ['stoch_k', 'stoch_d'],
    entry: (v) =>
      crossedAbove(v, 'stoch_k', 'stoch_d') && num(v, 'stoch_k') < p.oversold,
    exit: (v) =>
      crossedBelow(v, 'stoch_k', 'stoch_d') && num(v, 'stoch_k') > p.overbought,
  });
}

// ─── MACD ────────────────────────────────────────────────

export function macdCrossover(): Strategy {
  return defineStrategy({
    name: 'macd_crossover',
    description: 'Buy when MACD crosses above its signal line, sell on the cross below',
    category: 'momentum',
    requiredIndicators: ['macd', 'macd_signal'],
    entry: (v) => crossedAbove(v, 'macd', 'macd_signal'),
    exit: (v) => crossedBelow(v, 'macd', 'macd_signal'),
  });
}

export function macdHistogram(): Strategy {
  return defineStrategy({
    name: 'macd_histogram',
    description: 'Buy when the histogram is positive and growing, sell when negative and falling',
    category: 'momentum',
    requiredIndicators: ['macd_hist'],
    entry: (v) => num(v, 'macd_hist') > 0 && (change(v, 'macd_hist') ?? 0) > 0,
    exit: (v) => num(v, 'macd_hist') < 0 && (change(v, 'macd_hist') ?? 0) < 0,
  });
}

export function macdZeroCross(): Strategy {
  return defineStrategy({
    name: 'macd_zero_cross',
    description: 'Buy when MACD crosses above zero, sell when it crosses below',
    category: 'momentum',
    requiredIndicators: ['macd'],
    entry: (v) => crossedAbove(v, 'macd', 0),
    exit: (v) => crossedBelow(v, 'macd', 0),
  });
}

// ─── Oscillators ─────────────────────────────────────────

export function cciReversal(params: Partial<RsiBandParams> = {}): Strategy {
  const p = withDefaults({ oversold: -100, overbought: 100 }, params);
  return defineStrategy({
    name: 'cci_reversal',
    description: `Buy when CCI is below ${p.oversold}, sell above ${p.overbought}`,
    category: 'momentum',
    requiredIndicators: ['cci_14'],
    entry: (v) => num(v, 'cci_14') < p.oversold,
    exit: (v) => num(v, 'cci_14') > p.overbought,
  });
}

export function williamsR(params: Partial<RsiBandParams> = {}): Strategy {
  const p = withDefaults({ oversold: -80, overbought: -20 }, params);
  return defineStrategy({
    name: 'williams_r',
    description: `Buy when Williams %R is below ${p.oversold}, sell above ${p.overbought}`,
    category: 'momentum',
    requiredIndicators: ['willr_14'],
    entry: (v) => num(v, 'willr_14') < p.oversold,
    exit: (v) => num(v, 'willr_14') > p.overbought,
  });
}

export function rocMomentum(): Strategy {
  return defineStrategy({
    name: 'roc_momentum',
    description: 'Buy when rate of change turns positive, sell when it turns negative',
    category: 'momentum',
    requiredIndicators: ['roc_10'],
    entry: (v) => crossedAbove(v, 'roc_10', 0),
    exit: (v) => crossedBelow(v, 'roc_10', 0),
  });
}
