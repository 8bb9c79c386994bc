import { crossedAbove, crossedBelow, num, withDefaults } from './helpers.js';
import { type Strategy, defineStrategy } from './types.js';

// ─── Bollinger Bands ─────────────────────────────────────

export interface BollingerBounceParams {
  /** Close within this fraction above the lower band counts as a touch. */
  touchTolerance: number;
  /** Exit once the close is this fraction above the middle band. */
  exitPremium: number;
}

export function bbBounce(params: Partial<BollingerBounceParams> = {}): Strategy {
  const p = withDefaults({ touchTolerance: 0.01, exitPremium: 0.02 }, params);
  return defineStrategy({
    name: 'bb_bounce',
    description: 'Buy when price touches the lower band and closes up, sell above the middle band',
    category: 'volatility',
    requiredIndicators: ['bb_lower', 'bb_middle'],
    entry: (v) => {
      const prev = v.previous();
      return (
        prev !== undefined &&
        v.close <= num(v, 'bb_lower') * (1 + p.touchTolerance) &&
        v.close > prev.close
      );
    },
    exit: (v) => v.close > num(v, 'bb_middle') * (1 + p.exitPremium),
  });
}

export function bbWidthExpansion(): Strategy {
  return defineStrategy({
    name: 'bb_width_expansion',
    description: 'Buy when band width expands with a rising close, sell below the middle band',
    category: 'volatility',
    requiredIndicators: ['bb_width', 'bb_middle'],
    entry: (v) => {
      const prev = v.previous();
      return (
        prev !== undefined && num(v, 'bb_width') > num(prev, 'bb_width') && v.close > prev.close
      );
    },
    exit: (v) => v.close < num(v, 'bb_middle'),
  });
}

export interface BollingerReversionParams {
  rsiOversold: number;
  rsiOverbought: number;
}

export function bbMeanReversion(params: Partial<BollingerReversionParams> = {}): Strategy {
  const p = withDefaults({ rsiOversold: 40, rsiOverbought: 60 }, params);
  return defineStrategy({
    name: 'bb_mean_reversion',
    description: 'Buy at the lower band with soft RSI, sell at the upper band with firm RSI',
    category: 'volatility',
    requiredIndicators: ['bb_lower', 'bb_upper', 'rsi_14'],
    entry: (v) => v.close <= num(v, 'bb_lower') * 1.01 && num(v, 'rsi_14') < p.rsiOversold,
    exit: (v) => v.close >= num(v, 'bb_upper') * 0.99 && num(v, 'rsi_14') > p.rsiOverbought,
  });
}

// ─── Channels ────────────────────────────────────────────

export function keltnerBreakout(): Strategy {
  return defineStrategy({
    name: 'keltner_breakout',
    description: 'Buy when price breaks above the upper Keltner channel, sell below its middle',
    category: 'volatility',
    requiredIndicators: ['kc_upper', 'kc_middle'],
    entry: (v) => crossedAbove(v, 'close', 'kc_upper'),
    exit: (v) => crossedBelow(v, 'close', 'kc_middle'),
  });
}

export interface AtrBreakoutParams {
  lookback: number;
  multiplier: number;
}

/**
 * Enters when the close has risen more than `multiplier` ATRs above the lowest
 * close of the previous `lookback` bars; exits on the mirror-image drop from
 * the highest close.
 */
export function atrVolatilityBreakout(params: Partial<AtrBreakoutParams> = {}): Strategy {
  const p = withDefaults({ lookback: 10, multiplier: 2 }, params);
  return defineStrategy({
    name: 'atr_volatility_breakout',
    description: `Buy when price moves more than ${p.multiplier}x ATR above its ${p.lookback}-bar low`,
    category: 'volatility',
    requiredIndicators: ['atr_14'],
    minimumBars: p.lookback + 1,
    entry: (v) => {
      const closes = v.window('close', p.lookback);
      if (!closes) return false;
      return v.close - Math.min(...closes) > p.multiplier * num(v, 'atr_14');
    },
    exit: (v) => {
      const closes = v.window('close', p.lookback);
      if (!closes) return false;
      return Math.max(...closes) - v.close > p.multiplier * num(v, 'atr_14');
    },
  });
}
