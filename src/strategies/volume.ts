import type { BarView } from '../backtest/types.js';
import { crossedAbove, crossedBelow, num, withDefaults } from './helpers.js';
import { type Strategy, defineStrategy } from './types.js';

export function obvTrend(): Strategy {
  return defineStrategy({
    name: 'obv_trend',
    description: 'Buy when OBV is above its 20-bar average on an up close, sell on the opposite',
    category: 'volume',
    requiredIndicators: ['obv', 'obv_sma_20'],
    entry: (v) => {
      const prev = v.previous();
      return prev !== undefined && num(v, 'obv') > num(v, 'obv_sma_20') && v.close > prev.close;
    },
    exit: (v) => {
      const prev = v.previous();
      return prev !== undefined && num(v, 'obv') < num(v, 'obv_sma_20') && v.close < prev.close;
    },
  });
}

export function volumeSurge(params: Partial<{ multiplier: number }> = {}): Strategy {
  const p = withDefaults({ multiplier: 2 }, params);
  return defineStrategy({
    name: 'volume_surge',
    description: `Buy when volume exceeds ${p.multiplier}x its average on an up close, sell on a surge down`,
    category: 'volume',
    requiredIndicators: ['volume_sma_20'],
    entry: (v) => {
      const prev = v.previous();
      return (
        prev !== undefined && v.volume > p.multiplier * num(v, 'volume_sma_20') && v.close > prev.close
      );
    },
    exit: (v) => {
      const prev = v.previous();
      return (
        prev !== undefined && v.volume > p.multiplier * num(v, 'volume_sma_20') && v.close < prev.close
      );
    },
  });
}

export function mfiFlow(params: Partial<{ oversold: number; overbought: number }> = {}): Strategy {
  const p = withDefaults({ oversold: 20, overbought: 80 }, params);
  return defineStrategy({
    name: 'mfi_flow',
    description: `Buy when MFI crosses above ${p.oversold}, sell when it falls back below ${p.overbought}`,
    category: 'volume',
    requiredIndicators: ['mfi_14'],
    entry: (v) => crossedAbove(v, 'mfi_14', p.oversold),
    exit: (v) => crossedBelow(v, 'mfi_14', p.overbought),
  });
}

export interface MomentumBreakoutParams {
  lookback: number;
  volumeRatio: number;
  adxThreshold: number;
  rsiExit: number;
}

/** Close above the prior `lookback`-bar high on heavy volume in a trending market. */
export function momentumBreakout(params: Partial<MomentumBreakoutParams> = {}): Strategy {
  const p = withDefaults({ lookback: 20, volumeRatio: 1.5, adxThreshold: 25, rsiExit: 30 }, params);
  return defineStrategy({
    name: 'momentum_breakout',
    description: `Buy on a ${p.lookback}-bar high breakout with volume and trend, sell on a breakdown`,
    category: 'volume',
    requiredIndicators: ['volume_ratio', 'adx_14', 'rsi_14'],
    minimumBars: p.lookback + 1,
    entry: (v) => {
      const highs = v.window('high', p.lookback);
      if (!highs) return false;
      return (
        v.close > Math.max(...highs) &&
        num(v, 'volume_ratio') > p.volumeRatio &&
        num(v, 'adx_14') > p.adxThreshold
      );
    },
    exit: (v) => {
      const lows = v.window('low', p.lookback);
      if (lows && v.close < Math.min(...lows)) return true;
      return num(v, 'rsi_14') < p.rsiExit;
    },
  });
}

export interface BreakoutConfirmationParams {
  /** Bars whose highs set the resistance level. */
  window: number;
  /** Consecutive closes, ending at the current bar, that must hold above the level. */
  confirmBars: number;
  /** Minimum distance of the current close above the level, as a fraction. */
  minPct: number;
  volumeMultiplier: number;
}

/** Highest high of the `window` bars before the first confirming bar. */
function resistanceAt(v: BarView, window: number, confirmBars: number): number | undefined {
  const first = confirmBars > 1 ? v.previous(confirmBars - 1) : v;
  const highs = first?.window('high', window);
  return highs ? Math.max(...highs) : undefined;
}

/**
 * Buys a resistance break only once it is confirmed: every close since the
 * break is above the level, the last by at least `minPct`, and volume is
 * above its average. Sells when a close falls back below the broken level.
 */
export function breakoutConfirmation(params: Partial<BreakoutConfirmationParams> = {}): Strategy {
  const p = withDefaults({ window: 20, confirmBars: 2, minPct: 0.01, volumeMultiplier: 1.2 }, params);
  return defineStrategy({
    name: 'breakout_confirmation',
    description: `Buy a ${p.window}-bar resistance break held for ${p.confirmBars} closes on volume, sell back below it`,
    category: 'volume',
    requiredIndicators: ['volume_sma_20'],
    minimumBars: p.window + p.confirmBars,
    entry: (v) => {
      const level = resistanceAt(v, p.window, p.confirmBars);
      const earlier = p.confirmBars > 1 ? v.window('close', p.confirmBars - 1) : [];
      const before = v.previous(p.confirmBars);
      if (level === undefined || !earlier || !before) return false;

      return (
        before.close <= level &&
        [...earlier, v.close].every((close) => close > level) &&
        (v.close - level) / level >= p.minPct &&
        v.volume >= p.volumeMultiplier * num(v, 'volume_sma_20')
      );
    },
    exit: (v, position) => {
      const offset = v.index - position.entryIndex;
      const entryView = offset >= 1 ? v.previous(offset) : undefined;
      const level = entryView ? resistanceAt(entryView, p.window, p.confirmBars) : undefined;
      return level !== undefined && v.close < level;
    },
  });
}
