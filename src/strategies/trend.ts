import type { BarView } from '../backtest/types.js';
import { crossedAbove, crossedBelow, num, withDefaults } from './helpers.js';
import { type Strategy, defineStrategy } from './types.js';

export function smaGoldenCross(): Strategy {
  return defineStrategy({
    name: 'sma_golden_cross',
    description: 'Buy when SMA 50 crosses above SMA 200, sell on the death cross',
    category: 'trend',
    requiredIndicators: ['sma_50', 'sma_200'],
    entry: (v) => crossedAbove(v, 'sma_50', 'sma_200'),
    exit: (v) => crossedBelow(v, 'sma_50', 'sma_200'),
  });
}

export function emaFastCross(): Strategy {
  return defineStrategy({
    name: 'ema_fast_cross',
    description: 'Buy when EMA 12 crosses above EMA 26, sell on the cross below',
    category: 'trend',
    requiredIndicators: ['ema_12', 'ema_26'],
    entry: (v) => crossedAbove(v, 'ema_12', 'ema_26'),
    exit: (v) => crossedBelow(v, 'ema_12', 'ema_26'),
  });
}

export function smaTripleCross(): Strategy {
  return defineStrategy({
    name: 'sma_triple_cross',
    description: 'Buy when SMA 20 > 50 > 200, sell when the order fully inverts',
    category: 'trend',
    requiredIndicators: ['sma_20', 'sma_50', 'sma_200'],
    entry: (v) => num(v, 'sma_20') > num(v, 'sma_50') && num(v, 'sma_50') > num(v, 'sma_200'),
    exit: (v) => num(v, 'sma_20') < num(v, 'sma_50') && num(v, 'sma_50') < num(v, 'sma_200'),
  });
}

export function priceAboveSma(): Strategy {
  return defineStrategy({
    name: 'price_above_sma',
    description: 'Buy when price crosses above SMA 20, sell when it crosses back below',
    category: 'trend',
    requiredIndicators: ['sma_20'],
    entry: (v) => crossedAbove(v, 'close', 'sma_20'),
    exit: (v) => crossedBelow(v, 'close', 'sma_20'),
  });
}

// ─── ADX ─────────────────────────────────────────────────

export function adxStrongTrend(params: Partial<{ adxThreshold: number }> = {}): Strategy {
  const p = withDefaults({ adxThreshold: 25 }, params);
  return defineStrategy({
    name: 'adx_strong_trend',
    description: `Buy when ADX > ${p.adxThreshold} with +DI above -DI, sell when -DI leads`,
    category: 'trend',
    requiredIndicators: ['adx_14', 'pdi_14', 'mdi_14'],
    entry: (v) => num(v, 'adx_14') > p.adxThreshold && num(v, 'pdi_14') > num(v, 'mdi_14'),
    exit: (v) => num(v, 'adx_14') > p.adxThreshold && num(v, 'pdi_14') < num(v, 'mdi_14'),
  });
}

export function adxTrendStart(params: Partial<{ adxThreshold: number }> = {}): Strategy {
  const p = withDefaults({ adxThreshold: 20 }, params);
  return defineStrategy({
    name: 'adx_trend_start',
    description: `Buy when ADX crosses above ${p.adxThreshold} with +DI leading, sell on a bearish trend start`,
    category: 'trend',
    requiredIndicators: ['adx_14', 'pdi_14', 'mdi_14'],
    entry: (v) => crossedAbove(v, 'adx_14', p.adxThreshold) && num(v, 'pdi_14') > num(v, 'mdi_14'),
    exit: (v) => crossedAbove(v, 'adx_14', p.adxThreshold) && num(v, 'pdi_14') < num(v, 'mdi_14'),
  });
}

export interface TrendFollowingParams {
  rsiFloor: number;
  rsiCeiling: number;
  adxThreshold: number;
  rsiExit: number;
}

export function trendFollowing(params: Partial<TrendFollowingParams> = {}): Strategy {
  const p = withDefaults({ rsiFloor: 40, rsiCeiling: 70, adxThreshold: 25, rsiExit: 35 }, params);
  return defineStrategy({
    name: 'trend_following',
    description: 'Buy when price > SMA 20 > SMA 50 > SMA 200 with moderate RSI and a strong ADX',
    category: 'trend',
    requiredIndicators: ['sma_20', 'sma_50', 'sma_200', 'rsi_14', 'adx_14'],
    entry: (v) => {
      const rsi = num(v, 'rsi_14');
      return (
        v.close > num(v, 'sma_20') &&
        num(v, 'sma_20') > num(v, 'sma_50') &&
        num(v, 'sma_50') > num(v, 'sma_200') &&
        rsi > p.rsiFloor &&
        rsi < p.rsiCeiling &&
        num(v, 'adx_14') > p.adxThreshold
      );
    },
    exit: (v) => v.close < num(v, 'sma_20') || num(v, 'rsi_14') < p.rsiExit,
  });
}

// ─── Price structure ─────────────────────────────────────

export interface SwingPivot {
  /** Position in the arrays the pivot was found in. */
  index: number;
  kind: 'high' | 'low';
  price: number;
}

/**
 * Bars whose high (low) is strictly above (below) every high (low) within
 * `swingLength` bars on each side, in order. A bar that is both lists its low first.
 */
export function findSwingPivots(
  highs: readonly number[],
  lows: readonly number[],
  swingLength: number,
): SwingPivot[] {
  const pivots: SwingPivot[] = [];
  for (let i = swingLength; i < highs.length - swingLength; i++) {
    let isHigh = true;
    let isLow = true;
    for (let k = i - swingLength; k <= i + swingLength; k++) {
      if (k === i) continue;
      if (highs[k] >= highs[i]) isHigh = false;
      if (lows[k] <= lows[i]) isLow = false;
    }
    if (isLow) pivots.push({ index: i, kind: 'low', price: lows[i] });
    if (isHigh) pivots.push({ index: i, kind: 'high', price: highs[i] });
  }
  return pivots;
}

export interface AbcSetup {
  origin: SwingPivot;
  a: SwingPivot;
  b: SwingPivot;
  /** (A - B) / (A - 0) */
  retracement: number;
}

export interface AbcSearch {
  swingLength: number;
  minRetrace: number;
  maxRetrace: number;
}

/**
 * The most recent bullish 0-A-B structure: a swing low 0, the next swing high
 * A, then a higher swing low B that retraces between `minRetrace` and
 * `maxRetrace` of the 0-A move and has not been undercut since.
 */
export function findBullishAbc(
  highs: readonly number[],
  lows: readonly number[],
  search: AbcSearch,
): AbcSetup | null {
  const pivots = findSwingPivots(highs, lows, search.swingLength);

  for (let bi = pivots.length - 1; bi >= 0; bi--) {
    const b = pivots[bi];
    if (b.kind !== 'low') continue;
    if (Math.min(...lows.slice(b.index + 1)) < b.price) continue;

    let ai = bi - 1;
    while (ai >= 0 && (pivots[ai].kind !== 'high' || pivots[ai].index >= b.index)) ai--;
    if (ai < 0) continue;
    const a = pivots[ai];

    let oi = ai - 1;
    while (oi >= 0 && (pivots[oi].kind !== 'low' || pivots[oi].index >= a.index)) oi--;
    if (oi < 0) continue;
    const origin = pivots[oi];

    if (b.price <= origin.price || a.price <= b.price) continue;
    const retracement = (a.price - b.price) / (a.price - origin.price);
    if (retracement >= search.minRetrace && retracement <= search.maxRetrace) {
      return { origin, a, b, retracement };
    }
  }
  return null;
}

export interface AbcPatternParams extends AbcSearch {
  lookback: number;
  /** Exit target: B plus this multiple of the 0-A move. */
  extension: number;
  /** Stop this many ATRs below B. */
  stopAtr: number;
}

/**
 * Enters on the C leg of a bullish ABC: the first close above A after a valid
 * B has formed. The setup is found again at the entry bar to place the exits,
 * so the stop below B and the extension target stay fixed for the trade.
 */
export function abcPattern(params: Partial<AbcPatternParams> = {}): Strategy {
  const p = withDefaults(
    {
      lookback: 60,
      swingLength: 5,
      minRetrace: 0.382,
      maxRetrace: 0.786,
      extension: 1.618,
      stopAtr: 0.5,
    },
    params,
  );

  const setupAt = (v: BarView): AbcSetup | null => {
    const highs = v.window('high', p.lookback);
    const lows = v.window('low', p.lookback);
    if (!highs || !lows) return null;
    return findBullishAbc(highs, lows, p);
  };

  return defineStrategy({
    name: 'abc_pattern',
    description:
      'Buy when price breaks above A of a bullish 0-A-B retracement, sell below B or at the C target',
    category: 'trend',
    requiredIndicators: ['atr_14'],
    minimumBars: p.lookback + 1,
    entry: (v) => {
      const prev = v.previous();
      const setup = setupAt(v);
      return (
        prev !== undefined && setup !== null && v.close > setup.a.price && prev.close <= setup.a.price
      );
    },
    exit: (v, position) => {
      const offset = v.index - position.entryIndex;
      const entryView = offset >= 1 ? v.previous(offset) : undefined;
      const setup = entryView ? setupAt(entryView) : null;
      if (!entryView || !setup) return false;

      const stop = setup.b.price - p.stopAtr * num(entryView, 'atr_14');
      const target = setup.b.price + p.extension * (setup.a.price - setup.origin.price);
      return v.close < stop || v.close >= target;
    },
  });
}
