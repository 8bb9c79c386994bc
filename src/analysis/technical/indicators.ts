import {
  ADX,
  ATR,
  BollingerBands,
  CCI,
  EMA,
  MACD,
  MFI,
  OBV,
  ROC,
  RSI,
  SMA,
  Stochastic,
  WilliamsR,
} from 'technicalindicators';
import type { Bar, Candle } from '../../backtest/types.js';

/** One value per candle; undefined during an indicator's warm-up. */
export type Column = (number | undefined)[];

export interface IndicatorSettings {
  rsiPeriod: number;
  macdFast: number;
  macdSlow: number;
  macdSignal: number;
  smaPeriods: readonly number[];
  emaPeriods: readonly number[];
  adxPeriod: number;
  atrPeriod: number;
  bbPeriod: number;
  bbStdDev: number;
  keltnerPeriod: number;
  keltnerAtrPeriod: number;
  keltnerMultiplier: number;
  donchianPeriod: number;
  stochPeriod: number;
  stochSignal: number;
  cciPeriod: number;
  willrPeriod: number;
  rocPeriod: number;
  mfiPeriod: number;
  volumePeriod: number;
}

export const DEFAULT_INDICATOR_SETTINGS: Readonly<IndicatorSettings> = Object.freeze({
  rsiPeriod: 14,
  macdFast: 12,
  macdSlow: 26,
  macdSignal: 9,
  smaPeriods: [20, 50, 200],
  emaPeriods: [12, 26],
  adxPeriod: 14,
  atrPeriod: 14,
  bbPeriod: 20,
  bbStdDev: 2,
  keltnerPeriod: 20,
  keltnerAtrPeriod: 10,
  keltnerMultiplier: 2,
  donchianPeriod: 20,
  stochPeriod: 14,
  stochSignal: 3,
  cciPeriod: 14,
  willrPeriod: 14,
  rocPeriod: 10,
  mfiPeriod: 14,
  volumePeriod: 20,
});

/**
 * Pads a library output (which starts at the first computable bar) on the
 * left so that output[i] lines up with candle i.
 */
export function alignRight<T>(values: readonly T[], length: number): (T | undefined)[] {
  const offset = length - values.length;
  const out: (T | undefined)[] = new Array<T | undefined>(length).fill(undefined);
  for (let i = 0; i < values.length; i++) {
    if (offset + i >= 0) out[offset + i] = values[i];
  }
  return out;
}

function finite(n: number | undefined): number | undefined {
  return n != null && Number.isFinite(n) ? n : undefined;
}

function smaOf(column: Column, period: number): Column {
  const out: Column = new Array<number | undefined>(column.length).fill(undefined);
  for (let i = period - 1; i < column.length; i++) {
    let sum = 0;
    let ok = true;
    for (let j = i - period + 1; j <= i; j++) {
      const v = column[j];
      if (v === undefined) {
        ok = false;
        break;
      }
      sum += v;
    }
    if (ok) out[i] = sum / period;
  }
  return out;
}

// ─── Momentum ────────────────────────────────────────────

function momentumColumns(
  candles: readonly Candle[],
  s: IndicatorSettings,
  into: Map<string, Column>,
): void {
  const n = candles.length;
  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);

  into.set(`rsi_${s.rsiPeriod}`, alignRight(RSI.calculate({ values: closes, period: s.rsiPeriod }), n));

  const macd = alignRight(
    MACD.calculate({
      values: closes,
      fastPeriod: s.macdFast,
      slowPeriod: s.macdSlow,
      signalPeriod: s.macdSignal,
      SimpleMAOscillator: false,
      SimpleMASignal: false,
    }),
    n,
  );
  into.set('macd', macd.map((m) => finite(m?.MACD)));
  into.set('macd_signal', macd.map((m) => finite(m?.signal)));
  into.set('macd_hist', macd.map((m) => finite(m?.histogram)));

  const stoch = alignRight(
    Stochastic.calculate({
      high: highs,
      low: lows,
      close: closes,
      period: s.stochPeriod,
      signalPeriod: s.stochSignal,
    }),
    n,
  );
  into.set('stoch_k', stoch.map((v) => finite(v?.k)));
  into.set('stoch_d', stoch.map((v) => finite(v?.d)));

  into.set(
    `cci_${s.cciPeriod}`,
    alignRight(CCI.calculate({ high: highs, low: lows, close: closes, period: s.cciPeriod }), n),
  );
  into.set(
    `willr_${s.willrPeriod}`,
    alignRight(
      WilliamsR.calculate({ high: highs, low: lows, close: closes, period: s.willrPeriod }),
      n,
    ),
  );
  into.set(`roc_${s.rocPeriod}`, alignRight(ROC.calculate({ values: closes, period: s.rocPeriod }), n));
}

// ─── Trend ───────────────────────────────────────────────

function trendColumns(
  candles: readonly Candle[],
  s: IndicatorSettings,
  into: Map<string, Column>,
): void {
  const n = candles.length;
  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);

  for (const period of s.smaPeriods) {
    into.set(`sma_${period}`, alignRight(SMA.calculate({ values: closes, period }), n));
  }
  for (const period of s.emaPeriods) {
    into.set(`ema_${period}`, alignRight(EMA.calculate({ values: closes, period }), n));
  }

  const adx = alignRight(
    ADX.calculate({ high: highs, low: lows, close: closes, period: s.adxPeriod }),
    n,
  );
  into.set(`adx_${s.adxPeriod}`, adx.map((v) => finite(v?.adx)));
  into.set(`pdi_${s.adxPeriod}`, adx.map((v) => finite(v?.pdi)));
  into.set(`mdi_${s.adxPeriod}`, adx.map((v) => finite(v?.mdi)));
}

// ─── Volatility ──────────────────────────────────────────

function volatilityColumns(
  candles: readonly Candle[],
  s: IndicatorSettings,
  into: Map<string, Column>,
): void {
  const n = candles.length;
  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);

  into.set(
    `atr_${s.atrPeriod}`,
    alignRight(ATR.calculate({ high: highs, low: lows, close: closes, period: s.atrPeriod }), n),
  );

  const bb = alignRight(
    BollingerBands.calculate({ values: closes, period: s.bbPeriod, stdDev: s.bbStdDev }),
    n,
  );
  into.set('bb_lower', bb.map((b) => finite(b?.lower)));
  into.set('bb_middle', bb.map((b) => finite(b?.middle)));
  into.set('bb_upper', bb.map((b) => finite(b?.upper)));
  into.set(
    'bb_width',
    bb.map((b) => (b && b.middle !== 0 ? finite((b.upper - b.lower) / b.middle) : undefined)),
  );

  // Keltner: EMA of close ± multiplier × ATR
  const kcMid = alignRight(EMA.calculate({ values: closes, period: s.keltnerPeriod }), n);
  const kcAtr = alignRight(
    ATR.calculate({ high: highs, low: lows, close: closes, period: s.keltnerAtrPeriod }),
    n,
  );
  const kcLower: Column = [];
  const kcUpper: Column = [];
  for (let i = 0; i < n; i++) {
    const mid = kcMid[i];
    const atr = kcAtr[i];
    kcLower.push(mid !== undefined && atr !== undefined ? mid - s.keltnerMultiplier * atr : undefined);
    kcUpper.push(mid !== undefined && atr !== undefined ? mid + s.keltnerMultiplier * atr : undefined);
  }
  into.set('kc_lower', kcLower);
  into.set('kc_middle', kcMid);
  into.set('kc_upper', kcUpper);

  // Donchian channel over the last `donchianPeriod` bars including the current one
  const dcLower: Column = [];
  const dcUpper: Column = [];
  for (let i = 0; i < n; i++) {
    if (i < s.donchianPeriod - 1) {
      dcLower.push(undefined);
      dcUpper.push(undefined);
      continue;
    }
    const from = i - s.donchianPeriod + 1;
    dcLower.push(Math.min(...lows.slice(from, i + 1)));
    dcUpper.push(Math.max(...highs.slice(from, i + 1)));
  }
  into.set('dc_lower', dcLower);
  into.set('dc_upper', dcUpper);
}

// ─── Volume ──────────────────────────────────────────────

function volumeColumns(
  candles: readonly Candle[],
  s: IndicatorSettings,
  into: Map<string, Column>,
): void {
  const n = candles.length;
  const closes = candles.map((c) => c.close);
  const highs = candles.map((c) => c.high);
  const lows = candles.map((c) => c.low);
  const volumes = candles.map((c) => c.volume);

  into.set(
    `mfi_${s.mfiPeriod}`,
    alignRight(
      MFI.calculate({ high: highs, low: lows, close: closes, volume: volumes, period: s.mfiPeriod }),
      n,
    ),
  );

  const obv = alignRight(OBV.calculate({ close: closes, volume: volumes }), n);
  into.set('obv', obv);
  into.set(`obv_sma_${s.volumePeriod}`, smaOf(obv, s.volumePeriod));

  const volumeSma = smaOf(volumes, s.volumePeriod);
  into.set(`volume_sma_${s.volumePeriod}`, volumeSma);
  into.set(
    'volume_ratio',
    volumes.map((v, i) => {
      const avg = volumeSma[i];
      return avg !== undefined && avg > 0 ? v / avg : undefined;
    }),
  );
}

// ─── Assembly ────────────────────────────────────────────

/** Every indicator column for the candle series, keyed by column name. */
export function computeColumns(
  candles: readonly Candle[],
  settings: Partial<IndicatorSettings> = {},
): Map<string, Column> {
  const s: IndicatorSettings = { ...DEFAULT_INDICATOR_SETTINGS, ...settings };
  const columns = new Map<string, Column>();
  if (candles.length === 0) return columns;

  momentumColumns(candles, s, columns);
  trendColumns(candles, s, columns);
  volatilityColumns(candles, s, columns);
  volumeColumns(candles, s, columns);
  return columns;
}

/**
 * Attaches indicator columns to each candle. Warm-up positions are left out
 * of the bar's indicator record rather than set to a placeholder.
 */
export function computeIndicators(
  candles: readonly Candle[],
  settings: Partial<IndicatorSettings> = {},
): Bar[] {
  const columns = computeColumns(candles, settings);

  return candles.map((candle, i) => {
    const indicators: Record<string, number> = {};
    for (const [name, column] of columns) {
      const v = finite(column[i]);
      if (v !== undefined) indicators[name] = v;
    }
    return {
      date: candle.date,
      open: candle.open,
      high: candle.high,
      low: candle.low,
      close: candle.close,
      volume: candle.volume,
      indicators: Object.freeze(indicators),
    };
  });
}
