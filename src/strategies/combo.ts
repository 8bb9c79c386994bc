import { crossedAbove, crossedBelow, num, withDefaults } from './helpers.js';
import { type Strategy, defineStrategy } from './types.js';

export function trendMomentumCombo(params: Partial<{ adxThreshold: number }> = {}): Strategy {
  const p = withDefaults({ adxThreshold: 25 }, params);
  return defineStrategy({
    name: 'trend_momentum_combo',
    description: 'Buy when a strong ADX trend, +DI lead and RSI above 50 line up',
    category: 'combination',
    requiredIndicators: ['adx_14', 'pdi_14', 'mdi_14', 'rsi_14'],
    entry: (v) =>
      num(v, 'adx_14') > p.adxThreshold &&
      num(v, 'pdi_14') > num(v, 'mdi_14') &&
      num(v, 'rsi_14') > 50,
    exit: (v) =>
      num(v, 'adx_14') > p.adxThreshold &&
      num(v, 'pdi_14') < num(v, 'mdi_14') &&
      num(v, 'rsi_14') < 50,
  });
}

export function maMacdCombo(): Strategy {
  return defineStrategy({
    name: 'ma_macd_combo',
    description: 'Buy when price is above SMA 20 and MACD is above its signal line',
    category: 'combination',
    requiredIndicators: ['sma_20', 'macd', 'macd_signal'],
    entry: (v) => v.close > num(v, 'sma_20') && num(v, 'macd') > num(v, 'macd_signal'),
    exit: (v) => v.close < num(v, 'sma_20') && num(v, 'macd') < num(v, 'macd_signal'),
  });
}

export function bbRsiCombo(params: Partial<{ rsiOversold: number }> = {}): Strategy {
  const p = withDefaults({ rsiOversold: 30 }, params);
  return defineStrategy({
    name: 'bb_rsi_combo',
    description: `Buy at the lower band with RSI below ${p.rsiOversold}, sell above the middle band`,
    category: 'combination',
    requiredIndicators: ['bb_lower', 'bb_middle', 'rsi_14'],
    entry: (v) => v.close <= num(v, 'bb_lower') * 1.01 && num(v, 'rsi_14') < p.rsiOversold,
    exit: (v) => v.close > num(v, 'bb_middle') * 1.02,
  });
}

export interface ConfluenceParams {
  rsiBuy: number;
  rsiSell: number;
  adxThreshold: number;
}

export function rsiMacdConfluence(params: Partial<ConfluenceParams> = {}): Strategy {
  const p = withDefaults({ rsiBuy: 35, rsiSell: 65, adxThreshold: 20 }, params);
  return defineStrategy({
    name: 'rsi_macd_confluence',
    description: 'Buy on a bullish MACD cross with low RSI in a trending market',
    category: 'combination',
    requiredIndicators: ['rsi_14', 'macd', 'macd_signal', 'adx_14'],
    entry: (v) =>
      num(v, 'rsi_14') < p.rsiBuy &&
      crossedAbove(v, 'macd', 'macd_signal') &&
      num(v, 'adx_14') > p.adxThreshold,
    exit: (v) => num(v, 'rsi_14') > p.rsiSell && crossedBelow(v, 'macd', 'macd_signal'),
  });
}

export interface MultiIndicatorParams {
  rsiBuy: number;
  rsiSell: number;
  adxThreshold: number;
}

export function multiIndicator(params: Partial<MultiIndicatorParams> = {}): Strategy {
  const p = withDefaults({ rsiBuy: 40, rsiSell: 60, adxThreshold: 20 }, params);
  return defineStrategy({
    name: 'multi_indicator',
    description: 'Buy when RSI, MACD and ADX all confirm, sell when RSI or MACD turns',
    category: 'combination',
    requiredIndicators: ['rsi_14', 'macd', 'macd_signal', 'adx_14'],
    entry: (v) =>
      num(v, 'rsi_14') < p.rsiBuy &&
      num(v, 'macd') > num(v, 'macd_signal') &&
      num(v, 'adx_14') > p.adxThreshold,
    exit: (v) => num(v, 'rsi_14') > p.rsiSell || num(v, 'macd') < num(v, 'macd_signal'),
  });
}
