import {
  type IndicatorSettings,
  computeIndicators,
} from '../analysis/technical/indicators.js';
import type { CsvPriceStore } from '../data/price-store.js';
import type { YahooFinanceClient } from '../data/yahoo-finance.js';
import { createLogger } from '../utils/logger.js';
import type { Bar, Candle } from './types.js';

const log = createLogger('backtest-data-loader');

export interface LoadOptions {
  /** Fetch recent candles from Yahoo and merge them into the store first. */
  refresh?: boolean;
  /** Calendar days to fetch when refreshing. */
  refreshDays?: number;
  startDate?: string;
  endDate?: string;
}

/**
 * Loads stored candles and attaches indicator columns. Indicators are computed
 * over the full stored history before the date filter is applied, so the
 * first bars of a filtered range are already warm where history allows.
 */
export class BacktestDataLoader {
  constructor(
    private readonly store: CsvPriceStore,
    private readonly yahooClient?: YahooFinanceClient,
    private readonly indicatorSettings: Partial<IndicatorSettings> = {},
  ) {}

  async refresh(symbol: string, days = 365): Promise<number> {
    if (!this.yahooClient) {
      log.warn({ symbol }, 'No Yahoo client configured; skipping refresh');
      return 0;
    }
    const candles = await this.yahooClient.getHistoricalData(symbol, days);
    if (candles.length === 0) {
      log.warn({ symbol }, 'No data returned from Yahoo Finance');
      return 0;
    }
    return this.store.merge(symbol, candles);
  }

  async loadCandles(symbol: string, options: LoadOptions = {}): Promise<Candle[]> {
    if (options.refresh) {
      await this.refresh(symbol, options.refreshDays);
    }
    return this.store.load(symbol);
  }

  async loadBars(symbol: string, options: LoadOptions = {}): Promise<Bar[]> {
    const candles = await this.loadCandles(symbol, options);
    const bars = computeIndicators(candles, this.indicatorSettings);
    const { startDate, endDate } = options;
    const filtered = bars.filter(
      (b) => (!startDate || b.date >= startDate) && (!endDate || b.date <= endDate),
    );
    log.info(
      { symbol, candles: candles.length, bars: filtered.length, startDate, endDate },
      'Loaded bars',
    );
    return filtered;
  }

  /**
   * Bars for several symbols. Symbols with no data are left out of the map.
   */
  async loadMultiple(symbols: readonly string[], options: LoadOptions = {}): Promise<Map<string, Bar[]>> {
    const result = new Map<string, Bar[]>();

    const entries = await Promise.all(
      symbols.map(async (symbol) => ({ symbol, bars: await this.loadBars(symbol, options) })),
    );

    for (const { symbol, bars } of entries) {
      if (bars.length > 0) {
        result.set(symbol, bars);
      } else {
        log.warn({ symbol }, 'Skipping symbol: no data available');
      }
    }

    return result;
  }
}
