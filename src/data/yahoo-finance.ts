import axios from 'axios';
import { z } from 'zod';
import type { Candle } from '../backtest/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('yahoo-finance');

const YAHOO_CHART_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

// Common headers for Yahoo Finance REST calls
const YF_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7)',
};

const nullableNumbers = z.array(z.number().nullable()).optional();

const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableNumbers,
                high: nullableNumbers,
                low: nullableNumbers,
                close: nullableNumbers,
                volume: nullableNumbers,
              }),
            ),
          }),
        }),
      )
      .nullable(),
  }),
});

export interface YahooFinanceOptions {
  /** Lookback used when getHistoricalData() is called without a day count. */
  defaultDays?: number;
  timeoutMs?: number;
}

export class YahooFinanceClient {
  private readonly defaultDays: number;
  private readonly timeoutMs: number;

  constructor(options: YahooFinanceOptions = {}) {
    this.defaultDays = options.defaultDays ?? 365;
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  /**
   * Daily candles for the last `days` calendar days, oldest first.
   * Returns [] (and logs) on any failure.
   */
  async getHistoricalData(symbol: string, days?: number): Promise<Candle[]> {
    try {
      const lookback = days ?? this.defaultDays;
      const period1 = Math.floor((Date.now() - lookback * 24 * 60 * 60 * 1000) / 1000);
      const period2 = Math.floor(Date.now() / 1000);

      const { data } = await axios.get<unknown>(
        `${YAHOO_CHART_URL}/${encodeURIComponent(symbol)}`,
        {
          params: {
            period1,
            period2,
            interval: '1d',
            includePrePost: false,
          },
          headers: YF_HEADERS,
          timeout: this.timeoutMs,
        },
      );

      const parsed = ChartResponseSchema.safeParse(data);
      if (!parsed.success) {
        log.warn({ symbol, issues: parsed.error.issues.length }, 'Unexpected chart response shape');
        return [];
      }

      const result = parsed.data.chart.result?.[0];
      const quote = result?.indicators.quote[0];
      if (!result?.timestamp || !quote) {
        log.warn({ symbol }, 'No historical data returned');
        return [];
      }

      const timestamps = result.timestamp;
      const candles: Candle[] = [];

      for (let i = 0; i < timestamps.length; i++) {
        const o = quote.open?.[i];
        const h = quote.high?.[i];
        const l = quote.low?.[i];
        const c = quote.close?.[i];
        const v = quote.volume?.[i];

        if (o == null || c == null) continue;

        candles.push({
          date: new Date(timestamps[i] * 1000).toISOString().split('T')[0],
          open: o,
          high: h ?? Math.max(o, c),
          low: l ?? Math.min(o, c),
          close: c,
          volume: v ?? 0,
        });
      }

      log.debug({ symbol, candles: candles.length }, 'Fetched historical data');
      return candles;
    } catch (err) {
      log.error({ symbol, err }, 'Failed to fetch historical data');
      return [];
    }
  }
}
