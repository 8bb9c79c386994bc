import { describe, expect, it, vi, beforeEach, afterEach } from 'vitest';

// Use vi.hoisted to create mock functions before vi.mock hoisting
const { mockAxiosGet } = vi.hoisted(() => ({
  mockAxiosGet: vi.fn(),
}));

vi.mock('axios', () => ({
  default: { get: mockAxiosGet },
}));

vi.mock('../../src/utils/logger.js', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

import { YahooFinanceClient } from '../../src/data/yahoo-finance.js';

function chartResponse(quote: Record<string, unknown>, timestamp: number[] = [1700000000, 1700086400]) {
  return { data: { chart: { result: [{ timestamp, indicators: { quote: [quote] } }] } } };
}

describe('YahooFinanceClient', () => {
  let client: YahooFinanceClient;

  beforeEach(() => {
    vi.clearAllMocks();
    client = new YahooFinanceClient();
  });

  describe('getHistoricalData', () => {
    it('returns candles from the Yahoo chart API', async () => {
      mockAxiosGet.mockResolvedValueOnce(
        chartResponse({
          open: [150, 152],
          high: [155, 158],
          low: [149, 151],
          close: [154, 157],
          volume: [1000000, 1200000],
        }),
      );

      const candles = await client.getHistoricalData('AAPL');
      expect(candles).toEqual([
        { date: '2023-11-14', open: 150, high: 155, low: 149, close: 154, volume: 1000000 },
        { date: '2023-11-15', open: 152, high: 158, low: 151, close: 157, volume: 1200000 },
      ]);
    });

    describe('request window', () => {
      beforeEach(() => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2024-06-01T00:00:00Z'));
      });

      afterEach(() => {
        vi.useRealTimers();
      });

      it('asks for daily bars over the requested days', async () => {
        mockAxiosGet.mockResolvedValueOnce(chartResponse({ open: [1], close: [1] }, [1700000000]));

        await client.getHistoricalData('BRK.B', 30);
        const [url, config] = mockAxiosGet.mock.calls[0];
        expect(url).toBe('https://query1.finance.yahoo.com/v8/finance/chart/BRK.B');
        expect(config).toMatchObject({
          params: { period1: 1714608000, period2: 1717200000, interval: '1d' },
          timeout: 15000,
        });
      });

      it('falls back to the configured lookback and timeout', async () => {
        mockAxiosGet.mockResolvedValueOnce(chartResponse({ open: [1], close: [1] }, [1700000000]));

        await new YahooFinanceClient({ defaultDays: 10, timeoutMs: 500 }).getHistoricalData('SPY');
        expect(mockAxiosGet.mock.calls[0][1]).toMatchObject({
          params: { period1: 1717200000 - 10 * 86400 },
          timeout: 500,
        });
      });
    });

    it('returns [] when there is no result', async () => {
      mockAxiosGet.mockResolvedValueOnce({ data: { chart: { result: [] } } });
      expect(await client.getHistoricalData('INVALID')).toEqual([]);
    });

    it('returns [] when the result is null', async () => {
      mockAxiosGet.mockResolvedValueOnce({ data: { chart: { result: null } } });
      expect(await client.getHistoricalData('INVALID')).toEqual([]);
    });

    it('returns [] when the result has no timestamp', async () => {
      mockAxiosGet.mockResolvedValueOnce({
        data: { chart: { result: [{ indicators: { quote: [{}] } }] } },
      });
      expect(await client.getHistoricalData('AAPL')).toEqual([]);
    });

    it('returns [] for an unexpected response shape', async () => {
      mockAxiosGet.mockResolvedValueOnce({ data: '<html>rate limited</html>' });
      expect(await client.getHistoricalData('AAPL')).toEqual([]);
    });

    it('skips candles without an open or close', async () => {
      mockAxiosGet.mockResolvedValueOnce(
        chartResponse({
          open: [null, 152],
          high: [null, 158],
          low: [null, 151],
          close: [154, 157],
          volume: [null, 1200000],
        }),
      );

      const candles = await client.getHistoricalData('AAPL');
      expect(candles.map((c) => c.date)).toEqual(['2023-11-15']);
    });

    it('fills a missing high, low or volume', async () => {
      mockAxiosGet.mockResolvedValueOnce(
        chartResponse({ open: [10], high: [null], low: [null], close: [11], volume: [null] }, [
          1700000000,
        ]),
      );

      expect(await client.getHistoricalData('AAPL')).toEqual([
        { date: '2023-11-14', open: 10, high: 11, low: 10, close: 11, volume: 0 },
      ]);
    });

    it('returns [] when the request fails', async () => {
      mockAxiosGet.mockRejectedValueOnce(new Error('Network error'));
      expect(await client.getHistoricalData('AAPL')).toEqual([]);
    });
  });
});
