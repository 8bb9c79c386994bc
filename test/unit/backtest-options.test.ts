import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../../src/backtest/errors.js';
import { DEFAULT_BACKTEST_OPTIONS, parseBacktestOptions } from '../../src/backtest/options.js';

describe('parseBacktestOptions', () => {
  it('returns the defaults without overrides', () => {
    expect(parseBacktestOptions()).toEqual({
      initialCapital: 10_000,
      commission: 0,
      slippage: 0,
      minimumBars: 2,
      minimumTrades: 1,
      tradingPeriodsPerYear: 252,
      riskFreeRate: 0,
    });
    expect(Object.isFrozen(DEFAULT_BACKTEST_OPTIONS)).toBe(true);
  });

  it('merges overrides and ignores undefined ones', () => {
    const options = parseBacktestOptions({ commission: 1.5, slippage: undefined });
    expect(options.commission).toBe(1.5);
    expect(options.slippage).toBe(0);
  });

  it('names every invalid field', () => {
    expect(() => parseBacktestOptions({ initialCapital: -1, slippage: 2 })).toThrow(
      /initialCapital: .*; slippage: /,
    );
  });

  it('throws ConfigurationError listing the fields', () => {
    try {
      parseBacktestOptions({ tradingPeriodsPerYear: 0, riskFreeRate: 2 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (err instanceof ConfigurationError) {
        expect(err.details).toEqual({ fields: ['tradingPeriodsPerYear', 'riskFreeRate'] });
      }
    }
  });

  it('rejects non-finite capital', () => {
    expect(() => parseBacktestOptions({ initialCapital: Number.POSITIVE_INFINITY })).toThrow(
      ConfigurationError,
    );
  });
});
