import { describe, expect, it } from 'vitest';
import {
  CONFIG_SCHEMAS,
  getConfigSchema,
  isConfigKey,
  validateConfigValue,
} from '../../src/config/schema-validator.js';

describe('schema-validator', () => {
  describe('isConfigKey', () => {
    it('knows the declared keys', () => {
      expect(isConfigKey('backtest.commission')).toBe(true);
      expect(isConfigKey('backtest.unknown')).toBe(false);
      expect(isConfigKey('toString')).toBe(false);
    });
  });

  describe('getConfigSchema', () => {
    it('returns a schema for a known key', () => {
      expect(getConfigSchema('ranking.metric')).toBe(CONFIG_SCHEMAS['ranking.metric']);
    });

    it('returns undefined for an unknown key', () => {
      expect(getConfigSchema('nope')).toBeUndefined();
    });
  });

  describe('validateConfigValue', () => {
    it('accepts unknown keys', () => {
      expect(validateConfigValue('something.else', 42)).toEqual({ valid: true });
    });

    it('validates backtest costs', () => {
      expect(validateConfigValue('backtest.commission', 1.5).valid).toBe(true);
      expect(validateConfigValue('backtest.commission', -1).valid).toBe(false);
      expect(validateConfigValue('backtest.slippage', 0.001).valid).toBe(true);
      expect(validateConfigValue('backtest.slippage', 1).valid).toBe(false);
      expect(validateConfigValue('backtest.initialCapital', 0).valid).toBe(false);
    });

    it('validates ranking metrics by name', () => {
      expect(validateConfigValue('ranking.metric', 'sharpeRatio').valid).toBe(true);
      const result = validateConfigValue('ranking.metric', 'alpha');
      expect(result.valid).toBe(false);
      expect(result.error).toContain('totalReturnPct');
    });

    it('validates integer ranges', () => {
      expect(validateConfigValue('ranking.minimumTrades', 2.5).valid).toBe(false);
      expect(validateConfigValue('data.historicalDays', 10).valid).toBe(false);
      expect(validateConfigValue('data.historicalDays', 365).valid).toBe(true);
    });

    it('validates the scan time format', () => {
      expect(validateConfigValue('scan.time', '16:30').valid).toBe(true);
      expect(validateConfigValue('scan.time', '4pm').valid).toBe(false);
    });

    it('validates arrays of symbols', () => {
      expect(validateConfigValue('data.symbols', ['AAPL', 'MSFT']).valid).toBe(true);
      expect(validateConfigValue('data.symbols', 'AAPL').valid).toBe(false);
      expect(validateConfigValue('data.symbols', ['']).valid).toBe(false);
    });
  });
});
