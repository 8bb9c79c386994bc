import { describe, expect, it } from 'vitest';
import {
  BacktestError,
  ConfigurationError,
  DataError,
  InsufficientCapitalError,
  LookaheadError,
  serializeError,
} from '../../src/backtest/errors.js';

describe('Backtest errors', () => {
  describe('BacktestError', () => {
    it('sets name, message, code and details', () => {
      const err = new BacktestError('test error', 'TEST_CODE', { a: 1 });
      expect(err.name).toBe('BacktestError');
      expect(err.message).toBe('test error');
      expect(err.code).toBe('TEST_CODE');
      expect(err.details).toEqual({ a: 1 });
    });

    it('is an instance of Error', () => {
      const err = new BacktestError('test', 'CODE');
      expect(err).toBeInstanceOf(Error);
      expect(err.details).toBeUndefined();
    });

    it('captures a stack trace', () => {
      expect(new BacktestError('test', 'CODE').stack).toContain('test');
    });
  });

  describe('subclasses', () => {
    it.each([
      [new ConfigurationError('bad option'), 'ConfigurationError', 'CONFIGURATION_ERROR'],
      [new DataError('bad bars'), 'DataError', 'DATA_ERROR'],
      [new InsufficientCapitalError(10, 10), 'InsufficientCapitalError', 'INSUFFICIENT_CAPITAL'],
      [new LookaheadError(3, 0), 'LookaheadError', 'LOOKAHEAD'],
    ])('%s has its own name and code', (err, name, code) => {
      expect(err).toBeInstanceOf(BacktestError);
      expect(err.name).toBe(name);
      expect(err.code).toBe(code);
    });

    it('InsufficientCapitalError carries the capital and commission', () => {
      expect(new InsufficientCapitalError(5, 7).details).toEqual({ capital: 5, commission: 7 });
    });

    it('LookaheadError names the bar and offset', () => {
      const err = new LookaheadError(3, 0);
      expect(err.message).toBe('Bar 3 cannot look 0 bars back: only past bars are reachable');
      expect(err.details).toEqual({ index: 3, offset: 0 });
    });
  });

  describe('serializeError', () => {
    it('keeps the code of a BacktestError', () => {
      expect(serializeError(new DataError('no bars'))).toEqual({
        name: 'DataError',
        code: 'DATA_ERROR',
        message: 'no bars',
      });
    });

    it('labels other errors as strategy errors', () => {
      expect(serializeError(new TypeError('x is undefined'))).toEqual({
        name: 'TypeError',
        code: 'STRATEGY_ERROR',
        message: 'x is undefined',
      });
    });

    it('stringifies thrown non-errors', () => {
      expect(serializeError('plain string')).toEqual({
        name: 'Error',
        code: 'STRATEGY_ERROR',
        message: 'plain string',
      });
    });
  });
});
