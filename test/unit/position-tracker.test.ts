import { describe, expect, it } from 'vitest';
import { InsufficientCapitalError } from '../../src/backtest/errors.js';
import {
  closePosition,
  markToMarket,
  openPosition,
} from '../../src/backtest/position-tracker.js';

const entryBar = { index: 3, date: '2024-01-04', close: 50 };
const exitBar = { index: 8, date: '2024-01-09', close: 60 };

describe('openPosition', () => {
  it('spends all capital at the close without costs', () => {
    const position = openPosition(entryBar, 1000, 0, 0);
    expect(position).toEqual({
      entryIndex: 3,
      entryDate: '2024-01-04',
      entryPrice: 50,
      quantity: 20,
      entryCommission: 0,
      capitalAtEntry: 1000,
    });
    expect(Object.isFrozen(position)).toBe(true);
  });

  it('pays commission before sizing and slips the fill upward', () => {
    const position = openPosition(entryBar, 1010, 10, 0.02);
    expect(position.entryPrice).toBeCloseTo(51, 10);
    expect(position.quantity).toBeCloseTo(1000 / 51, 10);
    expect(position.entryCommission).toBe(10);
  });

  it('throws InsufficientCapitalError when commission consumes the capital', () => {
    expect(() => openPosition(entryBar, 10, 10, 0)).toThrow(InsufficientCapitalError);
    expect(() => openPosition(entryBar, 5, 10, 0)).toThrow(
      'Cannot open position: capital 5 leaves nothing after commission 10',
    );
  });
});

describe('closePosition', () => {
  it('realizes the gain at the close', () => {
    const trade = closePosition(openPosition(entryBar, 1000, 0, 0), exitBar, 0, 0);
    expect(trade).toEqual({
      entryIndex: 3,
      exitIndex: 8,
      entryDate: '2024-01-04',
      exitDate: '2024-01-09',
      entryPrice: 50,
      exitPrice: 60,
      quantity: 20,
      realizedPnl: 200,
      realizedPnlPct: 0.2,
      commission: 0,
      holdingBars: 5,
      exitReason: 'signal',
    });
  });

  it('nets both commissions into realized pnl', () => {
    const position = openPosition(entryBar, 1005, 5, 0);
    const trade = closePosition(position, exitBar, 5, 0);

    expect(trade.realizedPnl).toBe(190);
    expect(trade.commission).toBe(10);
    expect(position.capitalAtEntry + trade.realizedPnl).toBe(1195);
  });

  it('slips the exit fill downward', () => {
    const trade = closePosition(openPosition(entryBar, 1000, 0, 0), exitBar, 0, 0.1);
    expect(trade.exitPrice).toBeCloseTo(54, 10);
    expect(trade.realizedPnl).toBeCloseTo(80, 8);
  });

  it('records a losing trade and the exit reason', () => {
    const trade = closePosition(
      openPosition(entryBar, 1000, 0, 0),
      { index: 4, date: '2024-01-05', close: 40 },
      0,
      0,
      'forced_exit',
    );
    expect(trade.realizedPnl).toBe(-200);
    expect(trade.realizedPnlPct).toBe(-0.2);
    expect(trade.exitReason).toBe('forced_exit');
  });
});

describe('markToMarket', () => {
  it('values the account at the given price after the entry commission', () => {
    const position = openPosition(entryBar, 1005, 5, 0);
    expect(markToMarket(position, 50)).toBe(1000);
    expect(markToMarket(position, 55)).toBe(1100);
    expect(markToMarket(position, 45)).toBe(900);
  });
});
