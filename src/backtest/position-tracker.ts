import { InsufficientCapitalError } from './errors.js';
import type { ExitReason, Position, Trade } from './types.js';

/** The parts of a bar a fill needs. */
export interface FillBar {
  index: number;
  date: string;
  close: number;
}

/**
 * Opens a long position with all available capital at the bar's close,
 * pushed up by the slippage fraction.
 */
export function openPosition(
  bar: FillBar,
  capital: number,
  commission: number,
  slippage: number,
): Position {
  const entryPrice = bar.close * (1 + slippage);
  const quantity = (capital - commission) / entryPrice;

  if (!(quantity > 0) || !Number.isFinite(quantity)) {
    throw new InsufficientCapitalError(capital, commission);
  }

  return Object.freeze({
    entryIndex: bar.index,
    entryDate: bar.date,
    entryPrice,
    quantity,
    entryCommission: commission,
    capitalAtEntry: capital,
  });
}

/**
 * Closes a position at the bar's close, pushed down by the slippage fraction.
 * Realized P&L is net of both the entry and the exit commission, so capital
 * after the trade is exactly capitalAtEntry + realizedPnl.
 */
export function closePosition(
  position: Position,
  bar: FillBar,
  commission: number,
  slippage: number,
  exitReason: ExitReason = 'signal',
): Trade {
  const exitPrice = bar.close * (1 - slippage);
  const costBasis = position.entryPrice * position.quantity;
  const realizedPnl =
    (exitPrice - position.entryPrice) * position.quantity - position.entryCommission - commission;

  return Object.freeze({
    entryIndex: position.entryIndex,
    exitIndex: bar.index,
    entryDate: position.entryDate,
    exitDate: bar.date,
    entryPrice: position.entryPrice,
    exitPrice,
    quantity: position.quantity,
    realizedPnl,
    realizedPnlPct: realizedPnl / costBasis,
    commission: position.entryCommission + commission,
    holdingBars: bar.index - position.entryIndex,
    exitReason,
  });
}

/** Mark-to-market value of the account while `position` is open. */
export function markToMarket(position: Position, price: number): number {
  return (
    position.capitalAtEntry -
    position.entryCommission +
    (price - position.entryPrice) * position.quantity
  );
}
