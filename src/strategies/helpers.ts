import type { BarView } from '../backtest/types.js';

/** An indicator column name, a price field, or a constant level. */
export type Operand = string | number;

export function resolve(view: BarView, operand: Operand): number | undefined {
  if (typeof operand === 'number') return operand;
  switch (operand) {
    case 'open':
      return view.open;
    case 'high':
      return view.high;
    case 'low':
      return view.low;
    case 'close':
      return view.close;
    case 'volume':
      return view.volume;
    default:
      return view.value(operand);
  }
}

/** `a` moved from at-or-below `b` on the previous bar to above it on this bar. */
export function crossedAbove(view: BarView, a: Operand, b: Operand): boolean {
  const prev = view.previous();
  if (!prev) return false;
  const a0 = resolve(prev, a);
  const b0 = resolve(prev, b);
  const a1 = resolve(view, a);
  const b1 = resolve(view, b);
  if (a0 === undefined || b0 === undefined || a1 === undefined || b1 === undefined) return false;
  return a0 <= b0 && a1 > b1;
}

/** `a` moved from at-or-above `b` on the previous bar to below it on this bar. */
export function crossedBelow(view: BarView, a: Operand, b: Operand): boolean {
  const prev = view.previous();
  if (!prev) return false;
  const a0 = resolve(prev, a);
  const b0 = resolve(prev, b);
  const a1 = resolve(view, a);
  const b1 = resolve(view, b);
  if (a0 === undefined || b0 === undefined || a1 === undefined || b1 === undefined) return false;
  return a0 >= b0 && a1 < b1;
}

/** Value of `operand` on this bar minus its value on the previous bar. */
export function change(view: BarView, operand: Operand): number | undefined {
  const prev = view.previous();
  if (!prev) return undefined;
  const now = resolve(view, operand);
  const before = resolve(prev, operand);
  return now === undefined || before === undefined ? undefined : now - before;
}

/** Like resolve(), with NaN for a missing value so comparisons are simply false. */
export function num(view: BarView, operand: Operand): number {
  return resolve(view, operand) ?? Number.NaN;
}

/** Overrides that are undefined fall back to the default. */
export function withDefaults<T extends object>(defaults: T, overrides: Partial<T>): T {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return { ...defaults, ...defined };
}
