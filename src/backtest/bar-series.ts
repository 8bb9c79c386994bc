import { DataError, LookaheadError } from './errors.js';
import type { Bar, BarView, PriceField } from './types.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** True for a `YYYY-MM-DD` string naming a real calendar day. */
export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Checks that a bar sequence can be replayed: long enough, with `YYYY-MM-DD`
 * dates in strictly increasing order and consistent prices. Dates compare as
 * strings, which only orders them once the format is fixed. Throws DataError
 * on the first problem found.
 */
export function validateBars(bars: readonly Bar[], minimumBars: number): void {
  if (bars.length === 0) {
    throw new DataError('Bar sequence is empty');
  }
  if (bars.length < minimumBars) {
    throw new DataError(`Need at least ${minimumBars} bars, got ${bars.length}`, {
      bars: bars.length,
      minimumBars,
    });
  }

  for (let i = 0; i < bars.length; i++) {
    const bar = bars[i];

    if (!isIsoDate(bar.date)) {
      throw new DataError(`Bar ${i} has invalid date '${bar.date}'`, { index: i, date: bar.date });
    }
    if (!Number.isFinite(bar.close) || bar.close <= 0 || !Number.isFinite(bar.open) || bar.open <= 0) {
      throw new DataError(`Bar ${i} (${bar.date}) has a non-positive price`, {
        index: i,
        date: bar.date,
      });
    }
    if (
      !Number.isFinite(bar.high) ||
      !Number.isFinite(bar.low) ||
      bar.high < Math.max(bar.open, bar.close) ||
      bar.low > Math.min(bar.open, bar.close)
    ) {
      throw new DataError(`Bar ${i} (${bar.date}) has high/low outside open/close`, {
        index: i,
        date: bar.date,
        high: bar.high,
        low: bar.low,
      });
    }
    if (!Number.isFinite(bar.volume) || bar.volume < 0) {
      throw new DataError(`Bar ${i} (${bar.date}) has an invalid volume`, {
        index: i,
        date: bar.date,
      });
    }

    if (i > 0) {
      const prev = bars[i - 1].date;
      if (bar.date === prev) {
        throw new DataError(`Duplicate timestamp ${bar.date} at bar ${i}`, {
          index: i,
          date: bar.date,
        });
      }
      if (bar.date < prev) {
        throw new DataError(`Out-of-order timestamp ${bar.date} after ${prev} at bar ${i}`, {
          index: i,
          date: bar.date,
          previous: prev,
        });
      }
    }
  }
}

function readIndicator(bar: Bar, name: string): number | undefined {
  const v = bar.indicators[name];
  return v == null || Number.isNaN(v) ? undefined : v;
}

/**
 * Builds the read-only view of bar `index`. The view closes over the series but
 * only hands out bars at or before `index`.
 */
export function createBarView(bars: readonly Bar[], index: number): BarView {
  const bar = bars[index];
  if (!bar) {
    throw new DataError(`No bar at index ${index}`, { index });
  }

  const view: BarView = {
    index,
    date: bar.date,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: bar.volume,
    value: (name) => readIndicator(bar, name),
    has: (...names) => names.every((n) => readIndicator(bar, n) !== undefined),
    previous: (offset = 1) => {
      if (!Number.isInteger(offset) || offset < 1) {
        throw new LookaheadError(index, offset);
      }
      const target = index - offset;
      return target >= 0 ? createBarView(bars, target) : undefined;
    },
    window: (field: PriceField, length: number) => {
      if (!Number.isInteger(length) || length < 1 || index - length < 0) return undefined;
      const values: number[] = [];
      for (let i = index - length; i < index; i++) {
        values.push(bars[i][field]);
      }
      return Object.freeze(values);
    },
  };

  return Object.freeze(view);
}

export function isWarm(view: BarView, requiredIndicators: readonly string[]): boolean {
  return view.has(...requiredIndicators);
}
