import { createReadStream, existsSync } from 'node:fs';
import { mkdir, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import csv from 'csv-parser';
import { isIsoDate } from '../backtest/bar-series.js';
import type { Candle } from '../backtest/types.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('price-store');

export const PRICE_CSV_HEADER = 'Date,Open,High,Low,Close,Volume';

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

/**
 * Parses one CSV row into a candle, or returns null when a field is missing
 * or not a finite number. Header names are matched case-insensitively.
 */
export function parsePriceRow(row: Readonly<Record<string, string>>): Candle | null {
  const lower: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    lower[key.trim().toLowerCase()] = value.trim();
  }

  const date = (lower.date ?? '').slice(0, 10);
  if (!isIsoDate(date)) return null;

  const fields = ['open', 'high', 'low', 'close', 'volume'] as const;
  const nums: number[] = [];
  for (const f of fields) {
    const raw = lower[f];
    if (raw === undefined || raw === '') return null;
    const n = Number(raw);
    if (!Number.isFinite(n)) return null;
    nums.push(n);
  }

  const [open, high, low, close, volume] = nums;
  return { date, open, high, low, close, volume };
}

export function candlesToCsv(candles: readonly Candle[]): string {
  const rows = candles.map((c) => [c.date, c.open, c.high, c.low, c.close, c.volume].join(','));
  return `${[PRICE_CSV_HEADER, ...rows].join('\n')}\n`;
}

/** Sorted by date; a later entry for the same date replaces an earlier one. */
export function mergeCandles(existing: readonly Candle[], incoming: readonly Candle[]): Candle[] {
  const byDate = new Map<string, Candle>();
  for (const c of existing) byDate.set(c.date, c);
  for (const c of incoming) byDate.set(c.date, c);
  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Daily OHLCV history on disk, one `<SYMBOL>.csv` per symbol.
 */
export class CsvPriceStore {
  constructor(private readonly dataDir: string) {}

  pathFor(symbol: string): string {
    return join(this.dataDir, `${normalizeSymbol(symbol)}.csv`);
  }

  has(symbol: string): boolean {
    return existsSync(this.pathFor(symbol));
  }

  async listSymbols(): Promise<string[]> {
    if (!existsSync(this.dataDir)) return [];
    const files = await readdir(this.dataDir);
    return files
      .filter((f) => f.toLowerCase().endsWith('.csv'))
      .map((f) => f.slice(0, -4).toUpperCase())
      .sort();
  }

  /** Stored candles for a symbol, oldest first. Missing file → []. */
  async load(symbol: string): Promise<Candle[]> {
    const file = this.pathFor(symbol);
    if (!existsSync(file)) {
      log.warn({ symbol, file }, 'No stored price data');
      return [];
    }

    const candles: Candle[] = [];
    let dropped = 0;

    await new Promise<void>((resolve, reject) => {
      // pipe() does not forward source errors to the parser
      createReadStream(file)
        .on('error', reject)
        .pipe(csv())
        .on('data', (row: Record<string, string>) => {
          const candle = parsePriceRow(row);
          if (candle) candles.push(candle);
          else dropped++;
        })
        .on('end', () => resolve())
        .on('error', reject);
    });

    if (dropped > 0) {
      log.warn({ symbol, dropped }, 'Dropped invalid price rows');
    }

    return mergeCandles([], candles);
  }

  async save(symbol: string, candles: readonly Candle[]): Promise<void> {
    await mkdir(this.dataDir, { recursive: true });
    await writeFile(this.pathFor(symbol), candlesToCsv(mergeCandles([], candles)), 'utf-8');
    log.debug({ symbol, candles: candles.length }, 'Saved price data');
  }

  /**
   * Incremental update: appends new dates and overwrites existing ones.
   * Returns the number of dates that were not stored before.
   */
  async merge(symbol: string, incoming: readonly Candle[]): Promise<number> {
    const existing = this.has(symbol) ? await this.load(symbol) : [];
    const known = new Set(existing.map((c) => c.date));
    const added = new Set(incoming.filter((c) => !known.has(c.date)).map((c) => c.date)).size;
    await this.save(symbol, mergeCandles(existing, incoming));
    log.info({ symbol, added, total: known.size + added }, 'Merged price data');
    return added;
  }
}
