export function formatCurrency(n: number, currency = 'USD'): string {
  return new Intl.NumberFormat('en-US', { style: 'currency', currency }).format(n);
}

/** Formats a fraction (0.125) as a percentage string ("12.50%"). */
export function formatPercent(n: number): string {
  return `${(n * 100).toFixed(2)}%`;
}

/** Formats a value that is already in percent units (12.5) with an explicit sign ("+12.50%"). */
export function formatSignedPct(pct: number): string {
  const sign = pct > 0 ? '+' : '';
  return `${sign}${pct.toFixed(2)}%`;
}

export function formatRatio(n: number | null, decimals = 2): string {
  if (n == null) return 'N/A';
  if (n === Number.POSITIVE_INFINITY) return 'Infinity';
  return n.toFixed(decimals);
}

export function round(n: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(n * factor) / factor;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Population standard deviation. */
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  const variance = values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function escapeCsv(value: string | number | boolean | null | undefined): string {
  if (value == null) return '';
  const s = String(value);
  if (/[",\n\r]/.test(s)) {
    return `"${s.replace(/"/g, '""')}"`;
  }
  return s;
}

/**
 * Splits text on line boundaries into chunks no longer than `limit` characters.
 * A single line longer than the limit is hard-split.
 */
export function chunkText(text: string, limit: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const line of text.split('\n')) {
    const pieces: string[] = [];
    for (let i = 0; i < line.length; i += limit) {
      pieces.push(line.slice(i, i + limit));
    }
    if (pieces.length === 0) pieces.push('');

    for (const piece of pieces) {
      const candidate = current.length === 0 ? piece : `${current}\n${piece}`;
      if (candidate.length > limit && current.length > 0) {
        chunks.push(current);
        current = piece;
      } else {
        current = candidate;
      }
    }
  }

  if (current.length > 0) chunks.push(current);
  return chunks;
}
