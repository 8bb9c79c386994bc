import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { escapeCsv } from '../utils/helpers.js';
import { createLogger } from '../utils/logger.js';
import type { AlertAction, SignalAlert } from './types.js';

const log = createLogger('alert-exporter');

export interface AlertSummary {
  generatedAt: string;
  counts: Record<AlertAction, number> & { total: number };
  alerts: SignalAlert[];
}

export interface ExportPaths {
  jsonPath: string;
  csvPath: string;
}

const CSV_COLUMNS = [
  'symbol',
  'strategy',
  'action',
  'confidence',
  'date',
  'close',
  'win_rate',
  'profit_factor',
  'total_return_pct',
  'closed_trades',
  'reason',
] as const;

export function summarizeAlerts(alerts: readonly SignalAlert[], generatedAt: Date): AlertSummary {
  const counts = { BUY: 0, SELL: 0, WATCH: 0, total: alerts.length };
  for (const a of alerts) counts[a.action]++;
  return { generatedAt: generatedAt.toISOString(), counts, alerts: [...alerts] };
}

export function alertsToCsv(alerts: readonly SignalAlert[]): string {
  const rows = alerts.map((a) =>
    [
      a.symbol,
      a.strategyName,
      a.action,
      a.confidence,
      a.date,
      a.close,
      a.winRate,
      a.profitFactor === Number.POSITIVE_INFINITY ? 'Infinity' : a.profitFactor,
      a.totalReturnPct,
      a.closedTrades,
      a.reason,
    ]
      .map(escapeCsv)
      .join(','),
  );
  return [CSV_COLUMNS.join(','), ...rows].join('\n');
}

/**
 * Writes daily_alerts.json and daily_alerts.csv to the output directory.
 */
export class AlertExporter {
  constructor(private readonly outputDir: string) {}

  async export(alerts: readonly SignalAlert[], generatedAt = new Date()): Promise<ExportPaths> {
    await mkdir(this.outputDir, { recursive: true });

    const summary = summarizeAlerts(alerts, generatedAt);
    const jsonPath = join(this.outputDir, 'daily_alerts.json');
    const csvPath = join(this.outputDir, 'daily_alerts.csv');

    const json = JSON.stringify(
      summary,
      (_key, v: unknown) => (v === Number.POSITIVE_INFINITY ? 'Infinity' : v),
      2,
    );
    await writeFile(jsonPath, json, 'utf-8');
    await writeFile(csvPath, alertsToCsv(alerts), 'utf-8');

    log.info({ ...summary.counts, jsonPath, csvPath }, 'Exported alerts');
    return { jsonPath, csvPath };
  }
}
