import {
  escapeCsv,
  formatCurrency,
  formatPercent,
  formatRatio,
  formatSignedPct,
  round,
} from '../utils/helpers.js';
import type { RankingReport, StrategyOutcome } from './ranking.js';
import type { BacktestResult } from './types.js';

/**
 * Generate a text summary suitable for console output or Telegram.
 */
export function generateSummary(result: BacktestResult): string {
  const { metrics, flags } = result;
  const lines: string[] = [];

  lines.push(`=== Backtest: ${result.strategyName} on ${result.symbol} ===`);
  lines.push(`Period: ${result.startDate} to ${result.endDate} (${result.barsProcessed} bars)`);
  lines.push(`Initial Capital: ${formatCurrency(result.initialCapital)}`);
  lines.push('');

  lines.push('--- Performance ---');
  lines.push(`Final Capital: ${formatCurrency(result.finalCapital)}`);
  lines.push(`Return: ${formatSignedPct(metrics.totalReturnPct)}`);
  lines.push(`Total P&L: ${formatCurrency(metrics.totalPnl)}`);
  lines.push('');

  lines.push('--- Trade Statistics ---');
  lines.push(`Total Trades: ${metrics.totalTrades}`);
  lines.push(`Win Rate: ${formatPercent(metrics.winRate)}`);
  lines.push(`Wins: ${metrics.winCount} | Losses: ${metrics.lossCount}`);
  lines.push(`Avg Win: ${metrics.avgWin != null ? formatCurrency(metrics.avgWin) : 'N/A'}`);
  lines.push(`Avg Loss: ${metrics.avgLoss != null ? formatCurrency(metrics.avgLoss) : 'N/A'}`);
  lines.push(`Avg Hold: ${metrics.totalTrades > 0 ? `${metrics.avgHoldingBars} bars` : 'N/A'}`);
  lines.push('');

  lines.push('--- Risk Metrics ---');
  lines.push(`Max Drawdown: ${formatSignedPct(metrics.maxDrawdownPct)}`);
  lines.push(`Sharpe Ratio: ${formatRatio(metrics.sharpeRatio)}`);
  lines.push(`Sortino Ratio: ${formatRatio(metrics.sortinoRatio)}`);
  lines.push(`Calmar Ratio: ${formatRatio(metrics.calmarRatio)}`);
  lines.push(`SQN: ${formatRatio(metrics.sqn)}`);
  lines.push(`Profit Factor: ${formatRatio(metrics.profitFactor)}`);
  lines.push(
    `Expectancy: ${metrics.expectancy != null ? formatCurrency(metrics.expectancy) : 'N/A'}`,
  );

  if (metrics.bestTradePct != null && metrics.worstTradePct != null) {
    lines.push('');
    lines.push(`Best Trade: ${formatPercent(metrics.bestTradePct)}`);
    lines.push(`Worst Trade: ${formatPercent(metrics.worstTradePct)}`);
  }

  const notes: string[] = [];
  if (flags.forcedExit) notes.push('last position closed at final bar (forced exit)');
  if (flags.insufficientSample) notes.push('insufficient trade sample');
  if (flags.rejectedEntries > 0) notes.push(`${flags.rejectedEntries} entries rejected`);
  if (notes.length > 0) {
    lines.push('');
    lines.push(`Notes: ${notes.join('; ')}`);
  }

  return lines.join('\n');
}

function outcomeStatusLabel(outcome: StrategyOutcome): string {
  switch (outcome.status) {
    case 'ranked':
      return `#${outcome.rank}`;
    case 'insufficient_sample':
      return 'insufficient sample';
    case 'failed':
      return `failed: ${outcome.error.message}`;
  }
}

/**
 * Fixed-width ranking table followed by the strategies left out of it.
 */
export function generateRankingTable(report: RankingReport): string {
  const lines: string[] = [
    `=== Strategy Ranking: ${report.symbol} (by ${report.metric}, min ${report.minimumTrades} trades) ===`,
    '',
  ];

  if (report.ranked.length === 0) {
    lines.push('No strategy produced enough trades to rank.');
  } else {
    lines.push(
      `${'Rank'.padEnd(5)}${'Strategy'.padEnd(28)}${'Return'.padStart(10)}${'Sharpe'.padStart(9)}` +
        `${'WinRate'.padStart(9)}${'PF'.padStart(9)}${'MaxDD'.padStart(10)}${'Trades'.padStart(8)}`,
    );
    for (const o of report.ranked) {
      const m = o.result.metrics;
      lines.push(
        `${String(o.rank).padEnd(5)}${o.strategyName.padEnd(28)}` +
          `${formatSignedPct(m.totalReturnPct).padStart(10)}` +
          `${formatRatio(m.sharpeRatio).padStart(9)}` +
          `${formatPercent(m.winRate).padStart(9)}` +
          `${formatRatio(m.profitFactor).padStart(9)}` +
          `${formatSignedPct(m.maxDrawdownPct).padStart(10)}` +
          `${String(m.totalTrades).padStart(8)}`,
      );
    }
  }

  const unranked = report.outcomes.filter((o) => o.status !== 'ranked');
  if (unranked.length > 0) {
    lines.push('');
    lines.push('--- Not ranked ---');
    for (const o of unranked) {
      lines.push(`${o.strategyName}: ${outcomeStatusLabel(o)}`);
    }
  }

  return lines.join('\n');
}

/** Infinity has no JSON or CSV literal; it is written as the string "Infinity". */
function serializableNumber(n: number | null): number | string | null {
  if (n === Number.POSITIVE_INFINITY) return 'Infinity';
  if (n === Number.NEGATIVE_INFINITY) return '-Infinity';
  return n;
}

export const RESULT_CSV_COLUMNS = [
  'symbol',
  'strategy',
  'status',
  'rank',
  'total_return_pct',
  'sharpe_ratio',
  'win_rate',
  'profit_factor',
  'max_drawdown_pct',
  'total_trades',
  'final_capital',
  'error',
] as const;

/**
 * One row per outcome in ranking order: ranked strategies first, then the
 * excluded and failed ones in input order.
 */
export function resultsToCsv(report: RankingReport): string {
  const ordered: StrategyOutcome[] = [
    ...report.ranked,
    ...report.outcomes.filter((o) => o.status !== 'ranked'),
  ];

  const rows = ordered.map((o) => {
    if (o.status === 'failed') {
      return [report.symbol, o.strategyName, o.status, '', '', '', '', '', '', '', '', o.error.message];
    }
    const m = o.result.metrics;
    return [
      report.symbol,
      o.strategyName,
      o.status,
      o.status === 'ranked' ? o.rank : '',
      m.totalReturnPct,
      m.sharpeRatio,
      m.winRate,
      serializableNumber(m.profitFactor),
      m.maxDrawdownPct,
      m.totalTrades,
      round(o.result.finalCapital, 2),
      '',
    ];
  });

  return [RESULT_CSV_COLUMNS.join(','), ...rows.map((r) => r.map(escapeCsv).join(','))].join(
    '\n',
  );
}

export const TRADE_CSV_COLUMNS = [
  'entry_date',
  'exit_date',
  'entry_price',
  'exit_price',
  'quantity',
  'pnl',
  'pnl_pct',
  'commission',
  'holding_bars',
  'exit_reason',
] as const;

export function tradesToCsv(result: BacktestResult): string {
  const rows = result.trades.map((t) =>
    [
      t.entryDate,
      t.exitDate,
      round(t.entryPrice, 4),
      round(t.exitPrice, 4),
      round(t.quantity, 6),
      round(t.realizedPnl, 2),
      round(t.realizedPnlPct * 100, 2),
      round(t.commission, 2),
      t.holdingBars,
      t.exitReason,
    ]
      .map(escapeCsv)
      .join(','),
  );
  return [TRADE_CSV_COLUMNS.join(','), ...rows].join('\n');
}

/** Pretty-printed JSON of a result or report, with Infinity written as "Infinity". */
export function reportToJson(value: BacktestResult | RankingReport): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => (typeof v === 'number' ? serializableNumber(v) : v),
    2,
  );
}
