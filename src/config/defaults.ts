import type { ConfigKey } from './schema-validator.js';

export interface ConfigDefault {
  key: ConfigKey;
  /** JSON-encoded default. */
  value: string;
  category: string;
  description: string;
}

export const CONFIG_DEFAULTS: ConfigDefault[] = [
  // Data
  { key: 'data.dir', value: '"data/prices"', category: 'data', description: 'Directory of per-symbol CSV files' },
  { key: 'data.symbols', value: '[]', category: 'data', description: 'Symbols to fetch (empty: those already stored)' },
  {
    key: 'data.historicalDays',
    value: '730',
    category: 'data',
    description: 'Calendar days fetched from Yahoo on refresh',
  },
  {
    key: 'data.requestTimeoutMs',
    value: '15000',
    category: 'data',
    description: 'Yahoo request timeout',
  },

  // Analysis
  { key: 'analysis.macd.fast', value: '12', category: 'analysis', description: 'MACD fast EMA period' },
  { key: 'analysis.macd.slow', value: '26', category: 'analysis', description: 'MACD slow EMA period' },
  { key: 'analysis.macd.signal', value: '9', category: 'analysis', description: 'MACD signal period' },
  { key: 'analysis.bb.stdDev', value: '2', category: 'analysis', description: 'Bollinger band width in std devs' },
  {
    key: 'analysis.keltner.multiplier',
    value: '2',
    category: 'analysis',
    description: 'Keltner channel width in ATRs',
  },

  // Backtest
  {
    key: 'backtest.initialCapital',
    value: '10000',
    category: 'backtest',
    description: 'Starting capital per run',
  },
  {
    key: 'backtest.commission',
    value: '0',
    category: 'backtest',
    description: 'Flat fee per fill (entry and exit)',
  },
  {
    key: 'backtest.slippage',
    value: '0',
    category: 'backtest',
    description: 'Adverse price fraction per fill',
  },
  {
    key: 'backtest.minimumBars',
    value: '50',
    category: 'backtest',
    description: 'Reject datasets shorter than this',
  },
  {
    key: 'backtest.tradingPeriodsPerYear',
    value: '252',
    category: 'backtest',
    description: 'Bars per year, for Sharpe annualisation',
  },
  {
    key: 'backtest.riskFreeRate',
    value: '0',
    category: 'backtest',
    description: 'Annual risk-free rate for Sharpe and Sortino',
  },

  // Ranking
  {
    key: 'ranking.metric',
    value: '"totalReturnPct"',
    category: 'ranking',
    description: 'totalReturnPct | sharpeRatio | winRate | profitFactor | maxDrawdownPct',
  },
  {
    key: 'ranking.tieBreaker',
    value: '"sharpeRatio"',
    category: 'ranking',
    description: 'Metric used when the primary metric ties',
  },
  {
    key: 'ranking.minimumTrades',
    value: '3',
    category: 'ranking',
    description: 'Results with fewer trades are not ranked',
  },
  { key: 'ranking.top', value: '10', category: 'ranking', description: 'Rows shown in notifications' },

  // Scan
  {
    key: 'scan.strategies',
    value: '[]',
    category: 'scan',
    description: 'Strategies to scan with (empty: all built-ins)',
  },
  {
    key: 'scan.minimumTrades',
    value: '3',
    category: 'scan',
    description: 'Closed trades needed for HIGH confidence',
  },
  {
    key: 'scan.minConfidence',
    value: '"MEDIUM"',
    category: 'scan',
    description: 'LOW | MEDIUM | HIGH',
  },
  { key: 'scan.outputDir', value: '"output"', category: 'scan', description: 'Where alert files are written' },
  {
    key: 'scan.time',
    value: '"16:30"',
    category: 'scan',
    description: 'Daily scan time (America/New_York, weekdays)',
  },
  {
    key: 'scan.refresh',
    value: 'true',
    category: 'scan',
    description: 'Refresh prices from Yahoo before scanning',
  },

  // Notifications
  {
    key: 'telegram.enabled',
    value: 'true',
    category: 'telegram',
    description: 'Send scan and ranking results to Telegram',
  },
];
