#!/usr/bin/env node
import 'dotenv/config';

import { parseArgs } from 'node:util';
import { SignalBench } from './bot/signal-bench.js';
import { ConfigurationError } from './backtest/errors.js';
import { RANKING_METRICS, type RankingMetric } from './backtest/ranking.js';
import { getConfigManager } from './config/manager.js';
import { createLogger } from './utils/logger.js';

const log = createLogger('cli');

const USAGE = `Usage: signal-bench <command> [options]

Commands:
  fetch     [--symbol S ...]               Refresh stored prices from Yahoo Finance
  backtest  --symbol S --strategy N        Backtest one strategy on one symbol
  rank      --symbol S [--metric M]        Rank every strategy on one symbol
  optimize  --symbol S --strategy N        Grid-search a strategy's parameters
  scan                                     Scan stored symbols for today's signals
  schedule                                 Run the scan every weekday after the close

Metrics: ${RANKING_METRICS.join(', ')}`;

function isRankingMetric(value: string): value is RankingMetric {
  return RANKING_METRICS.some((m) => m === value);
}

function requireOption(value: string | undefined, name: string): string {
  if (!value) throw new ConfigurationError(`Missing required option --${name}\n\n${USAGE}`);
  return value;
}

export async function main(argv: string[]): Promise<void> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      symbol: { type: 'string', short: 's', multiple: true },
      strategy: { type: 'string', short: 'n' },
      metric: { type: 'string', short: 'm' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  const command = positionals[0];
  if (values.help || !command) {
    process.stdout.write(`${USAGE}\n`);
    return;
  }

  let metric: RankingMetric | undefined;
  if (values.metric !== undefined) {
    if (!isRankingMetric(values.metric)) {
      throw new ConfigurationError(`Unknown metric: ${values.metric}`, {
        available: [...RANKING_METRICS],
      });
    }
    metric = values.metric;
  }

  const symbols = values.symbol ?? [];
  const app = new SignalBench({ config: getConfigManager() });

  switch (command) {
    case 'fetch':
      await app.fetch(symbols);
      return;
    case 'backtest':
      await app.backtest(requireOption(symbols[0], 'symbol'), requireOption(values.strategy, 'strategy'));
      return;
    case 'rank':
      await app.rank(requireOption(symbols[0], 'symbol'), metric);
      return;
    case 'optimize':
      await app.optimize(
        requireOption(symbols[0], 'symbol'),
        requireOption(values.strategy, 'strategy'),
        metric,
      );
      return;
    case 'scan':
      await app.scan();
      return;
    case 'schedule': {
      const scheduler = app.schedule();
      const shutdown = (signal: string) => {
        log.info(`${signal} received, shutting down...`);
        scheduler.stop();
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
      return;
    }
    default:
      throw new ConfigurationError(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

main(process.argv.slice(2)).catch((err: unknown) => {
  log.fatal({ err }, 'Command failed');
  process.exitCode = 1;
});
