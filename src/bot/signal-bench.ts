import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { IndicatorSettings } from '../analysis/technical/indicators.js';
import { BacktestDataLoader } from '../backtest/data-loader.js';
import { BacktestEngine } from '../backtest/engine.js';
import { ConfigurationError } from '../backtest/errors.js';
import { type OptimizationReport, optimizeParameters } from '../backtest/optimizer.js';
import { type RankingMetric, type RankingReport, rankStrategies } from '../backtest/ranking.js';
import {
  generateRankingTable,
  generateSummary,
  reportToJson,
  resultsToCsv,
  tradesToCsv,
} from '../backtest/reporter.js';
import type { BacktestOptions, BacktestResult } from '../backtest/types.js';
import type { ConfigManager } from '../config/manager.js';
import { CsvPriceStore } from '../data/price-store.js';
import { YahooFinanceClient } from '../data/yahoo-finance.js';
import { TelegramNotifier } from '../monitoring/telegram.js';
import { AlertExporter } from '../signals/exporter.js';
import { SignalScanner } from '../signals/scanner.js';
import type { SignalAlert } from '../signals/types.js';
import { DEFAULT_GRIDS, type StrategyRegistry, createDefaultRegistry, getStrategyFactory } from '../strategies/registry.js';
import { createLogger } from '../utils/logger.js';
import { Scheduler, timeToCron } from './scheduler.js';

const log = createLogger('signal-bench');

export interface SignalBenchDeps {
  config: ConfigManager;
  yahoo?: YahooFinanceClient;
  telegram?: TelegramNotifier;
  registry?: StrategyRegistry;
  /** Where human-readable reports go. Defaults to stdout. */
  output?: (text: string) => void;
}

export function backtestOptionsFromConfig(config: ConfigManager): Partial<BacktestOptions> {
  return {
    initialCapital: config.get('backtest.initialCapital'),
    commission: config.get('backtest.commission'),
    slippage: config.get('backtest.slippage'),
    minimumBars: config.get('backtest.minimumBars'),
    tradingPeriodsPerYear: config.get('backtest.tradingPeriodsPerYear'),
    riskFreeRate: config.get('backtest.riskFreeRate'),
  };
}

export function indicatorSettingsFromConfig(config: ConfigManager): Partial<IndicatorSettings> {
  return {
    macdFast: config.get('analysis.macd.fast'),
    macdSlow: config.get('analysis.macd.slow'),
    macdSignal: config.get('analysis.macd.signal'),
    bbStdDev: config.get('analysis.bb.stdDev'),
    keltnerMultiplier: config.get('analysis.keltner.multiplier'),
  };
}

/**
 * The command-line workflows wired to configuration: fetching prices,
 * backtesting, ranking, optimizing and the daily scan.
 */
export class SignalBench {
  private readonly config: ConfigManager;
  private readonly store: CsvPriceStore;
  private readonly loader: BacktestDataLoader;
  private readonly registry: StrategyRegistry;
  private readonly telegram: TelegramNotifier | null;
  private readonly output: (text: string) => void;

  constructor(deps: SignalBenchDeps) {
    this.config = deps.config;
    this.store = new CsvPriceStore(this.config.get('data.dir'));
    const yahoo =
      deps.yahoo ??
      new YahooFinanceClient({
        defaultDays: this.config.get('data.historicalDays'),
        timeoutMs: this.config.get('data.requestTimeoutMs'),
      });
    this.loader = new BacktestDataLoader(this.store, yahoo, indicatorSettingsFromConfig(this.config));
    this.registry = deps.registry ?? createDefaultRegistry();
    this.telegram = this.config.get('telegram.enabled') ? (deps.telegram ?? new TelegramNotifier()) : null;
    this.output = deps.output ?? ((text) => process.stdout.write(`${text}\n`));
  }

  private async resolveSymbols(symbols?: readonly string[]): Promise<string[]> {
    if (symbols && symbols.length > 0) return [...symbols];
    const configured = this.config.get('data.symbols');
    if (configured.length > 0) return configured;
    return this.store.listSymbols();
  }

  /** Refreshes stored prices from Yahoo. Returns new dates per symbol. */
  async fetch(symbols?: readonly string[]): Promise<Map<string, number>> {
    const targets = await this.resolveSymbols(symbols);
    if (targets.length === 0) {
      throw new ConfigurationError('No symbols to fetch: pass --symbol or set data.symbols');
    }

    const days = this.config.get('data.historicalDays');
    const added = new Map<string, number>();
    for (const symbol of targets) {
      added.set(symbol, await this.loader.refresh(symbol, days));
    }
    log.info({ symbols: targets.length }, 'Fetch complete');
    return added;
  }

  async backtest(symbol: string, strategyName: string): Promise<BacktestResult> {
    const strategy = this.registry.get(strategyName);
    const bars = await this.loader.loadBars(symbol);
    const result = new BacktestEngine({
      strategy,
      symbol,
      options: backtestOptionsFromConfig(this.config),
    }).run(bars);
    this.output(generateSummary(result));

    const base = `backtest_${symbol.toUpperCase()}_${strategy.name}`;
    await this.writeOutput(`${base}.json`, reportToJson(result));
    await this.writeOutput(`${base}_trades.csv`, tradesToCsv(result));
    return result;
  }

  async rank(symbol: string, metric?: RankingMetric): Promise<RankingReport> {
    const bars = await this.loader.loadBars(symbol);
    const report = rankStrategies(bars, this.registry.list(), {
      symbol,
      metric: metric ?? this.config.get('ranking.metric'),
      tieBreaker: this.config.get('ranking.tieBreaker'),
      minimumTrades: this.config.get('ranking.minimumTrades'),
      backtest: backtestOptionsFromConfig(this.config),
    });

    this.output(generateRankingTable(report));
    await this.writeOutput(`ranking_${symbol.toUpperCase()}.csv`, resultsToCsv(report));
    if (this.telegram) {
      await this.telegram.sendRanking(report, this.config.get('ranking.top'));
    }
    return report;
  }

  async optimize(symbol: string, strategyName: string, metric?: RankingMetric): Promise<OptimizationReport> {
    const grid = DEFAULT_GRIDS[strategyName];
    if (!grid) {
      throw new ConfigurationError(`No parameter grid for strategy: ${strategyName}`, {
        available: Object.keys(DEFAULT_GRIDS),
      });
    }
    const build = getStrategyFactory(strategyName);
    const bars = await this.loader.loadBars(symbol);

    const report = optimizeParameters({
      bars,
      symbol,
      grid,
      build,
      ranking: {
        metric: metric ?? this.config.get('ranking.metric'),
        tieBreaker: this.config.get('ranking.tieBreaker'),
        minimumTrades: this.config.get('ranking.minimumTrades'),
        backtest: backtestOptionsFromConfig(this.config),
      },
    });
    this.output(generateRankingTable(report));
    return report;
  }

  /** Scans every stored symbol, exports the alerts and notifies Telegram. */
  async scan(): Promise<SignalAlert[]> {
    const symbols = await this.resolveSymbols();
    if (this.config.get('scan.refresh')) {
      for (const symbol of symbols) {
        await this.loader.refresh(symbol, this.config.get('data.historicalDays'));
      }
    }

    const data = await this.loader.loadMultiple(symbols);
    const strategies = this.registry.select(this.config.get('scan.strategies'));
    const scanner = new SignalScanner({
      minimumTrades: this.config.get('scan.minimumTrades'),
      minConfidence: this.config.get('scan.minConfidence'),
      backtest: backtestOptionsFromConfig(this.config),
    });

    const alerts = scanner.scanAll(data, strategies);
    await new AlertExporter(this.config.get('scan.outputDir')).export(alerts);
    if (this.telegram) {
      await this.telegram.sendAlerts(alerts);
    }

    log.info({ symbols: data.size, alerts: alerts.length }, 'Scan complete');
    return alerts;
  }

  /** Registers the daily scan. The caller owns the returned scheduler. */
  schedule(scheduler = new Scheduler()): Scheduler {
    const time = this.config.get('scan.time');
    scheduler.registerJob('daily-scan', timeToCron(time), async () => {
      await this.scan();
    });
    log.info({ time }, 'Daily scan scheduled');
    return scheduler;
  }

  private async writeOutput(fileName: string, content: string): Promise<string> {
    const dir = this.config.get('scan.outputDir');
    await mkdir(dir, { recursive: true });
    const path = join(dir, fileName);
    await writeFile(path, content, 'utf-8');
    return path;
  }
}
