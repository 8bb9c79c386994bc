import { z } from 'zod';
import { RANKING_METRICS } from '../backtest/ranking.js';

// ── Data ─────────────────────────────────────────────────────────────────────
const dataSchemas = {
  'data.dir': z.string().min(1),
  'data.symbols': z.array(z.string().min(1)),
  'data.historicalDays': z.number().int().min(30).max(3650),
  'data.requestTimeoutMs': z.number().int().min(1000).max(120_000),
};

// ── Analysis ─────────────────────────────────────────────────────────────────
const analysisSchemas = {
  'analysis.macd.fast': z.number().int().min(2).max(200),
  'analysis.macd.slow': z.number().int().min(2).max(200),
  'analysis.macd.signal': z.number().int().min(2).max(200),
  'analysis.bb.stdDev': z.number().min(0.1).max(10),
  'analysis.keltner.multiplier': z.number().min(0.1).max(10),
};

// ── Backtest ─────────────────────────────────────────────────────────────────
const backtestSchemas = {
  'backtest.initialCapital': z.number().positive(),
  'backtest.commission': z.number().min(0),
  'backtest.slippage': z.number().min(0).lt(1),
  'backtest.minimumBars': z.number().int().min(1),
  'backtest.tradingPeriodsPerYear': z.number().int().positive(),
  'backtest.riskFreeRate': z.number().min(0).max(1),
};

// ── Ranking ──────────────────────────────────────────────────────────────────
const rankingSchemas = {
  'ranking.metric': z.enum(RANKING_METRICS),
  'ranking.tieBreaker': z.enum(RANKING_METRICS),
  'ranking.minimumTrades': z.number().int().min(0),
  'ranking.top': z.number().int().min(1).max(100),
};

// ── Scan ─────────────────────────────────────────────────────────────────────
const scanSchemas = {
  'scan.strategies': z.array(z.string().min(1)),
  'scan.minimumTrades': z.number().int().min(0),
  'scan.minConfidence': z.enum(['LOW', 'MEDIUM', 'HIGH']),
  'scan.outputDir': z.string().min(1),
  'scan.time': z.string().regex(/^\d{1,2}:\d{2}$/),
  'scan.refresh': z.boolean(),
};

// ── Notifications ────────────────────────────────────────────────────────────
const telegramSchemas = {
  'telegram.enabled': z.boolean(),
};

export const CONFIG_SCHEMAS = {
  ...dataSchemas,
  ...analysisSchemas,
  ...backtestSchemas,
  ...rankingSchemas,
  ...scanSchemas,
  ...telegramSchemas,
} satisfies Record<string, z.ZodTypeAny>;

export type ConfigKey = keyof typeof CONFIG_SCHEMAS;
export type ConfigValue<K extends ConfigKey> = z.infer<(typeof CONFIG_SCHEMAS)[K]>;

export function isConfigKey(key: string): key is ConfigKey {
  return Object.prototype.hasOwnProperty.call(CONFIG_SCHEMAS, key);
}

/**
 * Look up the Zod schema for a given config key.
 * Returns undefined for unknown keys.
 */
export function getConfigSchema(key: string): z.ZodTypeAny | undefined {
  return isConfigKey(key) ? CONFIG_SCHEMAS[key] : undefined;
}

/**
 * Validate a value against the schema for the given config key.
 * Unknown keys are considered valid (forward-compatibility).
 */
export function validateConfigValue(
  key: string,
  value: unknown,
): { valid: boolean; error?: string } {
  const schema = getConfigSchema(key);
  if (!schema) {
    return { valid: true };
  }

  const result = schema.safeParse(value);
  if (result.success) {
    return { valid: true };
  }

  const messages = result.error.issues.map((i) => i.message).join('; ');
  return { valid: false, error: messages };
}
