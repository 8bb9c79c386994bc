import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';
import { ConfigurationError } from '../backtest/errors.js';
import { createLogger } from '../utils/logger.js';
import { CONFIG_DEFAULTS } from './defaults.js';
import {
  CONFIG_SCHEMAS,
  type ConfigKey,
  type ConfigValue,
  isConfigKey,
} from './schema-validator.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_PATH = 'config/signal-bench.json';

export interface ConfigManagerOptions {
  /** JSON config file. Defaults to $SIGNAL_BENCH_CONFIG, then config/signal-bench.json. */
  configPath?: string;
  env?: Readonly<Record<string, string | undefined>>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flattens nested objects into dotted keys; arrays are values, not branches.
 * { backtest: { commission: 1 } } → { 'backtest.commission': 1 }
 */
export function flattenConfig(obj: Record<string, unknown>, prefix = ''): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (isPlainObject(value)) {
      Object.assign(out, flattenConfig(value, path));
    } else {
      out[path] = value;
    }
  }
  return out;
}

export function loadConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    log.debug({ path }, 'No config file, using defaults');
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, {
      path,
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigurationError(`Config file ${path} must contain a JSON object`, { path });
  }

  const flat = flattenConfig(parsed);
  for (const key of Object.keys(flat)) {
    if (!isConfigKey(key)) log.warn({ key, path }, 'Unknown config key ignored');
  }
  return flat;
}

function parseWith<S extends z.ZodTypeAny>(key: string, schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const messages = result.error.issues.map((i) => i.message).join('; ');
    throw new ConfigurationError(`Invalid value for ${key}: ${messages}`, { key });
  }
  return result.data;
}

/**
 * Layered configuration: built-in defaults, then the JSON config file, then
 * environment variables. Every value is validated against its key's schema
 * when read.
 */
export class ConfigManager {
  private readonly configPath: string;
  private readonly env: Readonly<Record<string, string | undefined>>;
  private fileValues: Record<string, unknown>;

  constructor(options: ConfigManagerOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath ?? this.env.SIGNAL_BENCH_CONFIG ?? DEFAULT_CONFIG_PATH;
    this.fileValues = loadConfigFile(this.configPath);
  }

  reload(): void {
    this.fileValues = loadConfigFile(this.configPath);
    log.info({ path: this.configPath }, 'Config reloaded');
  }

  get<K extends ConfigKey>(key: K): ConfigValue<K> {
    return parseWith(key, CONFIG_SCHEMAS[key], this.resolveRaw(key));
  }

  getAll(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS) {
      result[def.key] = this.get(def.key);
    }
    return result;
  }

  getByCategory(category: string): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const def of CONFIG_DEFAULTS.filter((d) => d.category === category)) {
      result[def.key] = this.get(def.key);
    }
    return result;
  }

  private resolveRaw(key: ConfigKey): unknown {
    const envOverride = this.getEnvOverride(key);
    if (envOverride !== undefined) return envOverride;

    if (Object.prototype.hasOwnProperty.call(this.fileValues, key)) {
      return this.fileValues[key];
    }

    const def = CONFIG_DEFAULTS.find((d) => d.key === key);
    if (def) {
      return JSON.parse(def.value);
    }

    throw new ConfigurationError(`Config key not found: ${key}`, { key });
  }

  /**
   * Converts a config key to an environment variable name.
   * e.g. "backtest.initialCapital" → "BACKTEST_INITIAL_CAPITAL"
   *      "analysis.macd.fast" → "ANALYSIS_MACD_FAST"
   */
  static configKeyToEnvVar(key: string): string {
    return key
      .replace(/\./g, '_')
      .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
      .toUpperCase();
  }

  /**
   * Values are parsed as JSON when possible, otherwise used as raw strings.
   */
  private getEnvOverride(key: string): unknown {
    const envValue = this.env[ConfigManager.configKeyToEnvVar(key)];

    if (envValue === undefined) return undefined;

    try {
      return JSON.parse(envValue);
    } catch {
      // Not JSON: a plain string value such as a directory path
      return envValue;
    }
  }
}

let instance: ConfigManager | null = null;

export function getConfigManager(): ConfigManager {
  if (!instance) {
    instance = new ConfigManager();
  }
  return instance;
}
