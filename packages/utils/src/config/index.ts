/**
 * Configuration loading from environment variables
 *
 * Provides typed settings groups for risk limits, broker selection,
 * provider credentials, data-quality thresholds, retry behaviour and logging.
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

export type Env = Record<string, string | undefined>;

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .optional()
    .transform((value) => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

const commaList = (fallback: string[]) =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined
        ? fallback
        : value
            .split(',')
            .map((item) => item.trim())
            .filter((item) => item.length > 0)
    );

const AppSettingsSchema = z.object({
  APP_ENV: z.string().min(1).default('development'),
  ALLOW_NON_PROD_EXECUTION: booleanFlag(false),
});

const RiskSettingsSchema = z.object({
  RISK_MAX_TRADE_NOTIONAL: z.coerce.number().positive().default(10000),
  RISK_MAX_PORTFOLIO_EXPOSURE: z.coerce.number().positive().default(0.5),
  RISK_MAX_POSITION_PER_SYMBOL: z.coerce.number().positive().default(0.25),
  RISK_MAX_DRAWDOWN_THRESHOLD: z.coerce.number().positive().max(1).default(0.25),
  RISK_BLACKLIST: commaList([]),
  RISK_FALLBACK_REFERENCE_PRICE: z.coerce.number().positive().default(100),
  RISK_WARNING_SCORE: z.coerce.number().min(0).max(1).default(0.7),
});

const BrokerSettingsSchema = z.object({
  BROKER_PRIMARY: z.string().min(1).default('alpaca'),
  BROKER_FAILOVER_ENABLED: booleanFlag(true),
  BROKER_FAILOVER_LIST: commaList(['paper']),
  BROKER_HEALTH_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  BROKER_FILL_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  BROKER_FILL_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
});

const AlpacaSettingsSchema = z.object({
  ALPACA_API_KEY: z.string().optional(),
  ALPACA_SECRET_KEY: z.string().optional(),
  ALPACA_BASE_URL: z.string().url().default('https://paper-api.alpaca.markets'),
});

const DataQualitySettingsSchema = z.object({
  DATA_QUALITY_GAP_THRESHOLD_DAYS: z.coerce.number().positive().default(3),
  DATA_QUALITY_OUTLIER_THRESHOLD_PCT: z.coerce.number().positive().default(0.1),
});

const LoggingSettingsSchema = z.object({
  NODE_ENV: z.string().optional(),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug', 'trace']).optional(),
  LOG_CONSOLE: booleanFlag(true),
  LOG_FILE: booleanFlag(true),
  LOG_DIR: z.string().optional(),
  LOG_MAX_FILES: z.string().default('14d'),
  LOG_MAX_SIZE: z.string().default('20m'),
});

const RetrySettingsSchema = z.object({
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),
});

export interface AppSettings {
  env: string;
  allowNonProdExecution: boolean;
}

export interface RiskSettings {
  maxTradeNotional: number;
  maxPortfolioExposure: number;
  maxPositionPerSymbol: number;
  maxDrawdownThreshold: number;
  blacklist: string[];
  fallbackReferencePrice: number;
  warningScore: number;
}

export interface BrokerSettings {
  primary: string;
  failoverEnabled: boolean;
  failoverList: string[];
  healthCheckTimeoutMs: number;
  fillTimeoutMs: number;
  fillPollIntervalMs: number;
}

export interface AlpacaSettings {
  apiKey?: string;
  secretKey?: string;
  baseUrl: string;
}

export interface DataQualitySettings {
  gapThresholdDays: number;
  outlierThresholdPct: number;
}

export type LogLevelName = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LoggingSettings {
  level: LogLevelName;
  /** JSON console output instead of the colorized development format */
  json: boolean;
  console: boolean;
  /** Daily-rotated files; never under NODE_ENV=test */
  file: boolean;
  dir: string;
  maxFiles: string;
  maxSize: string;
}

export interface RetrySettings {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface Settings {
  app: AppSettings;
  risk: RiskSettings;
  broker: BrokerSettings;
  alpaca: AlpacaSettings;
  dataQuality: DataQualitySettings;
  retry: RetrySettings;
  logging: LoggingSettings;
}

function parseGroup<T extends z.ZodTypeAny>(schema: T, env: Env): z.output<T> {
  // Blank values count as unset so that `KEY=` in a .env file falls back to the default
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const result = schema.safeParse(cleaned);
  if (!result.success) {
    const issue = result.error.issues[0];
    const key = issue?.path.join('.') ?? 'unknown';
    throw new ConfigurationError(
      `Invalid value for ${key}: ${issue?.message ?? 'invalid configuration'}`,
      key,
      { value: env[key] }
    );
  }
  return result.data;
}

/**
 * Load risk limits from environment variables
 */
export function getRiskSettings(env: Env = process.env): RiskSettings {
  const raw = parseGroup(RiskSettingsSchema, env);
  return {
    maxTradeNotional: raw.RISK_MAX_TRADE_NOTIONAL,
    maxPortfolioExposure: raw.RISK_MAX_PORTFOLIO_EXPOSURE,
    maxPositionPerSymbol: raw.RISK_MAX_POSITION_PER_SYMBOL,
    maxDrawdownThreshold: raw.RISK_MAX_DRAWDOWN_THRESHOLD,
    blacklist: raw.RISK_BLACKLIST.map((symbol) => symbol.toUpperCase()),
    fallbackReferencePrice: raw.RISK_FALLBACK_REFERENCE_PRICE,
    warningScore: raw.RISK_WARNING_SCORE,
  };
}

/**
 * Load broker selection and fill-verification settings
 */
export function getBrokerSettings(env: Env = process.env): BrokerSettings {
  const raw = parseGroup(BrokerSettingsSchema, env);
  return {
    primary: raw.BROKER_PRIMARY,
    failoverEnabled: raw.BROKER_FAILOVER_ENABLED,
    failoverList: raw.BROKER_FAILOVER_LIST,
    healthCheckTimeoutMs: raw.BROKER_HEALTH_CHECK_TIMEOUT_MS,
    fillTimeoutMs: raw.BROKER_FILL_TIMEOUT_MS,
    fillPollIntervalMs: raw.BROKER_FILL_POLL_INTERVAL_MS,
  };
}

/**
 * Load Alpaca API configuration. Credentials stay optional here; the broker
 * reports missing credentials as an auth error when it is first used.
 */
export function getAlpacaSettings(env: Env = process.env): AlpacaSettings {
  const raw = parseGroup(AlpacaSettingsSchema, env);
  return {
    apiKey: raw.ALPACA_API_KEY,
    secretKey: raw.ALPACA_SECRET_KEY,
    baseUrl: raw.ALPACA_BASE_URL,
  };
}

export function getDataQualitySettings(env: Env = process.env): DataQualitySettings {
  const raw = parseGroup(DataQualitySettingsSchema, env);
  return {
    gapThresholdDays: raw.DATA_QUALITY_GAP_THRESHOLD_DAYS,
    outlierThresholdPct: raw.DATA_QUALITY_OUTLIER_THRESHOLD_PCT,
  };
}

export function getRetrySettings(env: Env = process.env): RetrySettings {
  const raw = parseGroup(RetrySettingsSchema, env);
  if (raw.RETRY_MAX_DELAY_MS < raw.RETRY_BASE_DELAY_MS) {
    throw new ConfigurationError(
      'RETRY_MAX_DELAY_MS must not be smaller than RETRY_BASE_DELAY_MS',
      'RETRY_MAX_DELAY_MS'
    );
  }
  return {
    maxAttempts: raw.RETRY_MAX_ATTEMPTS,
    baseDelayMs: raw.RETRY_BASE_DELAY_MS,
    maxDelayMs: raw.RETRY_MAX_DELAY_MS,
  };
}

export function getAppSettings(env: Env = process.env): AppSettings {
  const raw = parseGroup(AppSettingsSchema, env);
  return {
    env: raw.APP_ENV,
    allowNonProdExecution: raw.ALLOW_NON_PROD_EXECUTION,
  };
}

/**
 * Logger settings: debug outside production unless LOG_LEVEL says otherwise
 */
export function getLoggingSettings(env: Env = process.env, cwd: string = process.cwd()): LoggingSettings {
  const raw = parseGroup(LoggingSettingsSchema, env);
  const production = raw.NODE_ENV === 'production';
  return {
    level: raw.LOG_LEVEL ?? (production ? 'info' : 'debug'),
    json: production,
    console: raw.LOG_CONSOLE,
    file: raw.LOG_FILE && raw.NODE_ENV !== 'test',
    dir: raw.LOG_DIR ?? path.join(cwd, 'logs'),
    maxFiles: raw.LOG_MAX_FILES,
    maxSize: raw.LOG_MAX_SIZE,
  };
}

/**
 * Load every settings group at once
 */
export function loadSettings(env: Env = process.env): Settings {
  return {
    app: getAppSettings(env),
    risk: getRiskSettings(env),
    broker: getBrokerSettings(env),
    alpaca: getAlpacaSettings(env),
    dataQuality: getDataQualitySettings(env),
    retry: getRetrySettings(env),
    logging: getLoggingSettings(env),
  };
}
