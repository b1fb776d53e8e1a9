/**
 * Environment configuration for a spend run.
 * Call dotenv's config() before loadSpendConfig() to pick up a .env file.
 */

import { FeeRange, SpendConfigError } from '../types/SpendTypes';
import { feeRangeFromCommission } from './feeSampler';
import { feeRangeErrors } from './spendLedger';
import { LogLevel, parseLogLevel } from './logger';

export interface SpendConfig {
  /** Funding wallet WIF; absent only in dry-run mode */
  fundingWIF?: string;
  token: string;
  totalAmount: number;
  maxTransactions: number;
  workerCount: number;
  price: number;
  feeRange: FeeRange;
  reserveFeeHeadroom: boolean;
  minTransactionAmount: number;
  transientBackoffMs: number;
  apiBaseUrl?: string;
  apiKey?: string;
  rateLimit: number;
  dryRun: boolean;
  simulatedFailureRate: number;
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function requireEnv(env: Env, name: string): string {
  const value = readEnv(env, name);
  if (value === undefined) {
    throw new SpendConfigError(`${name} not set`);
  }
  return value;
}

function parseInteger(name: string, raw: string, min: number): number {
  const value = Number(raw);
  if (!/^-?\d+$/.test(raw) || !Number.isSafeInteger(value) || value < min) {
    const kind = min > 0 ? 'a positive integer' : 'a non-negative integer';
    throw new SpendConfigError(`${name} should be ${kind}`);
  }
  return value;
}

function requireInteger(env: Env, name: string, min: number): number {
  return parseInteger(name, requireEnv(env, name), min);
}

function optionalInteger(env: Env, name: string, min: number, fallback: number): number {
  const raw = readEnv(env, name);
  return raw === undefined ? fallback : parseInteger(name, raw, min);
}

function optionalNumber(env: Env, name: string, fallback: number, valid: (value: number) => boolean, expected: string): number {
  const raw = readEnv(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || !valid(value)) {
    throw new SpendConfigError(`${name} should be ${expected}`);
  }
  return value;
}

function optionalBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = readEnv(env, name);
  if (raw === undefined) return fallback;
  switch (raw.toLowerCase()) {
    case 'true': case '1': case 'yes': return true;
    case 'false': case '0': case 'no': return false;
    default: throw new SpendConfigError(`${name} should be true or false`);
  }
}

/**
 * Fee range from FEE_MIN/FEE_MAX, or from COMMISSION +/- COMMISSION_CHANGE.
 */
function loadFeeRange(env: Env): FeeRange {
  let range: FeeRange;
  if (readEnv(env, 'FEE_MIN') !== undefined || readEnv(env, 'FEE_MAX') !== undefined) {
    range = {
      min: requireInteger(env, 'FEE_MIN', 0),
      max: requireInteger(env, 'FEE_MAX', 0),
    };
  } else if (readEnv(env, 'COMMISSION') !== undefined) {
    range = feeRangeFromCommission(
      requireInteger(env, 'COMMISSION', 0),
      optionalInteger(env, 'COMMISSION_CHANGE', 0, 0)
    );
  } else {
    throw new SpendConfigError('FEE_MIN/FEE_MAX or COMMISSION not set');
  }

  const errors = feeRangeErrors(range.min, range.max);
  if (errors.length > 0) {
    throw new SpendConfigError(`Invalid fee range: ${errors.join('; ')}`);
  }
  return range;
}

/**
 * Parse and validate the spend configuration.
 * @throws SpendConfigError naming the first missing or malformed variable
 */
export function loadSpendConfig(env: Env = process.env): SpendConfig {
  const dryRun = optionalBoolean(env, 'DRY_RUN', false);

  const config: SpendConfig = {
    fundingWIF: dryRun ? readEnv(env, 'FUNDING_WIF') : requireEnv(env, 'FUNDING_WIF'),
    token: requireEnv(env, 'TOKEN'),
    totalAmount: requireInteger(env, 'TOTAL_AMOUNT', 1),
    maxTransactions: requireInteger(env, 'MAX_TRANSACTIONS', 1),
    workerCount: requireInteger(env, 'MAX_THREADS', 1),
    price: requireInteger(env, 'PRICE', 1),
    feeRange: loadFeeRange(env),
    reserveFeeHeadroom: optionalBoolean(env, 'RESERVE_FEE_HEADROOM', true),
    minTransactionAmount: optionalInteger(env, 'MIN_TRANSACTION_AMOUNT', 1, 1),
    transientBackoffMs: optionalInteger(env, 'TRANSIENT_BACKOFF_MS', 0, 250),
    apiBaseUrl: dryRun ? readEnv(env, 'API_BASE_URL') : requireEnv(env, 'API_BASE_URL'),
    apiKey: dryRun ? readEnv(env, 'API_KEY') : requireEnv(env, 'API_KEY'),
    rateLimit: optionalNumber(env, 'RATE_LIMIT', 32, value => value > 0, 'a positive number'),
    dryRun,
    simulatedFailureRate: optionalNumber(
      env,
      'SIMULATED_FAILURE_RATE',
      0.1,
      value => value >= 0 && value <= 1,
      'a number between 0 and 1'
    ),
    logLevel: parseLogLevel(readEnv(env, 'LOG_LEVEL')),
  };

  return config;
}

/**
 * Config with the wallet key masked, safe to log.
 */
export function describeSpendConfig(config: SpendConfig): Record<string, unknown> {
  return {
    ...config,
    fundingWIF: config.fundingWIF ? '***' : undefined,
    apiKey: config.apiKey ? '***' : undefined,
    logLevel: LogLevel[config.logLevel],
  };
}
