import 'dotenv/config';

// --- Runtime ---
export const NODE_ENV = String(process.env.NODE_ENV || 'development').trim();
export const IS_PRODUCTION = NODE_ENV === 'production';

// --- Warehouse ---
export const DATABASE_URL = String(process.env.DATABASE_URL || '').trim();
export const DB_POOL_MAX = Math.max(1, Number(process.env.DB_POOL_MAX) || 5);
export const DB_STATEMENT_TIMEOUT_MS = Math.max(1_000, Number(process.env.DB_STATEMENT_TIMEOUT_MS) || 30_000);

// --- Watermark policy ---
export const MAX_CONSECUTIVE_FAILURES = Math.max(1, Math.floor(Number(process.env.MAX_CONSECUTIVE_FAILURES) || 5));
export const LAST_ERROR_MAX_LENGTH = 2000;

// --- Batch invocation defaults ---
export const DEFAULT_BATCH_SIZE = 50;
export const DEFAULT_FETCH_CONCURRENCY = 1;
export const MAX_FETCH_CONCURRENCY = 64;
export const DEFAULT_RUN_MAX_ERROR_RATE = 0.5;
export const DEFAULT_RUN_MIN_ATTEMPTS = 10;
export const RUN_FAILED_SYMBOLS_REPORT_LIMIT = 25;

// --- Artifacts ---
export const RUN_SUMMARY_PATH = String(process.env.RUN_SUMMARY_PATH || '').trim();
export const RUN_METRICS_PATH = String(process.env.RUN_METRICS_PATH || '').trim();

// --- Fetch-and-load collaborator ---
export const FETCH_LOAD_URL = String(process.env.FETCH_LOAD_URL || '').trim();
export const FETCH_LOAD_TIMEOUT_MS = Math.max(1_000, Number(process.env.FETCH_LOAD_TIMEOUT_MS) || 120_000);

/**
 * Raw batch invocation values taken from the environment. Validation and
 * defaults live in lib/schemas.ts so CLI flags and env share one schema.
 */
export function readRunOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const mapping: Record<string, string> = {
    target: 'WATERMARK_TARGET',
    exchangeFilter: 'EXCHANGE_FILTER',
    maxSymbols: 'MAX_SYMBOLS',
    batchSize: 'BATCH_SIZE',
    skipRecentHours: 'SKIP_RECENT_HOURS',
    concurrency: 'FETCH_CONCURRENCY',
    maxErrorRate: 'RUN_MAX_ERROR_RATE',
    minAttempts: 'RUN_MIN_ATTEMPTS',
  };
  const raw: Record<string, string> = {};
  for (const [key, envName] of Object.entries(mapping)) {
    const value = String(env[envName] ?? '').trim();
    if (value) raw[key] = value;
  }
  return raw;
}

// --- Startup validation ---
export function validateStartupEnvironment(
  options: { requireFetchLoader?: boolean } = {},
  env: NodeJS.ProcessEnv = process.env,
) {
  const errors: string[] = [];
  const warnings: string[] = [];
  const requireNonEmpty = (name: string) => {
    if (!String(env[name] || '').trim()) {
      errors.push(`${name} is required`);
    }
  };
  const warnIfInvalidPositiveNumber = (name: string) => {
    const raw = env[name];
    if (raw === undefined || raw === '') return;
    const numeric = Number(raw);
    if (!Number.isFinite(numeric) || numeric <= 0) {
      warnings.push(`${name} should be a positive number (received: ${String(raw)})`);
    }
  };

  requireNonEmpty('DATABASE_URL');
  if (options.requireFetchLoader) {
    requireNonEmpty('FETCH_LOAD_URL');
  }
  if (!String(env.RUN_SUMMARY_PATH || '').trim()) {
    warnings.push('RUN_SUMMARY_PATH is not set; the run summary is only logged');
  }

  ['DB_POOL_MAX', 'DB_STATEMENT_TIMEOUT_MS', 'MAX_CONSECUTIVE_FAILURES', 'FETCH_LOAD_TIMEOUT_MS', 'SLOW_QUERY_THRESHOLD_MS'].forEach(
    warnIfInvalidPositiveNumber,
  );

  for (const warning of warnings) {
    console.warn(`[startup-env] ${warning}`);
  }
  if (errors.length > 0) {
    for (const error of errors) {
      console.error(`[startup-env] ${error}`);
    }
    throw new Error('Startup environment validation failed');
  }
  return { warnings };
}
