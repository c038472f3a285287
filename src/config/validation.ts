/**
 * Environment Configuration Validation
 *
 * Centralized validation of environment variables. Fail-fast: if a variable
 * is missing or malformed the process exits with the list of problems
 * before any database is opened.
 */

/**
 * Defines the shape of the application's configuration.
 */
export interface AppConfig {
  // Required environment variables
  DATABASE_PATH: string;

  // Optional environment variables with defaults
  PORT: number;
  HOST: string;
  NODE_ENV: 'development' | 'production' | 'test';
  LOG_LEVEL: string;
  TRACKED_TABLES_PATH: string;

  // Ledger store resilience
  LEDGER_STORE_TIMEOUT_MS: number;
  LEDGER_APPEND_RETRY_COUNT: number;
  LEDGER_BREAKER_FAILURE_THRESHOLD: number;
  LEDGER_BREAKER_RESET_TIMEOUT_MS: number;

  // Reconciliation
  SYNC_BATCH_SIZE: number;
  SYNC_MAX_PAGES: number;
  SYNC_INTERVAL_MS: number;
}

export type ConfigLoadResult = { ok: true; config: AppConfig } | { ok: false; errors: string[] };

const NODE_ENVS = ['development', 'production', 'test'] as const;

function isNodeEnv(value: string): value is AppConfig['NODE_ENV'] {
  return NODE_ENVS.some((nodeEnv) => nodeEnv === value);
}

/**
 * Holds the validated and loaded configuration for the application.
 */
let loadedConfig: AppConfig | null = null;

/**
 * Reads and validates configuration from `env` without side effects.
 */
export function loadConfig(env: NodeJS.ProcessEnv): ConfigLoadResult {
  const errors: string[] = [];

  const requiredVars = ['DATABASE_PATH'] as const;
  const missingVars = requiredVars.filter((varName) => !env[varName]);
  if (missingVars.length > 0) {
    errors.push('❌ Missing required environment variables:');
    missingVars.forEach((varName) => {
      errors.push(`   - ${varName}`);
    });
  }

  const nodeEnv = env.NODE_ENV || 'development';
  if (!isNodeEnv(nodeEnv)) {
    errors.push(`❌ NODE_ENV must be one of ${NODE_ENVS.join(', ')}: ${nodeEnv}`);
  }

  const parseCount = (name: string, fallback: string, min = 0): number => {
    const value = env[name] || fallback;
    const num = Number(value);
    if (!Number.isInteger(num) || num < min) {
      errors.push(`❌ ${name} must be an integer >= ${min}: ${value}`);
      return min;
    }
    return num;
  };

  const parsedNumeric = {
    PORT: parseCount('PORT', '8890'),
    LEDGER_STORE_TIMEOUT_MS: parseCount('LEDGER_STORE_TIMEOUT_MS', '5000', 1),
    LEDGER_APPEND_RETRY_COUNT: parseCount('LEDGER_APPEND_RETRY_COUNT', '3'),
    LEDGER_BREAKER_FAILURE_THRESHOLD: parseCount('LEDGER_BREAKER_FAILURE_THRESHOLD', '5', 1),
    LEDGER_BREAKER_RESET_TIMEOUT_MS: parseCount('LEDGER_BREAKER_RESET_TIMEOUT_MS', '30000', 1),
    SYNC_BATCH_SIZE: parseCount('SYNC_BATCH_SIZE', '100', 1),
    SYNC_MAX_PAGES: parseCount('SYNC_MAX_PAGES', '50', 1),
    SYNC_INTERVAL_MS: parseCount('SYNC_INTERVAL_MS', '0'),
  };

  const databasePath = env.DATABASE_PATH;
  if (errors.length > 0 || !databasePath || !isNodeEnv(nodeEnv)) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    config: Object.freeze({
      DATABASE_PATH: databasePath,
      PORT: parsedNumeric.PORT,
      HOST: env.HOST || '0.0.0.0',
      NODE_ENV: nodeEnv,
      LOG_LEVEL: env.LOG_LEVEL || 'info',
      TRACKED_TABLES_PATH: env.TRACKED_TABLES_PATH || 'config/tracked-tables.json',
      LEDGER_STORE_TIMEOUT_MS: parsedNumeric.LEDGER_STORE_TIMEOUT_MS,
      LEDGER_APPEND_RETRY_COUNT: parsedNumeric.LEDGER_APPEND_RETRY_COUNT,
      LEDGER_BREAKER_FAILURE_THRESHOLD: parsedNumeric.LEDGER_BREAKER_FAILURE_THRESHOLD,
      LEDGER_BREAKER_RESET_TIMEOUT_MS: parsedNumeric.LEDGER_BREAKER_RESET_TIMEOUT_MS,
      SYNC_BATCH_SIZE: parsedNumeric.SYNC_BATCH_SIZE,
      SYNC_MAX_PAGES: parsedNumeric.SYNC_MAX_PAGES,
      SYNC_INTERVAL_MS: parsedNumeric.SYNC_INTERVAL_MS,
    }),
  };
}

/**
 * Validates the process environment and loads it. On any error, prints the
 * problems and exits so a misconfigured ledger never starts.
 *
 * Call once at startup, after dotenv is loaded.
 */
export function validateAndLoadConfig(): AppConfig {
  if (loadedConfig) {
    return loadedConfig;
  }

  const result = loadConfig(process.env);

  if (!result.ok) {
    console.error('\n╔════════════════════════════════════════════════════════════════╗');
    console.error('║ FATAL ERROR: Environment Configuration Validation Failed      ║');
    console.error('╚════════════════════════════════════════════════════════════════╝\n');
    result.errors.forEach((error) => console.error(error));
    console.error('\n📝 To fix this:');
    console.error('   1. Create a `.env` file in the project root');
    console.error('   2. See `.env.example` for required variables');
    console.error('   3. Set all required environment variables\n');
    process.exit(1);
  }

  loadedConfig = result.config;

  console.log('✅ Environment configuration loaded and validated successfully.');
  console.log(`   - DATABASE_PATH: ${loadedConfig.DATABASE_PATH}`);
  console.log(`   - TRACKED_TABLES_PATH: ${loadedConfig.TRACKED_TABLES_PATH}`);
  console.log(`   - PORT: ${loadedConfig.PORT}`);
  console.log(`   - HOST: ${loadedConfig.HOST}`);
  console.log(`   - NODE_ENV: ${loadedConfig.NODE_ENV}`);
  console.log('   ---');
  console.log('   Ledger Settings:');
  console.log(`   - Store Timeout: ${loadedConfig.LEDGER_STORE_TIMEOUT_MS}ms`);
  console.log(`   - Append Retries: ${loadedConfig.LEDGER_APPEND_RETRY_COUNT}`);
  console.log(`   - Circuit Breaker Threshold: ${loadedConfig.LEDGER_BREAKER_FAILURE_THRESHOLD} failures`);
  console.log(`   - Circuit Breaker Reset: ${loadedConfig.LEDGER_BREAKER_RESET_TIMEOUT_MS}ms`);
  console.log(`   - Sync Batch: ${loadedConfig.SYNC_BATCH_SIZE} rows x ${loadedConfig.SYNC_MAX_PAGES} pages`);
  console.log(`   - Sync Interval: ${loadedConfig.SYNC_INTERVAL_MS ? `${loadedConfig.SYNC_INTERVAL_MS}ms` : 'disabled'}`);

  return loadedConfig;
}

/**
 * Returns the loaded application configuration.
 * On first call, validates and loads the configuration.
 */
export function getConfig(): AppConfig {
  if (!loadedConfig) {
    return validateAndLoadConfig();
  }
  return loadedConfig;
}
