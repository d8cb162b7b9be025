// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION LOADER — Defaults, Config File, Environment Overrides
// ═══════════════════════════════════════════════════════════════════════════════
//
// Precedence (lowest → highest):
//   1. Schema defaults
//   2. Local JSON config file (CONVERTER_CONFIG_FILE, default ./converter.config.json)
//   3. Environment variables
//
// The loaded config is validated once, deep-frozen and cached.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import {
  AppConfigSchema,
  formatConfigErrors,
  type AppConfig,
  type Environment,
} from './schema.js';

export const DEFAULT_CONFIG_FILE = './converter.config.json';

/**
 * Error raised when configuration cannot be read or does not validate.
 */
export class ConfigError extends Error {
  readonly name = 'ConfigError';
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.issues = issues;
  }
}

export interface LoadConfigOptions {
  /** Config file path; overrides CONVERTER_CONFIG_FILE */
  configFile?: string;
  env?: NodeJS.ProcessEnv;
}

type RawObject = Record<string, unknown>;

// ─────────────────────────────────────────────────────────────────────────────────
// HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

function isPlainObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function deepMerge(base: RawObject, override: RawObject): RawObject {
  const merged: RawObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value)
      ? deepMerge(current, value)
      : value;
  }
  return merged;
}

function deepFreeze<T>(value: T): T {
  if (isPlainObject(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Numeric env values are converted here; NaN is left for the schema to reject.
 */
function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envString(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}

/**
 * Resolve which config file the process reads.
 */
export function resolveConfigFile(options: LoadConfigOptions = {}): string {
  const env = options.env ?? process.env;
  return resolve(options.configFile ?? envString(env.CONVERTER_CONFIG_FILE) ?? DEFAULT_CONFIG_FILE);
}

/**
 * Read the raw JSON object from the config file. A missing file yields `{}`.
 */
export function readConfigFile(filePath: string): RawObject {
  if (!existsSync(filePath)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${filePath} is not valid JSON: ${reason}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Environment variables shaped like the config tree.
 */
function readEnvOverrides(env: NodeJS.ProcessEnv): RawObject {
  return {
    environment: envString(env.NODE_ENV),
    server: {
      port: envNumber(env.PORT),
      host: envString(env.HOST),
    },
    llm: {
      provider: envString(env.LLM_PROVIDER),
      model: envString(env.LLM_MODEL),
      maxOutputTokens: envNumber(env.LLM_MAX_OUTPUT_TOKENS),
    },
    batch: {
      charsPerToken: envNumber(env.BATCH_CHARS_PER_TOKEN),
      sampleSize: envNumber(env.BATCH_SAMPLE_SIZE),
      reservedTokens: envNumber(env.BATCH_RESERVED_TOKENS),
      safetyFactor: envNumber(env.BATCH_SAFETY_FACTOR),
      minBatchSize: envNumber(env.BATCH_MIN_SIZE),
      maxBatchSize: envNumber(env.BATCH_MAX_SIZE),
      defaultBatchSize: envNumber(env.BATCH_DEFAULT_SIZE),
    },
    conversion: {
      unitSystem: envString(env.UNIT_SYSTEM),
    },
    storage: {
      dataDir: envString(env.DATA_DIR),
    },
    logging: {
      level: envString(env.LOG_LEVEL)?.toLowerCase(),
    },
  };
}

function parseOrThrow(raw: RawObject, source: string): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration (${source})`, formatConfigErrors(result.error));
  }
  return deepFreeze(result.data);
}

// ─────────────────────────────────────────────────────────────────────────────────
// CACHED CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

let cachedConfig: AppConfig | null = null;

/**
 * Load, validate and cache the configuration. Later calls return the cached object.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const configFile = resolveConfigFile(options);
  const fileValues = readConfigFile(configFile);
  const merged = deepMerge(fileValues, readEnvOverrides(env));

  cachedConfig = parseOrThrow(merged, configFile);
  return cachedConfig;
}

/**
 * Get the loaded configuration.
 * @throws Error when loadConfig() has not run yet
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    throw new Error('Configuration not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

export function isConfigLoaded(): boolean {
  return cachedConfig !== null;
}

/**
 * Reset cached config (for testing).
 */
export function resetConfig(): void {
  cachedConfig = null;
}

export type ConfigOverrides = {
  [K in keyof AppConfig]?: AppConfig[K] extends object ? Partial<AppConfig[K]> : AppConfig[K];
};

/**
 * Build a config from defaults plus overrides, without reading the file or env.
 */
export function loadTestConfig(overrides: ConfigOverrides = {}): AppConfig {
  cachedConfig = parseOrThrow(deepMerge({ environment: 'test' }, { ...overrides }), 'test overrides');
  return cachedConfig;
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONVENIENCE
// ─────────────────────────────────────────────────────────────────────────────────

export function getEnvironment(): Environment {
  return getConfig().environment;
}

export function isProduction(): boolean {
  return getEnvironment() === 'production';
}

export function isDevelopment(): boolean {
  return getEnvironment() === 'development';
}
