// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA — Zod Validation for Application Settings
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every section has defaults, so `AppConfigSchema.parse({})` yields a complete
// configuration. Sources are merged in the loader: defaults ← config file ← env.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z, type ZodError } from 'zod';
import { UNIT_SYSTEMS } from '../types/records.js';

// ─────────────────────────────────────────────────────────────────────────────────
// ENUMS
// ─────────────────────────────────────────────────────────────────────────────────

export const EnvironmentSchema = z.enum(['development', 'test', 'production']);
export type Environment = z.infer<typeof EnvironmentSchema>;

export const PROVIDER_NAMES = ['anthropic', 'openai', 'gemini', 'deepseek', 'mock'] as const;
export const ProviderNameSchema = z.enum(PROVIDER_NAMES);
export type ProviderName = z.infer<typeof ProviderNameSchema>;

export const UnitSystemSchema = z.enum(UNIT_SYSTEMS);

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

// ─────────────────────────────────────────────────────────────────────────────────
// SECTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  host: z.string().min(1).default('0.0.0.0'),
  /** Largest accepted upload body */
  maxUploadBytes: z.number().int().positive().default(20 * 1024 * 1024),
});

export const LlmConfigSchema = z.object({
  provider: ProviderNameSchema.default('anthropic'),
  /** Model id; the provider's default model when absent */
  model: z.string().min(1).optional(),
  maxOutputTokens: z.number().int().positive().default(4096),
  temperature: z.number().min(0).max(2).default(0),
});

export const BatchConfigSchema = z.object({
  charsPerToken: z.number().positive().default(4),
  sampleSize: z.number().int().positive().default(50),
  reservedTokens: z.number().int().nonnegative().default(5000),
  safetyFactor: z.number().gt(0).max(1).default(0.6),
  minBatchSize: z.number().int().positive().default(10),
  maxBatchSize: z.number().int().positive().default(100),
  defaultBatchSize: z.number().int().positive().default(50),
}).refine(
  (batch) => batch.minBatchSize <= batch.maxBatchSize,
  { message: 'minBatchSize must not exceed maxBatchSize', path: ['minBatchSize'] }
);

export const ConversionConfigSchema = z.object({
  unitSystem: UnitSystemSchema.default('metric'),
});

export const StorageConfigSchema = z.object({
  /** Directory holding history, templates and the work-in-progress snapshot */
  dataDir: z.string().min(1).default('./data'),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  /** Pretty output; defaults to true outside production */
  pretty: z.boolean().optional(),
});

// ─────────────────────────────────────────────────────────────────────────────────
// APP CONFIG
// ─────────────────────────────────────────────────────────────────────────────────

export const AppConfigSchema = z.object({
  environment: EnvironmentSchema.default('development'),
  server: ServerConfigSchema.default({}),
  llm: LlmConfigSchema.default({}),
  batch: BatchConfigSchema.default({}),
  conversion: ConversionConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ServerConfig = AppConfig['server'];
export type LlmConfig = AppConfig['llm'];
export type BatchConfig = AppConfig['batch'];

// ─────────────────────────────────────────────────────────────────────────────────
// VALIDATION HELPERS
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Validate raw configuration, throwing a ZodError on failure.
 */
export function validateConfig(raw: unknown): AppConfig {
  return AppConfigSchema.parse(raw);
}

export function safeValidateConfig(raw: unknown): z.SafeParseReturnType<unknown, AppConfig> {
  return AppConfigSchema.safeParse(raw);
}

/**
 * Turn validation issues into `path: message` lines.
 */
export function formatConfigErrors(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function getDefaultConfig(environment: Environment = 'development'): AppConfig {
  return AppConfigSchema.parse({ environment });
}
