// ═══════════════════════════════════════════════════════════════════════════════
// CREDENTIALS — Provider API Keys from Config File and Environment
// ═══════════════════════════════════════════════════════════════════════════════
//
// Sources are consulted in order; the first one holding a key wins.
// The default store reads the local config file's `apiKeys` block first,
// then falls back to environment variables.
//
// ═══════════════════════════════════════════════════════════════════════════════

import { z } from 'zod';
import { ConfigError, readConfigFile, resolveConfigFile, type LoadConfigOptions } from './loader.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Providers that need an API key. The mock provider needs none.
 */
export const CREDENTIAL_NAMES = ['anthropic', 'openai', 'gemini', 'deepseek'] as const;
export type CredentialName = typeof CREDENTIAL_NAMES[number];

export const ApiKeysSchema = z.object({
  anthropic: z.string().optional(),
  openai: z.string().optional(),
  gemini: z.string().optional(),
  deepseek: z.string().optional(),
});

export type ApiKeys = z.infer<typeof ApiKeysSchema>;

/**
 * A place credentials can come from.
 */
export interface CredentialSource {
  /** Source name for logging/debugging */
  readonly name: string;

  /** The key for a provider, or undefined when this source has none */
  getCredential(provider: CredentialName): string | undefined;
}

function nonBlank(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== '' ? value.trim() : undefined;
}

// ─────────────────────────────────────────────────────────────────────────────────
// ENVIRONMENT SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Environment variable names per provider, checked in order.
 */
export const ENV_VAR_MAPPING: Record<CredentialName, readonly string[]> = {
  anthropic: ['ANTHROPIC_API_KEY'],
  openai: ['OPENAI_API_KEY'],
  gemini: ['GOOGLE_API_KEY', 'GEMINI_API_KEY'],
  deepseek: ['DEEPSEEK_API_KEY'],
};

export class EnvironmentCredentialSource implements CredentialSource {
  readonly name = 'environment';
  private readonly env: NodeJS.ProcessEnv;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.env = env;
  }

  getCredential(provider: CredentialName): string | undefined {
    for (const variable of ENV_VAR_MAPPING[provider]) {
      const value = nonBlank(this.env[variable]);
      if (value) return value;
    }
    return undefined;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CONFIG FILE SOURCE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Reads the `apiKeys` block of the local JSON config file, once.
 */
export class FileCredentialSource implements CredentialSource {
  readonly name = 'config-file';
  private readonly filePath: string;
  private keys: ApiKeys | null = null;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  getCredential(provider: CredentialName): string | undefined {
    return nonBlank(this.load()[provider]);
  }

  private load(): ApiKeys {
    if (this.keys) {
      return this.keys;
    }

    const result = ApiKeysSchema.safeParse(readConfigFile(this.filePath).apiKeys ?? {});
    if (!result.success) {
      throw new ConfigError(
        `Invalid apiKeys in ${this.filePath}`,
        result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    this.keys = result.data;
    return this.keys;
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// MOCK SOURCE (for testing)
// ─────────────────────────────────────────────────────────────────────────────────

export class MockCredentialSource implements CredentialSource {
  readonly name = 'mock';
  private readonly keys: Map<CredentialName, string>;

  constructor(keys: Partial<Record<CredentialName, string>> = {}) {
    this.keys = new Map();
    for (const provider of CREDENTIAL_NAMES) {
      const value = keys[provider];
      if (value !== undefined) {
        this.keys.set(provider, value);
      }
    }
  }

  getCredential(provider: CredentialName): string | undefined {
    return this.keys.get(provider);
  }

  setCredential(provider: CredentialName, value: string): void {
    this.keys.set(provider, value);
  }

  removeCredential(provider: CredentialName): void {
    this.keys.delete(provider);
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// CREDENTIAL STORE
// ─────────────────────────────────────────────────────────────────────────────────

export class CredentialStore {
  private readonly sources: readonly CredentialSource[];

  constructor(sources: readonly CredentialSource[]) {
    this.sources = sources;
  }

  /**
   * Get a provider's key, or null when no source has one.
   */
  get(provider: CredentialName): string | null {
    for (const source of this.sources) {
      const value = source.getCredential(provider);
      if (value !== undefined) return value;
    }
    return null;
  }

  has(provider: CredentialName): boolean {
    return this.get(provider) !== null;
  }

  /**
   * Name of the source that supplies a provider's key.
   */
  sourceOf(provider: CredentialName): string | null {
    const source = this.sources.find((candidate) => candidate.getCredential(provider) !== undefined);
    return source?.name ?? null;
  }

  getSourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }
}

/**
 * Create the default store: config file first, environment second.
 */
export function createCredentialStore(options: LoadConfigOptions = {}): CredentialStore {
  return new CredentialStore([
    new FileCredentialSource(resolveConfigFile(options)),
    new EnvironmentCredentialSource(options.env ?? process.env),
  ]);
}
