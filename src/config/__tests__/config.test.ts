// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION TESTS — Validation, Loading, and Credentials
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  AppConfigSchema,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
} from '../schema.js';
import {
  ConfigError,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  getEnvironment,
  isProduction,
  isDevelopment,
} from '../loader.js';
import {
  CredentialStore,
  EnvironmentCredentialSource,
  FileCredentialSource,
  MockCredentialSource,
  createCredentialStore,
} from '../secrets.js';

// ─────────────────────────────────────────────────────────────────────────────────
// SCHEMA TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Configuration Schema', () => {
  describe('AppConfigSchema', () => {
    it('should accept empty object with all defaults', () => {
      const result = AppConfigSchema.safeParse({});
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.environment).toBe('development');
        expect(result.data.server.port).toBe(3000);
        expect(result.data.llm.provider).toBe('anthropic');
        expect(result.data.llm.model).toBeUndefined();
        expect(result.data.conversion.unitSystem).toBe('metric');
        expect(result.data.storage.dataDir).toBe('./data');
      }
    });

    it('should default the batch sizing constants', () => {
      const config = validateConfig({});
      expect(config.batch).toEqual({
        charsPerToken: 4,
        sampleSize: 50,
        reservedTokens: 5000,
        safetyFactor: 0.6,
        minBatchSize: 10,
        maxBatchSize: 100,
        defaultBatchSize: 50,
      });
    });

    it('should accept a valid complete config', () => {
      const result = AppConfigSchema.safeParse({
        environment: 'production',
        server: { port: 8080, host: '127.0.0.1' },
        llm: { provider: 'openai', model: 'gpt-4o' },
        conversion: { unitSystem: 'imperial' },
      });
      expect(result.success).toBe(true);
    });

    it('should reject invalid port number', () => {
      expect(AppConfigSchema.safeParse({ server: { port: 99999 } }).success).toBe(false);
    });

    it('should reject unknown providers', () => {
      expect(AppConfigSchema.safeParse({ llm: { provider: 'cohere' } }).success).toBe(false);
    });

    it('should reject a minimum batch size above the maximum', () => {
      const result = AppConfigSchema.safeParse({ batch: { minBatchSize: 50, maxBatchSize: 20 } });
      expect(result.success).toBe(false);
    });

    it('should reject a safety factor of zero', () => {
      expect(AppConfigSchema.safeParse({ batch: { safetyFactor: 0 } }).success).toBe(false);
    });
  });

  describe('validateConfig', () => {
    it('should throw on invalid config', () => {
      expect(() => validateConfig({ server: { port: -1 } })).toThrow();
    });
  });

  describe('formatConfigErrors', () => {
    it('should prefix messages with the field path', () => {
      const result = safeValidateConfig({ server: { port: 'invalid' } });
      expect(result.success).toBe(false);
      if (!result.success) {
        const messages = formatConfigErrors(result.error);
        expect(messages[0]).toContain('server.port');
      }
    });
  });

  describe('getDefaultConfig', () => {
    it('should return default config for the given environment', () => {
      expect(getDefaultConfig('production').environment).toBe('production');
      expect(getDefaultConfig().environment).toBe('development');
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LOADER TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Configuration Loader', () => {
  let dir: string;
  let configFile: string;

  beforeEach(() => {
    resetConfig();
    dir = mkdtempSync(join(tmpdir(), 'converter-config-'));
    configFile = join(dir, 'converter.config.json');
  });

  afterEach(() => {
    resetConfig();
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should use defaults when the file is missing and env is empty', () => {
      const config = loadConfig({ configFile, env: {} });
      expect(config.environment).toBe('development');
      expect(config.server.port).toBe(3000);
      expect(config.llm.provider).toBe('anthropic');
    });

    it('should layer the config file over defaults and env over the file', () => {
      writeFileSync(configFile, JSON.stringify({
        server: { port: 4000 },
        llm: { provider: 'openai', model: 'gpt-4o' },
        apiKeys: { openai: 'test-secret' },
      }));

      const config = loadConfig({
        configFile,
        env: { PORT: '5000', UNIT_SYSTEM: 'imperial', BATCH_MAX_SIZE: '80' },
      });

      expect(config.server.port).toBe(5000);
      expect(config.server.host).toBe('0.0.0.0');
      expect(config.llm.provider).toBe('openai');
      expect(config.llm.model).toBe('gpt-4o');
      expect(config.conversion.unitSystem).toBe('imperial');
      expect(config.batch.maxBatchSize).toBe(80);
    });

    it('should read the file named by CONVERTER_CONFIG_FILE', () => {
      writeFileSync(configFile, JSON.stringify({ llm: { provider: 'gemini' } }));
      const config = loadConfig({ env: { CONVERTER_CONFIG_FILE: configFile } });
      expect(config.llm.provider).toBe('gemini');
    });

    it('should ignore blank environment values', () => {
      const config = loadConfig({ configFile, env: { PORT: '  ', LLM_MODEL: '' } });
      expect(config.server.port).toBe(3000);
      expect(config.llm.model).toBeUndefined();
    });

    it('should reject non-numeric numeric variables', () => {
      expect(() => loadConfig({ configFile, env: { PORT: 'abc' } })).toThrow(ConfigError);
      expect(() => loadConfig({ configFile, env: { PORT: 'abc' } })).toThrow('server.port');
    });

    it('should reject a config file that is not JSON', () => {
      writeFileSync(configFile, '{ not json');
      expect(() => loadConfig({ configFile, env: {} })).toThrow(ConfigError);
    });

    it('should return cached config on subsequent calls', () => {
      const first = loadConfig({ configFile, env: {} });
      const second = loadConfig({ configFile, env: { PORT: '9000' } });
      expect(second).toBe(first);
    });

    it('should deep-freeze the config object', () => {
      const config = loadConfig({ configFile, env: {} });
      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.batch)).toBe(true);
    });
  });

  describe('getConfig', () => {
    it('should throw if config not loaded', () => {
      expect(() => getConfig()).toThrow('Configuration not loaded');
      expect(isConfigLoaded()).toBe(false);
    });

    it('should return config after loading', () => {
      loadConfig({ configFile, env: { NODE_ENV: 'production' } });
      expect(isConfigLoaded()).toBe(true);
      expect(getEnvironment()).toBe('production');
      expect(isProduction()).toBe(true);
      expect(isDevelopment()).toBe(false);
    });
  });

  describe('loadTestConfig', () => {
    it('should apply overrides on top of defaults', () => {
      const config = loadTestConfig({ llm: { provider: 'mock' }, batch: { maxBatchSize: 20 } });
      expect(config.environment).toBe('test');
      expect(config.llm.provider).toBe('mock');
      expect(config.llm.maxOutputTokens).toBe(4096);
      expect(config.batch.maxBatchSize).toBe(20);
      expect(config.batch.minBatchSize).toBe(10);
      expect(getConfig()).toBe(config);
    });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CREDENTIAL TESTS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Credentials', () => {
  let dir: string;
  let configFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'converter-keys-'));
    configFile = join(dir, 'converter.config.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('EnvironmentCredentialSource', () => {
    it('should read the provider variables', () => {
      const source = new EnvironmentCredentialSource({ ANTHROPIC_API_KEY: 'test-secret' });
      expect(source.getCredential('anthropic')).toBe('test-secret');
      expect(source.getCredential('openai')).toBeUndefined();
    });

    it('should accept GEMINI_API_KEY when GOOGLE_API_KEY is unset', () => {
      const source = new EnvironmentCredentialSource({ GEMINI_API_KEY: 'test-gemini' });
      expect(source.getCredential('gemini')).toBe('test-gemini');
    });

    it('should prefer GOOGLE_API_KEY over GEMINI_API_KEY', () => {
      const source = new EnvironmentCredentialSource({
        GOOGLE_API_KEY: 'test-google',
        GEMINI_API_KEY: 'test-gemini',
      });
      expect(source.getCredential('gemini')).toBe('test-google');
    });

    it('should treat blank values as missing', () => {
      const source = new EnvironmentCredentialSource({ DEEPSEEK_API_KEY: '   ' });
      expect(source.getCredential('deepseek')).toBeUndefined();
    });
  });

  describe('FileCredentialSource', () => {
    it('should read the apiKeys block', () => {
      writeFileSync(configFile, JSON.stringify({ apiKeys: { deepseek: 'test-deepseek' } }));
      const source = new FileCredentialSource(configFile);
      expect(source.getCredential('deepseek')).toBe('test-deepseek');
      expect(source.getCredential('anthropic')).toBeUndefined();
    });

    it('should yield nothing for a missing file', () => {
      const source = new FileCredentialSource(join(dir, 'absent.json'));
      expect(source.getCredential('openai')).toBeUndefined();
    });

    it('should reject non-string keys', () => {
      writeFileSync(configFile, JSON.stringify({ apiKeys: { openai: 42 } }));
      const source = new FileCredentialSource(configFile);
      expect(() => source.getCredential('openai')).toThrow(ConfigError);
    });
  });

  describe('CredentialStore', () => {
    it('should prefer the config file over the environment', () => {
      writeFileSync(configFile, JSON.stringify({ apiKeys: { openai: 'test-secret-file' } }));
      const store = createCredentialStore({
        configFile,
        env: { OPENAI_API_KEY: 'test-secret-env', ANTHROPIC_API_KEY: 'test-secret-env' },
      });

      expect(store.get('openai')).toBe('test-secret-file');
      expect(store.sourceOf('openai')).toBe('config-file');
      expect(store.get('anthropic')).toBe('test-secret-env');
      expect(store.sourceOf('anthropic')).toBe('environment');
    });

    it('should report missing keys as null', () => {
      const store = new CredentialStore([new MockCredentialSource()]);
      expect(store.get('gemini')).toBeNull();
      expect(store.has('gemini')).toBe(false);
      expect(store.sourceOf('gemini')).toBeNull();
    });

    it('should see updates to a mock source', () => {
      const source = new MockCredentialSource({ anthropic: 'test-secret' });
      const store = new CredentialStore([source]);
      expect(store.has('anthropic')).toBe(true);

      source.removeCredential('anthropic');
      expect(store.has('anthropic')).toBe(false);

      source.setCredential('openai', 'test-secret');
      expect(store.get('openai')).toBe('test-secret');
      expect(store.getSourceNames()).toEqual(['mock']);
    });
  });
});
