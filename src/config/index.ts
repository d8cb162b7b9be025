// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MODULE — Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

export {
  AppConfigSchema,
  BatchConfigSchema,
  EnvironmentSchema,
  ProviderNameSchema,
  UnitSystemSchema,
  PROVIDER_NAMES,
  validateConfig,
  safeValidateConfig,
  formatConfigErrors,
  getDefaultConfig,
  type AppConfig,
  type BatchConfig,
  type Environment,
  type LlmConfig,
  type ProviderName,
  type ServerConfig,
} from './schema.js';

export {
  ConfigError,
  DEFAULT_CONFIG_FILE,
  loadConfig,
  getConfig,
  isConfigLoaded,
  resetConfig,
  loadTestConfig,
  resolveConfigFile,
  readConfigFile,
  getEnvironment,
  isProduction,
  isDevelopment,
  type ConfigOverrides,
  type LoadConfigOptions,
} from './loader.js';

export {
  CREDENTIAL_NAMES,
  ENV_VAR_MAPPING,
  CredentialStore,
  EnvironmentCredentialSource,
  FileCredentialSource,
  MockCredentialSource,
  createCredentialStore,
  type ApiKeys,
  type CredentialName,
  type CredentialSource,
} from './secrets.js';
