// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDERS — Factory and Barrel Export
// ═══════════════════════════════════════════════════════════════════════════════

import type { LlmConfig } from '../config/schema.js';
import type { CredentialStore } from '../config/secrets.js';
import { AnthropicProvider } from './anthropic.js';
import type { ProviderOptions } from './base.js';
import { GeminiProvider } from './gemini.js';
import { MockProvider } from './mock.js';
import { DeepSeekProvider, OpenAIProvider } from './openai.js';
import type { TextProvider } from './types.js';

export type ProviderSettings = Pick<LlmConfig, 'provider' | 'model' | 'maxOutputTokens' | 'temperature'>;

/**
 * Build the configured provider. The choice is never substituted: a provider
 * without a credential is still returned and fails on invoke().
 * @throws UnknownModelError when the model id is not in the provider's catalogue
 */
export function createProvider(settings: ProviderSettings, credentials: CredentialStore): TextProvider {
  const generation = {
    maxOutputTokens: settings.maxOutputTokens,
    temperature: settings.temperature,
  };
  const options = (apiKey: string | null): ProviderOptions => ({
    apiKey,
    model: settings.model,
    generation,
  });

  switch (settings.provider) {
    case 'anthropic':
      return new AnthropicProvider(options(credentials.get('anthropic')));
    case 'openai':
      return new OpenAIProvider(options(credentials.get('openai')));
    case 'deepseek':
      return new DeepSeekProvider(options(credentials.get('deepseek')));
    case 'gemini':
      return new GeminiProvider(options(credentials.get('gemini')));
    case 'mock':
      return new MockProvider({ model: settings.model, generation });
  }
}

export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider, DeepSeekProvider, DEEPSEEK_BASE_URL } from './openai.js';
export { GeminiProvider } from './gemini.js';
export { MockProvider, defaultMockReply, type ScriptedReply, type RecordedCall } from './mock.js';
export { BaseProvider, DEFAULT_GENERATION, type ProviderOptions } from './base.js';
export { PROVIDER_CATALOG, resolveModel, describeProviders, isCredentialConfigured } from './catalog.js';
export { ProviderCallFailed, UnknownModelError, MISSING_CREDENTIAL } from './errors.js';
export type {
  GenerationSettings,
  InvocationStyle,
  ModelDescriptor,
  ProviderDescriptor,
  ProviderName,
  TextProvider,
} from './types.js';
