// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER CATALOGUE — Supported Models and Context Windows
// ═══════════════════════════════════════════════════════════════════════════════

import { PROVIDER_NAMES } from '../config/schema.js';
import type { CredentialStore } from '../config/secrets.js';
import { UnknownModelError } from './errors.js';
import type {
  InvocationStyle,
  ModelDescriptor,
  ProviderDescriptor,
  ProviderName,
} from './types.js';

interface CatalogEntry {
  readonly label: string;
  readonly style: InvocationStyle;
  readonly models: readonly ModelDescriptor[];
  readonly defaultModel: string;
}

export const PROVIDER_CATALOG: Readonly<Record<ProviderName, CatalogEntry>> = {
  anthropic: {
    label: 'Anthropic Claude',
    style: 'message',
    models: [
      { id: 'claude-sonnet-4-20250514', contextWindow: 200_000 },
      { id: 'claude-3-7-sonnet-20250219', contextWindow: 200_000 },
      { id: 'claude-3-5-haiku-20241022', contextWindow: 200_000 },
    ],
    defaultModel: 'claude-sonnet-4-20250514',
  },
  openai: {
    label: 'OpenAI',
    style: 'chat',
    models: [
      { id: 'gpt-4o', contextWindow: 128_000 },
      { id: 'gpt-4o-mini', contextWindow: 128_000 },
      { id: 'gpt-4-turbo', contextWindow: 128_000 },
    ],
    defaultModel: 'gpt-4o',
  },
  gemini: {
    label: 'Google Gemini',
    style: 'prompt',
    models: [
      { id: 'gemini-2.0-flash', contextWindow: 1_048_576 },
      { id: 'gemini-1.5-pro', contextWindow: 2_097_152 },
      { id: 'gemini-1.5-flash', contextWindow: 1_048_576 },
    ],
    defaultModel: 'gemini-2.0-flash',
  },
  deepseek: {
    label: 'DeepSeek',
    style: 'chat',
    models: [
      { id: 'deepseek-chat', contextWindow: 64_000 },
      { id: 'deepseek-reasoner', contextWindow: 64_000 },
    ],
    defaultModel: 'deepseek-chat',
  },
  mock: {
    label: 'Mock (offline)',
    style: 'scripted',
    models: [{ id: 'mock-v1', contextWindow: 32_000 }],
    defaultModel: 'mock-v1',
  },
};

/**
 * Look up a model, defaulting to the provider's default model.
 * @throws UnknownModelError for ids the catalogue does not list
 */
export function resolveModel(provider: ProviderName, modelId?: string): ModelDescriptor {
  const entry = PROVIDER_CATALOG[provider];
  const id = modelId ?? entry.defaultModel;
  const model = entry.models.find((candidate) => candidate.id === id);
  if (!model) {
    throw new UnknownModelError(provider, id);
  }
  return model;
}

export function isCredentialConfigured(provider: ProviderName, credentials: CredentialStore): boolean {
  return provider === 'mock' || credentials.has(provider);
}

/**
 * Descriptors for every provider, with availability from the credential store.
 */
export function describeProviders(credentials: CredentialStore): ProviderDescriptor[] {
  return PROVIDER_NAMES.map((name) => {
    const entry = PROVIDER_CATALOG[name];
    return {
      name,
      label: entry.label,
      style: entry.style,
      available: isCredentialConfigured(name, credentials),
      models: entry.models,
      defaultModel: entry.defaultModel,
    };
  });
}
