// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER TYPES — Text Providers and Catalogue Descriptors
// ═══════════════════════════════════════════════════════════════════════════════

import type { ProviderName } from '../config/schema.js';

export type { ProviderName };

/**
 * How a provider is addressed: single-turn message, chat completion,
 * single prompt with system instruction, or scripted replies.
 */
export type InvocationStyle = 'message' | 'chat' | 'prompt' | 'scripted';

export interface ModelDescriptor {
  readonly id: string;
  /** Context window in tokens */
  readonly contextWindow: number;
}

/**
 * Read-only capability record for one provider.
 */
export interface ProviderDescriptor {
  readonly name: ProviderName;
  readonly label: string;
  readonly style: InvocationStyle;
  /** Whether a credential is configured */
  readonly available: boolean;
  readonly models: readonly ModelDescriptor[];
  readonly defaultModel: string;
}

export interface GenerationSettings {
  readonly maxOutputTokens: number;
  readonly temperature: number;
}

/**
 * Uniform text-generation contract over every vendor.
 * Every failure surfaces as ProviderCallFailed.
 */
export interface TextProvider {
  readonly name: ProviderName;
  readonly model: string;
  readonly contextWindow: number;

  isAvailable(): boolean;

  invoke(prompt: string, systemPrompt?: string): Promise<string>;
}
