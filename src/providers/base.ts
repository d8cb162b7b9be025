// ═══════════════════════════════════════════════════════════════════════════════
// BASE PROVIDER — Credential Check, Error Normalization, Call Logging
// ═══════════════════════════════════════════════════════════════════════════════

import { getLogger, type ILogger } from '../logging/index.js';
import { resolveModel } from './catalog.js';
import { MISSING_CREDENTIAL, ProviderCallFailed } from './errors.js';
import type { GenerationSettings, ProviderName, TextProvider } from './types.js';

export const DEFAULT_GENERATION: GenerationSettings = {
  maxOutputTokens: 4096,
  temperature: 0,
};

export interface ProviderOptions {
  apiKey?: string | null;
  model?: string;
  generation?: Partial<GenerationSettings>;
}

/**
 * Shared invoke() for the vendor adapters. Subclasses only issue the request;
 * the base turns every failure into ProviderCallFailed.
 */
export abstract class BaseProvider implements TextProvider {
  readonly name: ProviderName;
  readonly model: string;
  readonly contextWindow: number;

  protected readonly apiKey: string | null;
  protected readonly generation: GenerationSettings;
  protected readonly logger: ILogger;

  protected constructor(name: ProviderName, options: ProviderOptions) {
    const model = resolveModel(name, options.model);
    this.name = name;
    this.model = model.id;
    this.contextWindow = model.contextWindow;
    const apiKey = options.apiKey?.trim();
    this.apiKey = apiKey ? apiKey : null;
    this.generation = { ...DEFAULT_GENERATION, ...options.generation };
    this.logger = getLogger({ component: 'provider', context: { provider: name, model: model.id } });
  }

  isAvailable(): boolean {
    return this.apiKey !== null;
  }

  async invoke(prompt: string, systemPrompt?: string): Promise<string> {
    if (!this.isAvailable()) {
      throw new ProviderCallFailed(this.name, MISSING_CREDENTIAL);
    }

    const start = Date.now();
    let text: string | null | undefined;
    try {
      text = await this.request(prompt, systemPrompt);
    } catch (error) {
      this.logger.warn('Provider call failed', {
        durationMs: Date.now() - start,
        error: error instanceof Error ? error.message : String(error),
      });
      throw new ProviderCallFailed(this.name, error);
    }

    if (!text || text.trim() === '') {
      throw new ProviderCallFailed(this.name, 'empty response');
    }

    this.logger.debug('Provider call completed', {
      durationMs: Date.now() - start,
      promptChars: prompt.length,
      responseChars: text.length,
    });
    return text;
  }

  /**
   * Issue one request. Only called when a credential is present.
   */
  protected abstract request(prompt: string, systemPrompt?: string): Promise<string | null | undefined>;
}
