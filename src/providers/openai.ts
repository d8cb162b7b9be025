// ═══════════════════════════════════════════════════════════════════════════════
// OPENAI PROVIDER — Chat Completion (also DeepSeek, OpenAI-compatible)
// ═══════════════════════════════════════════════════════════════════════════════

import OpenAI from 'openai';
import { BaseProvider, type ProviderOptions } from './base.js';
import type { ProviderName } from './types.js';

export const DEEPSEEK_BASE_URL = 'https://api.deepseek.com';

export class OpenAIProvider extends BaseProvider {
  private readonly client: OpenAI | null;

  constructor(options: ProviderOptions = {}, name: ProviderName = 'openai', baseURL?: string) {
    super(name, options);
    this.client = this.apiKey
      ? new OpenAI({ apiKey: this.apiKey, maxRetries: 0, ...(baseURL ? { baseURL } : {}) })
      : null;
  }

  protected async request(prompt: string, systemPrompt?: string): Promise<string | null | undefined> {
    if (!this.client) {
      throw new Error('OpenAI client not initialized');
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (systemPrompt) {
      messages.push({ role: 'system', content: systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      max_tokens: this.generation.maxOutputTokens,
      temperature: this.generation.temperature,
    });

    return response.choices[0]?.message?.content;
  }
}

/**
 * DeepSeek speaks the OpenAI chat-completion protocol on its own base URL.
 */
export class DeepSeekProvider extends OpenAIProvider {
  constructor(options: ProviderOptions = {}) {
    super(options, 'deepseek', DEEPSEEK_BASE_URL);
  }
}
