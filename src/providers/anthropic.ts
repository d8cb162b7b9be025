// ═══════════════════════════════════════════════════════════════════════════════
// ANTHROPIC PROVIDER — Single-Turn Message
// ═══════════════════════════════════════════════════════════════════════════════

import Anthropic from '@anthropic-ai/sdk';
import { BaseProvider, type ProviderOptions } from './base.js';

export class AnthropicProvider extends BaseProvider {
  private readonly client: Anthropic | null;

  constructor(options: ProviderOptions = {}) {
    super('anthropic', options);
    this.client = this.apiKey ? new Anthropic({ apiKey: this.apiKey, maxRetries: 0 }) : null;
  }

  protected async request(prompt: string, systemPrompt?: string): Promise<string> {
    if (!this.client) {
      throw new Error('Anthropic client not initialized');
    }

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.generation.maxOutputTokens,
      temperature: this.generation.temperature,
      ...(systemPrompt ? { system: systemPrompt } : {}),
      messages: [{ role: 'user', content: prompt }],
    });

    return response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');
  }
}
