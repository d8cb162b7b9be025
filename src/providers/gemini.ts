// ═══════════════════════════════════════════════════════════════════════════════
// GEMINI PROVIDER — Single Prompt with System Instruction
// ═══════════════════════════════════════════════════════════════════════════════

import { GoogleGenAI } from '@google/genai';
import { BaseProvider, type ProviderOptions } from './base.js';

export class GeminiProvider extends BaseProvider {
  private readonly client: GoogleGenAI | null;

  constructor(options: ProviderOptions = {}) {
    super('gemini', options);
    this.client = this.apiKey ? new GoogleGenAI({ apiKey: this.apiKey }) : null;
  }

  protected async request(prompt: string, systemPrompt?: string): Promise<string | undefined> {
    if (!this.client) {
      throw new Error('Gemini client not initialized');
    }

    const response = await this.client.models.generateContent({
      model: this.model,
      contents: prompt,
      config: {
        ...(systemPrompt ? { systemInstruction: systemPrompt } : {}),
        maxOutputTokens: this.generation.maxOutputTokens,
        temperature: this.generation.temperature,
      },
    });

    return response.text;
  }
}
