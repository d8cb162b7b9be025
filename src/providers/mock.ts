// ═══════════════════════════════════════════════════════════════════════════════
// MOCK PROVIDER — Scripted Responses for Tests and Offline Runs
// ═══════════════════════════════════════════════════════════════════════════════

import { BaseProvider, type ProviderOptions } from './base.js';

/**
 * One scripted reply: literal text, an error to throw, or a function of the prompt.
 */
export type ScriptedReply = string | Error | ((prompt: string, systemPrompt?: string) => string);

export interface MockProviderOptions extends Omit<ProviderOptions, 'apiKey'> {
  /** Replies consumed in order; when exhausted the default reply is used */
  script?: ScriptedReply[];
}

export interface RecordedCall {
  readonly prompt: string;
  readonly systemPrompt?: string;
}

const EXPECTED_COUNT = /exactly (\d+) (?:values|formulas|labels)/i;

/**
 * Default reply: one empty value per requested row, so engines fall
 * back to their canonical defaults.
 */
export function defaultMockReply(prompt: string): string {
  const match = EXPECTED_COUNT.exec(prompt);
  const count = match?.[1] ? Number.parseInt(match[1], 10) : 0;
  return JSON.stringify(Array.from({ length: count }, () => ''));
}

export class MockProvider extends BaseProvider {
  readonly calls: RecordedCall[] = [];
  private readonly script: ScriptedReply[];

  constructor(options: MockProviderOptions = {}) {
    super('mock', options);
    this.script = [...(options.script ?? [])];
  }

  override isAvailable(): boolean {
    return true;
  }

  /** Queue more replies */
  enqueue(...replies: ScriptedReply[]): void {
    this.script.push(...replies);
  }

  protected async request(prompt: string, systemPrompt?: string): Promise<string> {
    this.calls.push(systemPrompt === undefined ? { prompt } : { prompt, systemPrompt });

    const reply = this.script.shift();
    if (reply === undefined) {
      return defaultMockReply(prompt);
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(prompt, systemPrompt) : reply;
  }
}
