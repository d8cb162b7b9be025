// ═══════════════════════════════════════════════════════════════════════════════
// PROVIDER ERRORS
// ═══════════════════════════════════════════════════════════════════════════════

import type { ProviderName } from '../config/schema.js';

export const MISSING_CREDENTIAL = 'credential not configured';

/**
 * Any failure of a provider call: missing credential, SDK/network error,
 * or an empty response. Terminal for the invocation; nothing retries it.
 */
export class ProviderCallFailed extends Error {
  readonly name = 'ProviderCallFailed';
  readonly code = 'PROVIDER_CALL_FAILED';
  readonly provider: ProviderName;

  constructor(provider: ProviderName, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${provider} call failed: ${reason}`);
    this.provider = provider;
    this.cause = cause;
  }

  /** Cause text safe to show to API clients */
  get reason(): string {
    return this.cause instanceof Error ? this.cause.message : String(this.cause);
  }
}

/**
 * A model id the provider's catalogue does not list.
 */
export class UnknownModelError extends Error {
  readonly name = 'UnknownModelError';
  readonly code = 'UNKNOWN_MODEL';
  readonly provider: ProviderName;
  readonly model: string;

  constructor(provider: ProviderName, model: string) {
    super(`Unknown model '${model}' for provider ${provider}`);
    this.provider = provider;
    this.model = model;
  }
}
