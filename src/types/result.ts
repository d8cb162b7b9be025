// ═══════════════════════════════════════════════════════════════════════════════
// RESULT PATTERN — Type-Safe Error Handling
// ═══════════════════════════════════════════════════════════════════════════════

// ─────────────────────────────────────────────────────────────────────────────────
// CORE RESULT TYPE
// ─────────────────────────────────────────────────────────────────────────────────

/**
 * Success variant of Result.
 */
export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
  readonly error?: never;
}

/**
 * Failure variant of Result.
 */
export interface Err<E> {
  readonly ok: false;
  readonly error: E;
  readonly value?: never;
}

/**
 * Result type representing either success (Ok) or failure (Err).
 *
 * Used where a failure is an expected outcome the caller branches on,
 * e.g. a provider response that no repair strategy could recover.
 *
 * @example
 * ```typescript
 * const result = normalizeResponse(text, 3, { vocabulary: COST_TYPES });
 * if (result.ok) {
 *   apply(result.value.values);
 * } else {
 *   report(result.error.snippet);
 * }
 * ```
 */
export type Result<T, E = Error> = Ok<T> | Err<E>;

// ─────────────────────────────────────────────────────────────────────────────────
// CONSTRUCTORS
// ─────────────────────────────────────────────────────────────────────────────────

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}
