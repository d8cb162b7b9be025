// ═══════════════════════════════════════════════════════════════════════════════
// LOG REDACTION — Strip Credentials from Structured Log Entries
// ═══════════════════════════════════════════════════════════════════════════════

export interface RedactionOptions {
  /** Extra key fragments (lowercase) whose values are always replaced */
  readonly sensitiveKeys?: readonly string[];

  /** Replacement marker */
  readonly replacement?: string;

  /** Maximum object depth to walk */
  readonly maxDepth?: number;
}

const DEFAULT_SENSITIVE_KEYS = ['password', 'secret', 'apikey', 'api_key', 'authorization', 'credential'];

// Provider key shapes (sk-…, sk-ant-…, AIza…)
const KEY_PATTERNS: readonly RegExp[] = [
  /\bsk-(?:ant-)?[A-Za-z0-9_-]{16,}\b/g,
  /\bAIza[0-9A-Za-z_-]{20,}\b/g,
];

function redactString(text: string, replacement: string): string {
  let result = text;
  for (const pattern of KEY_PATTERNS) {
    result = result.replace(pattern, replacement);
  }
  return result;
}

function isSensitiveKey(key: string, keys: readonly string[]): boolean {
  const lower = key.toLowerCase();
  // accessToken / token, but not token counts such as reservedTokens
  if (lower.endsWith('token')) return true;
  return keys.some(fragment => lower.includes(fragment));
}

function redactValue(value: unknown, options: Required<RedactionOptions>, depth: number): unknown {
  if (depth > options.maxDepth) return '[MAX_DEPTH]';

  if (typeof value === 'string') {
    return redactString(value, options.replacement);
  }

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, options, depth + 1));
  }

  if (value && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, options.sensitiveKeys)
        ? options.replacement
        : redactValue(inner, options, depth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Redact a log entry. Top-level standard fields pass through the same walk.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const resolved: Required<RedactionOptions> = {
    sensitiveKeys: [...DEFAULT_SENSITIVE_KEYS, ...(options.sensitiveKeys ?? [])],
    replacement: options.replacement ?? '[REDACTED]',
    maxDepth: options.maxDepth ?? 6,
  };

  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    result[key] = isSensitiveKey(key, resolved.sensitiveKeys)
      ? resolved.replacement
      : redactValue(value, resolved, 1);
  }
  return result;
}
