// ═══════════════════════════════════════════════════════════════════════════════
// REDACTION — Strip Secret Material from Log Entries
// Provisioning Resilience Engine — Observability
// ═══════════════════════════════════════════════════════════════════════════════

export interface RedactionOptions {
  /** Extra field-name fragments to redact (case-insensitive) */
  readonly additionalKeys?: readonly string[];

  /** Replacement marker */
  readonly replacement?: string;

  /** Maximum object depth to walk */
  readonly maxDepth?: number;
}

const SENSITIVE_KEY_FRAGMENTS = [
  'password',
  'secret',
  'token',
  'apikey',
  'api_key',
  'authorization',
  'credential',
  'privatekey',
];

// Correlation fields look like keys but are safe.
const ALLOWED_KEYS = new Set(['transactionId', 'correlationId', 'resourceId', 'secretName']);

const DEFAULT_REPLACEMENT = '[REDACTED]';

// Flags such as useRemoteSecretStore carry no secret material.
function isSensitiveKey(key: string, value: unknown, extra: readonly string[]): boolean {
  if (ALLOWED_KEYS.has(key) || typeof value === 'boolean') return false;
  const lower = key.toLowerCase();
  return SENSITIVE_KEY_FRAGMENTS.some(f => lower.includes(f)) ||
    extra.some(f => lower.includes(f.toLowerCase()));
}

function redactValue(value: unknown, options: RedactionOptions, depth: number): unknown {
  const maxDepth = options.maxDepth ?? 6;
  if (depth > maxDepth) return '[MAX_DEPTH]';

  if (Array.isArray(value)) {
    return value.map(item => redactValue(item, options, depth + 1));
  }

  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    const result: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      result[key] = isSensitiveKey(key, inner, options.additionalKeys ?? [])
        ? options.replacement ?? DEFAULT_REPLACEMENT
        : redactValue(inner, options, depth + 1);
    }
    return result;
  }

  return value;
}

/**
 * Redact sensitive fields from a log entry by field name.
 * Values are never pattern-matched: secret names are logged, secret values are not.
 */
export function redact(
  entry: Record<string, unknown>,
  options: RedactionOptions = {}
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry)) {
    result[key] = isSensitiveKey(key, value, options.additionalKeys ?? [])
      ? options.replacement ?? DEFAULT_REPLACEMENT
      : redactValue(value, options, 1);
  }
  return result;
}
