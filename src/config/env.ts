// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT HELPERS — Typed Reads of Process Environment Variables
// Provisioning Resilience Engine — Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export type Env = Readonly<Record<string, string | undefined>>;

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);

/**
 * Read a boolean variable. Unset or blank reads as undefined so schema
 * defaults apply.
 */
export function envBool(env: Env, key: string): boolean | undefined {
  const value = env[key]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  return TRUE_VALUES.has(value);
}

/**
 * Read a numeric variable. Unparseable values come back as NaN so the
 * schema reports them instead of silently using the default.
 */
export function envNumber(env: Env, key: string): number | undefined {
  const value = env[key]?.trim();
  if (value === undefined || value === '') return undefined;
  return Number(value);
}

export function envString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value === undefined || value === '' ? undefined : value;
}
