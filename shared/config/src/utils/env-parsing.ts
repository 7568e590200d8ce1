/**
 * Environment Variable Reading Utilities
 *
 * Value-based readers that turn raw `process.env` strings into typed values
 * for schema validation. Unlike parse-with-default helpers, these never
 * substitute a default for a malformed value: a garbage number comes back as
 * NaN so the schema rejects it with the variable's path.
 *
 * Conventions:
 * - Returns `undefined` for a missing or blank value (schema default applies)
 * - Does NOT throw
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Read a trimmed string, or `undefined` when unset or blank.
 *
 * @example
 * ```typescript
 * const url = readEnvString(process.env, 'REDIS_URL');
 * ```
 */
export function readEnvString(env: EnvSource, name: string): string | undefined {
  const value = env[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/**
 * Read a number, or `undefined` when unset or blank.
 * Malformed values yield NaN, which numeric schemas reject.
 *
 * @example
 * ```typescript
 * readEnvNumber({ RETRY_MAX_ATTEMPTS: '5' }, 'RETRY_MAX_ATTEMPTS'); // 5
 * readEnvNumber({ RETRY_MAX_ATTEMPTS: 'five' }, 'RETRY_MAX_ATTEMPTS'); // NaN
 * ```
 */
export function readEnvNumber(env: EnvSource, name: string): number | undefined {
  const value = readEnvString(env, name);
  if (value === undefined) return undefined;
  return Number(value);
}
