/**
 * Input validation for environment variables passed with -e / env:.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 */

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * Remove characters that would break a `-e KEY=VALUE` argument:
 * newlines (CR, LF) and null bytes.
 */
export function sanitizeEnvValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\r\n\x00]/g, "");
}

/**
 * Parse and validate a KEY=VALUE string, throwing on invalid format.
 *
 * The value is everything after the first `=` and may itself contain `=`.
 *
 * @throws ValidationError if the `=` is missing or the key is not POSIX.
 */
export function parseEnvVarStrict(envVar: string): { key: string; value: string } {
  const eqIdx = envVar.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(`Invalid env format '${envVar}'. Expected KEY=VALUE`);
  }

  const key = envVar.slice(0, eqIdx);
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }

  return { key, value: sanitizeEnvValue(envVar.slice(eqIdx + 1)) };
}
