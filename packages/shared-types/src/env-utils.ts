/**
 * Environment Variable Utilities
 * Safe parsing of environment variables with NaN protection and logging
 */

export type EnvSource = Record<string, string | undefined>;

/**
 * Parse an integer environment variable with validation
 * Returns the default value if:
 * - Environment variable is not set
 * - Value cannot be parsed as an integer (NaN)
 *
 * @param key - Environment variable name
 * @param defaultValue - Default value if missing or invalid
 * @param env - Variables to read from (defaults to process.env)
 */
export function parseIntEnv(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const raw = env[key];
  if (!raw) return defaultValue;

  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    console.warn(`[ENV] Invalid ${key}="${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Parse a float environment variable with validation
 * Same fallback rules as parseIntEnv
 */
export function parseFloatEnv(key: string, defaultValue: number, env: EnvSource = process.env): number {
  const raw = env[key];
  if (!raw) return defaultValue;

  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    console.warn(`[ENV] Invalid ${key}="${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

/**
 * Read a string environment variable, treating empty strings as unset
 */
export function stringEnv(key: string, defaultValue: string, env: EnvSource = process.env): string {
  const raw = env[key];
  return raw ? raw : defaultValue;
}
