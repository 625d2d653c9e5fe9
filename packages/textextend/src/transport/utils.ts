/**
 * Safely read an environment variable
 * @param key - The environment variable key to read
 * @param env - Environment to read from (defaults to process.env)
 * @returns The value if found, undefined otherwise
 */
export function readEnvVar(
  key: string,
  env: NodeJS.ProcessEnv | undefined = typeof process === "undefined" ? undefined : process.env,
): string | undefined {
  if (env === undefined) {
    return undefined;
  }
  const value = env[key];
  return typeof value === "string" ? value : undefined;
}

/**
 * Check if a value is a non-empty string
 * @param value - The value to check
 * @returns true if the value is a non-empty string, false otherwise
 */
export function isNonEmpty(value: string | undefined): value is string {
  return typeof value === "string" && value.trim().length > 0;
}
