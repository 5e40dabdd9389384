/**
 * Runtime Environment Access
 *
 * Reads environment variables without assuming `process` exists, so the
 * containers stay usable when bundled for a host without it.
 */

/**
 * Get an environment variable.
 *
 * @param name - The environment variable name
 * @returns The value or undefined if not found/not available
 */
export function getEnv(name: string): string | undefined {
  if (typeof process !== 'undefined' && process.env) {
    return process.env[name]
  }
  return undefined
}

/**
 * Check if running in production mode (`NODE_ENV` or `ENVIRONMENT` set to
 * `production`).
 */
export function isProduction(): boolean {
  return getEnv('NODE_ENV') === 'production' || getEnv('ENVIRONMENT') === 'production'
}
