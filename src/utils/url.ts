/**
 * URL and retry timing helpers shared by the platform clients
 */

/**
 * Computes an exponential backoff delay with ±10% jitter so that retries from
 * both providers do not line up.
 *
 * @param attempt The retry attempt number (0-based)
 * @param baseDelayMs Delay for the first retry
 * @param maxDelayMs Upper bound before jitter is applied
 * @param random Source of randomness in [0, 1)
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 30_000,
  random: () => number = Math.random,
): number {
  const exponentialDelay = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs)
  const jitter = exponentialDelay * 0.1
  return Math.max(0, Math.round(exponentialDelay + (random() * 2 - 1) * jitter))
}

/**
 * Joins a base URL and a path without doubling or dropping slashes.
 *
 * @example
 * ```typescript
 * joinUrl('http://abs.local/', '/api/me') // 'http://abs.local/api/me'
 * joinUrl('http://abs.local/sub', 'api/me') // 'http://abs.local/sub/api/me'
 * ```
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`
}
