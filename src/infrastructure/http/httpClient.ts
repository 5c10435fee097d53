/**
 * Shared HTTP client for outbound calls.
 * Uses native fetch; in Lambda the runtime keeps connections alive.
 */

export interface FetchOptions extends RequestInit {
  // Aborts the request after this many milliseconds
  timeoutMs?: number
}

/**
 * fetch with an optional deadline. A timed-out request rejects with the
 * AbortSignal's TimeoutError.
 */
export async function pooledFetch(url: string | URL, options: FetchOptions = {}): Promise<Response> {
  const { timeoutMs, ...init } = options
  if (timeoutMs === undefined) {
    return fetch(url, init)
  }
  return fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) })
}
