import { ConflictError } from "./errors"

export const MAX_CONFLICT_ATTEMPTS = 3

/**
 * Re-runs `run` when it loses an optimistic write. `run` must re-read
 * everything it validates, so each attempt sees the newer state.
 */
export async function retryOnConflict<T>(operation: string, run: () => Promise<T>): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      return await run()
    } catch (error) {
      if (!(error instanceof ConflictError) || attempt >= MAX_CONFLICT_ATTEMPTS) {
        throw error
      }
      console.warn(`[Store] Conflict during ${operation}, retrying (attempt ${attempt + 1}/${MAX_CONFLICT_ATTEMPTS})`)
    }
  }
}
