export class DeadlineExceededError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} exceeded its ${ms}ms deadline`)
    this.name = "DeadlineExceededError"
  }
}

/**
 * Settles with `work`, or rejects with DeadlineExceededError after `ms`.
 * The work itself is not cancelled; its outcome is simply no longer awaited.
 */
export async function withDeadline<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new DeadlineExceededError(label, ms)), ms)
  })

  try {
    return await Promise.race([work, deadline])
  } finally {
    clearTimeout(timer)
  }
}
