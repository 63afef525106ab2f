import type { RetryPolicy } from "../types/types"
import { sleep } from "./time-utils"

/**
 * Runs `operation` up to `policy.maxAttempts` times with a fixed delay between
 * attempts. Rejects with the last error once attempts run out, or with the
 * abort reason as soon as `signal` fires.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  signal?: AbortSignal
): Promise<T> {
  let lastError: unknown
  const maxAttempts = Math.max(1, policy.maxAttempts)

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    signal?.throwIfAborted()
    try {
      return await operation(attempt)
    } catch (error) {
      lastError = error
      if (attempt < maxAttempts && !signal?.aborted) {
        await sleep(policy.delayMs)
      }
    }
  }

  throw lastError
}
