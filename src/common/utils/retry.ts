/**
 * @file retry.ts
 * @description
 * Exponential backoff for startup-time calls (tenant bootstrap, broker
 * subscription). Per-message retries are left to broker redelivery and never
 * go through this helper.
 */

export interface RetryOptions {
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  /** Return `false` to stop at the first non-retryable error. */
  shouldRetry?: (error: unknown) => boolean
  /** Called before each wait, with the attempt that just failed. */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
  /** ±10% random spread on every delay. */
  jitter?: boolean
  sleep?: (ms: number) => Promise<void>
}

const defaultRetryOptions: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  backoffMultiplier: 2,
  jitter: true,
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Delay before the attempt following `attempt` (1-based), without jitter.
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'backoffMultiplier'>,
): number {
  return Math.min(
    options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt - 1),
    options.maxDelayMs,
  )
}

/**
 * Runs `fn` until it resolves, the attempt budget is spent, or `shouldRetry`
 * refuses the error. Rethrows the last error.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...defaultRetryOptions, ...options }
  const wait = opts.sleep ?? sleep
  let lastError: unknown

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      lastError = error

      if (attempt === opts.maxAttempts) {
        break
      }

      if (opts.shouldRetry && !opts.shouldRetry(error)) {
        break
      }

      const delay = backoffDelay(attempt, opts)
      const jitter = opts.jitter ? delay * 0.1 * (Math.random() * 2 - 1) : 0

      opts.onRetry?.(error, attempt, delay + jitter)
      await wait(delay + jitter)
    }
  }

  throw lastError
}
