import axios from 'axios'
import { SubmissionError } from '../../../common/domain/errors/submission-error.js'

/**
 * @file classify.ts
 * @description
 * Single place where platform responses become {@link SubmissionError}s.
 *
 * | Outcome                                  | Kind        |
 * |------------------------------------------|-------------|
 * | 2xx                                      | success     |
 * | 4xx except 429                           | permanent   |
 * | 429, 5xx                                 | transient   |
 * | no response (connection, DNS, timeout)   | transient   |
 * | anything else (1xx, 3xx, unknown errors) | transient   |
 */

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300
}

/**
 * @returns `null` for 2xx, the classified failure otherwise.
 */
export function classifyStatus(status: number, operation: string): SubmissionError | null {
  if (isSuccessStatus(status)) return null

  if (status >= 400 && status < 500 && status !== 429) {
    return new SubmissionError('permanent', `${operation} rejected with HTTP ${status}`, { status })
  }

  if (status === 429 || status >= 500) {
    return new SubmissionError('transient', `${operation} failed with HTTP ${status}`, { status })
  }

  return new SubmissionError('transient', `${operation} got unexpected HTTP ${status}`, { status })
}

/**
 * Classifies a thrown request error (axios or otherwise).
 */
export function classifyRequestFailure(error: unknown, operation: string): SubmissionError {
  if (axios.isAxiosError(error)) {
    if (error.response) {
      return (
        classifyStatus(error.response.status, operation) ??
        new SubmissionError('transient', `${operation} failed after a successful response`, {
          status: error.response.status,
          cause: error,
        })
      )
    }

    return new SubmissionError(
      'transient',
      `${operation} failed without response (${error.code ?? 'network error'})`,
      { cause: error },
    )
  }

  const reason = error instanceof Error ? error.message : String(error)
  return new SubmissionError('transient', `${operation} failed: ${reason}`, { cause: error })
}
