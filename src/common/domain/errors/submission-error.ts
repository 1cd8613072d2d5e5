import { AppError } from './app-error.js'

/**
 * - `validation`: the entity was refused locally, nothing was sent
 * - `transient`: network failure, timeout, HTTP 429 or 5xx; another delivery may succeed
 * - `permanent`: the platform rejected the input itself (HTTP 4xx other than 429)
 */
export type SubmissionErrorKind = 'validation' | 'transient' | 'permanent'

/**
 * Failure of an outbound call to the platform, already classified.
 */
export class SubmissionError extends AppError {
  public readonly kind: SubmissionErrorKind

  /** HTTP status of the platform response, when one was received. */
  public readonly status?: number

  constructor(
    kind: SubmissionErrorKind,
    message: string,
    options: { status?: number; cause?: unknown } = {},
  ) {
    super(message, {
      category: 'PLATFORM',
      isOperational: true,
      retryable: kind === 'transient',
      cause: options.cause,
    })

    this.name = 'SubmissionError'
    this.kind = kind
    this.status = options.status
  }
}
