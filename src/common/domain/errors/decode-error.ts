import { AppError } from './app-error.js'

/**
 * Raised when a message body is not UTF-8 JSON describing an object.
 *
 * Never retryable: the bytes on the topic will not change on redelivery.
 */
export class DecodeError extends AppError {
  /** Which decoding step failed. */
  public readonly reason: 'INVALID_UTF8' | 'INVALID_JSON' | 'NOT_AN_OBJECT'

  constructor(
    message: string,
    reason: 'INVALID_UTF8' | 'INVALID_JSON' | 'NOT_AN_OBJECT',
    cause?: unknown,
  ) {
    super(message, {
      category: 'DECODE',
      isOperational: true,
      retryable: false,
      cause,
    })

    this.name = 'DecodeError'
    this.reason = reason
  }
}
