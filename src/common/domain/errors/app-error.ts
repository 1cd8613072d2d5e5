/**
 * @file app-error.ts
 * @description
 * Base class for every error raised or returned by the bridge.
 *
 * The consumer decides between ack, redelivery and drop from the metadata
 * carried here, never from the error message:
 * - `category` groups errors by the pipeline stage that produced them
 * - `retryable` says whether trying the same message again can succeed
 * - `isOperational` separates expected failures from programming errors
 */

export type ErrorCategory =
  | 'DECODE'
  | 'MAPPING'
  | 'PLATFORM'
  | 'BROKER'
  | 'BOOTSTRAP'
  | 'CONFIG'
  | 'UNKNOWN'

export interface AppErrorOptions {
  category?: ErrorCategory
  isOperational?: boolean
  retryable?: boolean
  cause?: unknown
}

export class AppError extends Error {
  /** Pipeline stage that produced the error. */
  public readonly category: ErrorCategory

  /**
   * `true` for failures the pipeline expects (bad payloads, platform outages),
   * `false` for bugs.
   */
  public readonly isOperational: boolean

  /** Whether processing the same input again may succeed. */
  public readonly retryable: boolean

  /** Wrapped original error. */
  public readonly cause?: unknown

  public readonly timestamp: Date

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message)

    this.name = this.constructor.name

    this.category = options.category ?? 'UNKNOWN'
    this.isOperational = options.isOperational ?? true
    this.retryable = options.retryable ?? false
    this.cause = options.cause
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, this.constructor)
  }
}
