import { AppError } from './app-error.js'

/**
 * A broker subscription that could not be opened.
 *
 * `retryable: false` marks the tenant as misconfigured (credentials refused,
 * topic forbidden); the coordinator then excludes it instead of retrying.
 */
export class SubscriptionError extends AppError {
  public readonly tenantId: string

  /** HTTP status of the refused WebSocket upgrade, if any. */
  public readonly status?: number

  constructor(
    tenantId: string,
    message: string,
    options: { retryable: boolean; status?: number; cause?: unknown },
  ) {
    super(message, {
      category: 'BROKER',
      isOperational: true,
      retryable: options.retryable,
      cause: options.cause,
    })

    this.name = 'SubscriptionError'
    this.tenantId = tenantId
    this.status = options.status
  }
}
