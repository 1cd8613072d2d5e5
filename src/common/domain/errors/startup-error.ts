import { AppError } from './app-error.js'

/**
 * Fatal bootstrap failure: no tenant could be resolved or subscribed.
 * The entrypoint turns it into a non-zero exit code.
 */
export class StartupError extends AppError {
  public readonly details?: Record<string, unknown>

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message, {
      category: 'BOOTSTRAP',
      isOperational: true,
      retryable: false,
      cause,
    })

    this.name = 'StartupError'
    this.details = details
  }
}
