import { AppError } from './app-error.js'

/**
 * Invalid or incomplete environment configuration.
 */
export class ConfigError extends AppError {
  /** One line per invalid variable, `NAME: reason`. */
  public readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(message, {
      category: 'CONFIG',
      isOperational: true,
      retryable: false,
    })

    this.name = 'ConfigError'
    this.issues = issues
  }
}
