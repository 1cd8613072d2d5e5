import { AppError } from './app-error.js'

export type MappingErrorKind =
  | 'MissingDeviceId'
  | 'InvalidTimestamp'
  | 'MissingField'
  | 'InvalidField'
  | 'NoMeasurementValues'

/**
 * A decoded payload whose shape or content cannot become a platform entity.
 *
 * Returned by the mapper rather than thrown. Not retryable: the producer has to
 * change what it publishes.
 */
export class MappingError extends AppError {
  public readonly kind: MappingErrorKind

  /** Offending field, when the failure is tied to one. */
  public readonly field?: string

  constructor(kind: MappingErrorKind, message: string, field?: string) {
    super(message, {
      category: 'MAPPING',
      isOperational: true,
      retryable: false,
    })

    this.name = 'MappingError'
    this.kind = kind
    this.field = field
  }
}
