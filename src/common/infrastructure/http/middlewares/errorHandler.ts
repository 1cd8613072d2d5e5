import type { NextFunction, Request, Response } from 'express'
import type { Logger } from 'pino'

/**
 * @file errorHandler.ts
 * @description
 * Last Express middleware. The health route only reads in-memory state, so
 * anything reaching this point is a bug: it is logged and answered with a
 * generic 500 body.
 */

export function createErrorHandler(log: Logger) {
  return function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    _next: NextFunction,
  ): void {
    log.error({ err }, 'Unhandled error')
    res.status(500).json({
      error: {
        name: 'InternalServerError',
        message: 'Internal Server Error',
        timestamp: new Date().toISOString(),
      },
    })
  }
}
