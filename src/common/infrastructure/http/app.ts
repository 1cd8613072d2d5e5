// Express 5 forwards rejected promises of handlers to the error handler
import express, { type Express } from 'express'
import type { Logger } from 'pino'
import { createErrorHandler } from './middlewares/errorHandler.js'
import { createRoutes, type HealthCheck } from './routes.js'

/**
 * Express app of the health endpoint. Kept apart from `server.ts` so tests can
 * drive it without binding a port.
 */
export function createApp(isHealthy: HealthCheck, log: Logger): Express {
  const app = express()

  app.disable('x-powered-by')
  app.use(createRoutes(isHealthy))
  app.use(createErrorHandler(log))

  return app
}
