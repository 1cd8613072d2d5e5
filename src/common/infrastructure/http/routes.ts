import { Router } from 'express'

/**
 * @file routes.ts
 * @description
 * Root router. The bridge only exposes liveness for the platform's health checks.
 */

/** `true` while the service is doing useful work. */
export type HealthCheck = () => boolean

export function createRoutes(isHealthy: HealthCheck): Router {
  const routes = Router()

  routes.get('/health', (_req, res) => {
    if (isHealthy()) {
      res.status(200).json({ status: 'UP' })
      return
    }
    res.status(503).json({ status: 'DOWN' })
  })

  return routes
}
