import type { Server } from 'node:http'
import type { Express } from 'express'
import type { Logger } from 'pino'
import { StartupError } from '../../domain/errors/startup-error.js'

/**
 * @file server.ts
 * @description
 * Binds the health app to its port.
 */

export type HealthServer = {
  /** Bound port; differs from the requested one when that was 0. */
  port: number
  close(): Promise<void>
}

export function startHealthServer(app: Express, port: number, log: Logger): Promise<HealthServer> {
  return new Promise((resolve, reject) => {
    const server: Server = app.listen(port)

    server.once('error', (err: NodeJS.ErrnoException) => {
      const message =
        err.code === 'EADDRINUSE' ? `Port ${port} is already in use` : 'Health server could not start'
      reject(new StartupError(message, { port }, err))
    })

    server.once('listening', () => {
      const address = server.address()
      const bound = typeof address === 'object' && address !== null ? address.port : port
      log.info({ port: bound }, 'Health endpoint listening')

      resolve({
        port: bound,
        close: () =>
          new Promise<void>((done, fail) => {
            server.close((err) => (err ? fail(err) : done()))
          }),
      })
    })
  })
}
