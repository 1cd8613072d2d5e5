import pino, { type Logger } from 'pino'

export type { Logger }

/**
 * @file index.ts
 * @description
 * Root pino logger of the process. Components take a named child so every
 * line says where it came from (`consumer`, `platform-client`, ...).
 *
 * `rootLogger()` before `configureLogger()` (a failure while reading the
 * configuration) falls back to `LOG_LEVEL` from the environment.
 */

let root: Logger | null = null

export function configureLogger(options: { name: string; level: string }): Logger {
  root = pino({
    name: options.name,
    level: options.level,
    timestamp: pino.stdTimeFunctions.isoTime,
  })
  return root
}

export function rootLogger(): Logger {
  if (!root) {
    root = pino({ name: 'bridge', level: process.env.LOG_LEVEL ?? 'info' })
  }
  return root
}
