import { container, type DependencyContainer } from 'tsyringe'
import type { Logger } from 'pino'
import { buildBridgeConfig, type BridgeConfig } from './config/bridge.js'
import { parseEnv } from './config/env.js'
import { registerDependencies } from './common/infrastructure/container/index.js'
import { createApp } from './common/infrastructure/http/app.js'
import { startHealthServer, type HealthServer } from './common/infrastructure/http/server.js'
import { configureLogger } from './common/infrastructure/logger/index.js'
import { PipelineCoordinator, type ConsumerFactory } from './messaging/app/pipeline-coordinator.js'
import type { ResolveTenantsUseCase } from './tenants/app/usecases/resolve-tenants.usecase.js'

/**
 * @file app.ts
 * @description
 * Bootstrap sequence:
 * 1. validate the environment and configure logging
 * 2. bind the health endpoint (DOWN until a tenant is consuming)
 * 3. resolve tenants, then open one subscription per tenant
 * 4. on SIGINT/SIGTERM: drain, close, exit 0
 *
 * Any failure before the pipeline runs is fatal.
 */

export type RunningBridge = {
  coordinator: PipelineCoordinator
  health: HealthServer
  stop(): Promise<void>
}

export async function startBridge(
  config: BridgeConfig,
  log: Logger,
  parent: DependencyContainer = container,
): Promise<RunningBridge> {
  const c = registerDependencies(config, log, parent)

  let coordinator: PipelineCoordinator | null = null
  const app = createApp(() => {
    const status = coordinator?.status()
    return status !== undefined && status.running && status.active.length > 0
  }, log.child({ component: 'http' }))

  const health = await startHealthServer(app, config.http.port, log)

  try {
    const tenants = await c.resolve<ResolveTenantsUseCase>('ResolveTenantsUseCase').execute()

    coordinator = new PipelineCoordinator(
      tenants,
      c.resolve<ConsumerFactory>('ConsumerFactory'),
      {
        connectMaxAttempts: config.pulsar.connectMaxAttempts,
        shutdownTimeoutMs: config.consumer.shutdownTimeoutMs,
      },
      log.child({ component: 'coordinator' }),
    )
    await coordinator.start()
  } catch (err) {
    await health.close()
    throw err
  }

  const running = coordinator
  return {
    coordinator: running,
    health,
    stop: async () => {
      await running.stop()
      await health.close()
    },
  }
}

export async function main(source: NodeJS.ProcessEnv = process.env): Promise<void> {
  const config = buildBridgeConfig(parseEnv(source))
  const log = configureLogger({ name: config.appName, level: config.logLevel })

  log.info(
    {
      isolation: config.tenants.isolation,
      platform: config.platform.baseUrl,
      broker: config.pulsar.webSocketUrl,
      topicTemplate: config.pulsar.topicTemplate,
      maxRedeliverCount: config.pulsar.maxRedeliverCount,
      deadLetterTopic: config.pulsar.deadLetterTopic ?? null,
      defaultAlarmSeverity: config.mapping.defaultAlarmSeverity,
      deviceIdentity: config.devices.mode,
    },
    'Starting bridge',
  )

  const bridge = await startBridge(config, log)

  const shutdown = createShutdown(bridge, log)
  const onSignal = (signal: NodeJS.Signals) => {
    void shutdown(signal)
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)
}

/**
 * Signal handler body: stops the bridge, then exits 0, or 1 when stopping failed.
 *
 * @param exit - process exit, replaced in tests
 */
export function createShutdown(
  bridge: Pick<RunningBridge, 'stop'>,
  log: Logger,
  exit: (code: number) => void = (code) => process.exit(code),
): (signal: NodeJS.Signals) => Promise<void> {
  return async (signal) => {
    log.info({ signal }, 'Shutdown requested')

    let code = 0
    try {
      await bridge.stop()
      log.info('Bridge stopped')
    } catch (err) {
      log.error({ err }, 'Shutdown failed')
      code = 1
    }
    exit(code)
  }
}
