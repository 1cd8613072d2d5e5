import type { Logger } from 'pino'
import { AppError } from '../../common/domain/errors/app-error.js'
import { StartupError } from '../../common/domain/errors/startup-error.js'
import type { SubscriptionError } from '../../common/domain/errors/subscription-error.js'
import { retry, type RetryOptions } from '../../common/utils/retry.js'
import type { TenantRegistry } from '../../tenants/app/usecases/resolve-tenants.usecase.js'
import type { TenantContext } from '../../tenants/domain/models/TenantContext.js'
import type { MessageConsumer } from './message-consumer.js'

/**
 * @file pipeline-coordinator.ts
 * @description
 * Runs one {@link MessageConsumer} per tenant.
 *
 * Startup opens every subscription concurrently. A tenant whose subscription
 * cannot be opened (refused credentials, retries exhausted) is excluded and
 * logged; the others keep running. Only when no tenant is left does startup
 * fail. A subscription lost later on excludes its tenant the same way.
 *
 * Shutdown: stop accepting, drain in-flight messages up to the shutdown
 * timeout, then close every subscription.
 */

export type ConsumerFactory = (tenant: TenantContext) => MessageConsumer

export type CoordinatorOptions = {
  connectMaxAttempts: number
  connectBaseDelayMs?: number
  connectMaxDelayMs?: number
  shutdownTimeoutMs: number
  /** Injected by tests to skip the backoff waits. */
  sleep?: RetryOptions['sleep']
}

export type ExcludedTenant = {
  tenantId: string
  reason: string
}

export type PipelineStatus = {
  running: boolean
  active: string[]
  excluded: ExcludedTenant[]
}

export class PipelineCoordinator {
  private readonly consumers = new Map<string, MessageConsumer>()
  private readonly excluded: ExcludedTenant[] = []
  private running = false
  private stopping: Promise<void> | null = null

  constructor(
    private readonly tenants: TenantRegistry,
    private readonly createConsumer: ConsumerFactory,
    private readonly options: CoordinatorOptions,
    private readonly log: Logger,
  ) {}

  /**
   * @throws StartupError when no tenant subscription could be opened.
   */
  async start(): Promise<PipelineStatus> {
    if (this.running) return this.status()

    const tenants = [...this.tenants.values()]
    const results = await Promise.allSettled(tenants.map((tenant) => this.startTenant(tenant)))

    results.forEach((result, i) => {
      const tenant = tenants[i]
      if (result.status === 'fulfilled' && result.value.active) {
        this.consumers.set(tenant.tenantId, result.value)
        return
      }
      if (result.status === 'fulfilled') {
        this.excluded.push({ tenantId: tenant.tenantId, reason: 'Subscription lost during startup' })
        this.log.error({ tenant: tenant.tenantId, topic: tenant.topic }, 'Tenant excluded: subscription lost during startup')
        return
      }

      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason)
      this.excluded.push({ tenantId: tenant.tenantId, reason })
      this.log.error(
        { err: result.reason, tenant: tenant.tenantId, topic: tenant.topic },
        'Tenant excluded: subscription could not be opened',
      )
    })

    if (this.consumers.size === 0) {
      throw new StartupError('No tenant subscription could be opened', {
        excluded: this.excluded.map((entry) => entry.tenantId),
      })
    }

    this.running = true
    const status = this.status()
    this.log.info({ active: status.active, excluded: status.excluded.length }, 'Pipeline started')
    return status
  }

  /** Idempotent; concurrent calls share the same shutdown. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown()
    }
    return this.stopping
  }

  status(): PipelineStatus {
    return {
      running: this.running,
      active: [...this.consumers.values()].filter((c) => c.active).map((c) => c.tenant.tenantId),
      excluded: [...this.excluded],
    }
  }

  private async startTenant(tenant: TenantContext): Promise<MessageConsumer> {
    const consumer = this.createConsumer(tenant)

    await retry(() => consumer.start((error) => this.onSubscriptionLost(consumer, error)), {
      maxAttempts: this.options.connectMaxAttempts,
      baseDelayMs: this.options.connectBaseDelayMs ?? 1000,
      maxDelayMs: this.options.connectMaxDelayMs ?? 30_000,
      sleep: this.options.sleep,
      shouldRetry: (err) => !(err instanceof AppError) || err.retryable,
      onRetry: (err, attempt, delayMs) => {
        this.log.warn({ err, tenant: tenant.tenantId, attempt, delayMs }, 'Subscription failed, retrying')
      },
    })

    return consumer
  }

  /**
   * Excludes a running tenant whose subscription ended for good. Its in-flight
   * messages can no longer be settled; the broker redelivers them.
   */
  private onSubscriptionLost(consumer: MessageConsumer, error: SubscriptionError): void {
    const { tenantId, topic } = consumer.tenant
    if (this.consumers.get(tenantId) !== consumer) return

    this.consumers.delete(tenantId)
    this.excluded.push({ tenantId, reason: error.message })
    this.log.error({ err: error, tenant: tenantId, topic }, 'Tenant excluded: subscription lost')

    if (this.consumers.size === 0) {
      this.log.error('No tenant left consuming')
    }
  }

  private async shutdown(): Promise<void> {
    const consumers = [...this.consumers.values()]
    this.log.info({ tenants: consumers.length, timeoutMs: this.options.shutdownTimeoutMs }, 'Stopping pipeline')

    for (const consumer of consumers) {
      consumer.stopAccepting()
    }

    const drained = await Promise.all(consumers.map((c) => c.drain(this.options.shutdownTimeoutMs)))
    if (drained.some((ok) => !ok)) {
      this.log.warn('Shutdown timeout reached with messages still in flight; the broker will redeliver them')
    }

    const closed = await Promise.allSettled(consumers.map((c) => c.close()))
    closed.forEach((result, i) => {
      if (result.status === 'rejected') {
        this.log.error({ err: result.reason, tenant: consumers[i].tenant.tenantId }, 'Failed to close subscription')
      }
    })

    this.running = false
    this.log.info('Pipeline stopped')
  }
}
