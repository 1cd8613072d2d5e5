import type { Logger } from 'pino'
import { AppError } from '../../common/domain/errors/app-error.js'
import { ConcurrencyLimiter } from '../../common/utils/concurrency-limiter.js'
import { previewPayload } from '../../common/utils/payload-preview.js'
import { decodePayload } from '../../mapping/app/decode-payload.js'
import { mapPayload, type MappingOptions } from '../../mapping/app/map-payload.js'
import type { DeviceDirectory } from '../../platform/domain/device-directory.js'
import type { PlatformClient, SubmissionReceipt } from '../../platform/domain/platform-client.js'
import type { TenantContext } from '../../tenants/domain/models/TenantContext.js'
import type { BrokerClient, Delivery, Subscription, SubscriptionLostListener } from '../domain/broker.js'
import { matchesTopicFilter } from '../domain/topic-filter.js'

/**
 * @file message-consumer.ts
 * @description
 * Consumes one tenant's topic: decode → map → resolve device → submit, then
 * settles the delivery.
 *
 * Settlement policy:
 * - submitted, or filtered out by `topicFilter` → ack
 * - decode error, mapping error, permanent or validation failure → terminal nack
 * - transient failure → nack with redelivery
 * - transient failure past `maxRedeliverCount` without a dead-letter topic → ack (dropped)
 * - any other exception counts as transient
 *
 * A failure only ever settles its own delivery; other messages keep flowing.
 */

/** MQTT properties the broker's MQTT service attaches to each message. */
export const CLIENT_ID_PROPERTY = 'clientID'
export const MQTT_TOPIC_PROPERTY = 'topic'

export type ConsumerOptions = {
  maxInFlight: number
  maxRedeliverCount: number
  deadLetterTopic?: string
  topicFilter?: string
}

export type ConsumerDependencies = {
  broker: BrokerClient
  platform: PlatformClient
  devices: DeviceDirectory
  mapping: MappingOptions
  options: ConsumerOptions
  log: Logger
  /** Ingestion time of messages without a timestamp. */
  clock?: () => Date
}

export type ProcessOutcome =
  | { status: 'submitted'; receipt: SubmissionReceipt }
  | { status: 'skipped'; topic: string | undefined }
  | { status: 'rejected'; error: AppError }
  | { status: 'retry'; error: AppError }
  | { status: 'dropped'; error: AppError }
  | { status: 'refused' }

/**
 * Wraps a delivery so that it settles at most once. A second `ack`/`nack` is
 * ignored and logged.
 */
export function settleOnce(delivery: Delivery, log: Logger): Delivery {
  let settledAs: 'ack' | 'nack' | null = null

  const settle = (how: 'ack' | 'nack', action: () => void) => {
    if (settledAs) {
      log.error({ messageId: delivery.message.id, settledAs, attempted: how }, 'Delivery already settled')
      return
    }
    settledAs = how
    action()
  }

  return {
    message: delivery.message,
    ack: () => settle('ack', () => delivery.ack()),
    nack: (options) => settle('nack', () => delivery.nack(options)),
  }
}

export class MessageConsumer {
  private readonly limiter: ConcurrencyLimiter
  private readonly inFlight = new Set<Promise<ProcessOutcome>>()
  private readonly log: Logger
  private readonly clock: () => Date
  private subscription: Subscription | null = null
  private accepting = true

  constructor(
    readonly tenant: TenantContext,
    private readonly deps: ConsumerDependencies,
  ) {
    this.limiter = new ConcurrencyLimiter(deps.options.maxInFlight)
    this.log = deps.log.child({ tenant: tenant.tenantId })
    this.clock = deps.clock ?? (() => new Date())
  }

  get active(): boolean {
    return this.subscription !== null
  }

  get pending(): number {
    return this.inFlight.size
  }

  /**
   * Opens the tenant subscription. Calling it again while subscribed does nothing.
   *
   * @param onLost - told when the open subscription later ends for good
   * @throws SubscriptionError when the broker refuses the subscription.
   */
  async start(onLost?: SubscriptionLostListener): Promise<void> {
    if (this.subscription) return

    this.accepting = true
    this.subscription = await this.deps.broker.subscribe(
      this.tenant,
      (delivery) => {
        this.track(this.process(delivery))
      },
      (error) => {
        this.subscription = null
        this.accepting = false
        onLost?.(error)
      },
    )
  }

  /**
   * Runs one delivery through the pipeline and settles it. Never rejects.
   */
  async process(delivery: Delivery): Promise<ProcessOutcome> {
    const guarded = settleOnce(delivery, this.log)

    if (!this.accepting) {
      guarded.nack({ redeliver: true })
      return { status: 'refused' }
    }

    try {
      return await this.limiter.run(() => this.handle(guarded))
    } catch (err) {
      const error =
        err instanceof AppError
          ? err
          : new AppError('Unexpected failure while processing message', {
              category: 'UNKNOWN',
              isOperational: false,
              retryable: true,
              cause: err,
            })
      return this.retryLater(guarded, error)
    }
  }

  /** New deliveries are nacked for redelivery from now on. */
  stopAccepting(): void {
    this.accepting = false
  }

  /**
   * Waits for in-flight deliveries, at most `timeoutMs`.
   *
   * @returns `true` when nothing was left in flight.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.inFlight.size === 0) return true

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs)
    })

    try {
      const drained = await Promise.race([
        Promise.allSettled([...this.inFlight]).then(() => true as const),
        timedOut,
      ])
      if (!drained) {
        this.log.warn({ pending: this.inFlight.size, timeoutMs }, 'Drain timed out')
      }
      return drained
    } finally {
      clearTimeout(timer)
    }
  }

  /** Closes the subscription; in-flight deliveries are not waited for (see {@link drain}). */
  async close(): Promise<void> {
    const subscription = this.subscription
    this.subscription = null
    this.accepting = false
    if (subscription) await subscription.close()
  }

  /** Keeps `task` in `inFlight` until it settles, so {@link drain} can wait for it. */
  private track(task: Promise<ProcessOutcome>): void {
    this.inFlight.add(task)
    void task
      .catch((err: unknown) => {
        this.log.error({ err }, 'Message processing rejected')
      })
      .finally(() => {
        this.inFlight.delete(task)
      })
  }

  /**
   * Filter, decode, map, resolve the source device, submit. Each failing step
   * settles the delivery itself and returns.
   *
   * @param delivery - already holds a limiter slot
   * @returns how the delivery was settled
   */
  private async handle(delivery: Delivery): Promise<ProcessOutcome> {
    const { message } = delivery
    const { options } = this.deps

    if (options.topicFilter) {
      const topic = message.properties[MQTT_TOPIC_PROPERTY]
      if (topic === undefined || !matchesTopicFilter(topic, options.topicFilter)) {
        this.log.info({ messageId: message.id, topic }, 'Ignoring message from topic')
        delivery.ack()
        return { status: 'skipped', topic }
      }
    }

    const decoded = decodePayload(message.data)
    if (!decoded.ok) return this.reject(delivery, decoded.error)

    const mapped = mapPayload(
      decoded.value,
      { fallbackDeviceId: message.properties[CLIENT_ID_PROPERTY], receivedAt: this.clock() },
      this.deps.mapping,
    )
    if (!mapped.ok) return this.reject(delivery, mapped.error)

    const entity = mapped.value

    const source = await this.deps.devices.resolveSource(this.tenant, entity.deviceId)
    if (!source.ok) return this.onSubmissionFailure(delivery, source.error)

    const submitted = await this.deps.platform.submit(this.tenant, { ...entity, deviceId: source.value })
    if (!submitted.ok) return this.onSubmissionFailure(delivery, submitted.error)

    delivery.ack()
    this.log.info(
      {
        messageId: message.id,
        kind: entity.kind,
        type: entity.type,
        deviceId: entity.deviceId,
        source: source.value,
        id: submitted.value.id,
      },
      'Message forwarded',
    )
    return { status: 'submitted', receipt: submitted.value }
  }

  private onSubmissionFailure(delivery: Delivery, error: AppError): ProcessOutcome {
    return error.retryable ? this.retryLater(delivery, error) : this.reject(delivery, error)
  }

  /** Terminal: the message is not redelivered. */
  private reject(delivery: Delivery, error: AppError): ProcessOutcome {
    delivery.nack({ redeliver: false })
    this.log.error(this.context(delivery, error), 'Message rejected')
    return { status: 'rejected', error }
  }

  /**
   * Nacks for redelivery, unless the redelivery bound is reached and no
   * dead-letter topic takes the message over; then it is acked and dropped.
   *
   * @returns `retry` or `dropped`
   */
  private retryLater(delivery: Delivery, error: AppError): ProcessOutcome {
    const { maxRedeliverCount, deadLetterTopic } = this.deps.options

    if (delivery.message.redeliveryCount >= maxRedeliverCount && !deadLetterTopic) {
      delivery.ack()
      this.log.warn({ ...this.context(delivery, error), maxRedeliverCount }, 'Redeliveries exhausted, message dropped')
      return { status: 'dropped', error }
    }

    delivery.nack({ redeliver: true })
    this.log.warn(this.context(delivery, error), 'Message will be redelivered')
    return { status: 'retry', error }
  }

  /** Log fields shared by every failed delivery. */
  private context(delivery: Delivery, error: AppError): Record<string, unknown> {
    const { message } = delivery
    return {
      err: error,
      category: error.category,
      retryable: error.retryable,
      messageId: message.id,
      redeliveryCount: message.redeliveryCount,
      payload: previewPayload(message.data),
    }
  }
}
