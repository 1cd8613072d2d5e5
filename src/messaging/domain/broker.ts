import type { SubscriptionError } from '../../common/domain/errors/subscription-error.js'
import type { TenantContext } from '../../tenants/domain/models/TenantContext.js'

/**
 * @file broker.ts
 * @description
 * Broker-neutral view of a tenant subscription. The consumer only sees these
 * types; the Pulsar adapter lives in `infrastructure/pulsar`.
 */

export type RawMessage = {
  /** Broker message id, opaque to the bridge. */
  id: string
  data: Buffer
  publishTime: Date
  /** How many times the broker has delivered this message before. */
  redeliveryCount: number
  properties: Readonly<Record<string, string>>
}

export type NackOptions = {
  /** `true` asks the broker for a later redelivery; `false` gives the message up. */
  redeliver: boolean
}

/**
 * A received message plus its settlement handles. Exactly one of `ack` or
 * `nack` must be called per delivery.
 */
export interface Delivery {
  readonly message: RawMessage
  ack(): void
  nack(options: NackOptions): void
}

export type MessageListener = (delivery: Delivery) => void

/**
 * Called at most once, when an open subscription is gone for good: the broker
 * refused a reconnect, or the reconnect budget ran out. No delivery follows.
 */
export type SubscriptionLostListener = (error: SubscriptionError) => void

export interface Subscription {
  readonly topic: string
  /** Stops receiving. Unsettled deliveries are redelivered by the broker. */
  close(): Promise<void>
}

export interface BrokerClient {
  /**
   * Opens the tenant's subscription on its topic.
   *
   * @throws SubscriptionError when the broker refuses or is unreachable.
   */
  subscribe(
    tenant: TenantContext,
    listener: MessageListener,
    onLost?: SubscriptionLostListener,
  ): Promise<Subscription>
}
