import WebSocket from 'ws'
import { z } from 'zod'
import type { Logger } from 'pino'
import { SubscriptionError } from '../../../common/domain/errors/subscription-error.js'
import { backoffDelay } from '../../../common/utils/retry.js'
import {
  loginName,
  type TenantContext,
} from '../../../tenants/domain/models/TenantContext.js'
import type {
  BrokerClient,
  Delivery,
  MessageListener,
  RawMessage,
  Subscription,
  SubscriptionLostListener,
} from '../../domain/broker.js'

/**
 * @file pulsar-websocket.broker.ts
 * @description
 * {@link BrokerClient} over the Pulsar WebSocket consumer API.
 *
 * One socket per tenant subscription. The broker pushes message frames; the
 * bridge answers each with an ack frame or a negative-ack frame.
 *
 * Connection handling:
 * - the first connect either opens or fails with a {@link SubscriptionError}
 *   (401/403 on the upgrade is not retryable)
 * - an open socket that closes without `close()` being called reconnects with
 *   a growing delay, capped at `reconnectMaxDelayMs`
 * - a reconnect refused with 401/403, or `reconnectMaxAttempts` failed
 *   reconnects in a row, ends the subscription and reports it through `onLost`
 * - deliveries received on a socket that has since closed are not settled;
 *   the broker redelivers them
 */

export type PulsarBrokerOptions = {
  /** `ws://host:port` or `wss://host:port`. */
  webSocketUrl: string
  receiverQueueSize: number
  maxRedeliverCount: number
  nackRedeliveryDelayMs: number
  deadLetterTopic?: string
  handshakeTimeoutMs?: number
  reconnectBaseDelayMs?: number
  reconnectMaxDelayMs?: number
  /** Failed reconnects in a row before the subscription is given up. */
  reconnectMaxAttempts?: number
}

const TOPIC_NAME = /^(persistent|non-persistent):\/\/([^/]+)\/([^/]+)\/(.+)$/

const MessageFrame = z.object({
  messageId: z.string().min(1),
  payload: z.string(),
  properties: z.record(z.string()).optional(),
  publishTime: z.string().optional(),
  redeliveryCount: z.number().int().nonnegative().optional(),
})

type MessageFrame = z.infer<typeof MessageFrame>

/**
 * Consumer endpoint of a tenant's topic and subscription.
 *
 * @example
 * consumerUrl({ webSocketUrl: 'ws://pulsar:8080', ... }, tenant)
 * // 'ws://pulsar:8080/ws/v2/consumer/persistent/t100/mqtt/from-device/t100_bridge?subscriptionType=Shared&...'
 */
export function consumerUrl(options: PulsarBrokerOptions, tenant: TenantContext): string {
  const match = TOPIC_NAME.exec(tenant.topic)
  if (!match) {
    throw new SubscriptionError(tenant.tenantId, `Topic ${tenant.topic} is not a fully qualified Pulsar topic`, {
      retryable: false,
    })
  }

  const [, domain, pulsarTenant, namespace, topic] = match
  const path = [
    'ws',
    'v2',
    'consumer',
    domain,
    encodeURIComponent(pulsarTenant),
    encodeURIComponent(namespace),
    encodeURIComponent(topic),
    encodeURIComponent(tenant.subscriptionName),
  ].join('/')

  const query = new URLSearchParams({
    subscriptionType: 'Shared',
    receiverQueueSize: String(options.receiverQueueSize),
    negativeAckRedeliveryDelay: String(options.nackRedeliveryDelayMs),
    maxRedeliverCount: String(options.maxRedeliverCount),
  })
  if (options.deadLetterTopic) {
    query.set('deadLetterTopic', options.deadLetterTopic)
  }

  return `${options.webSocketUrl.replace(/\/+$/, '')}/${path}?${query.toString()}`
}

function authorization(tenant: TenantContext): string {
  const token = Buffer.from(`${loginName(tenant.credentials)}:${tenant.credentials.password}`).toString('base64')
  return `Basic ${token}`
}

function frameText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8')
  if (Buffer.isBuffer(data)) return data.toString('utf-8')
  return Buffer.from(new Uint8Array(data)).toString('utf-8')
}

function toRawMessage(frame: MessageFrame): RawMessage {
  const published = frame.publishTime ? new Date(frame.publishTime) : new Date()

  return {
    id: frame.messageId,
    data: Buffer.from(frame.payload, 'base64'),
    publishTime: Number.isNaN(published.getTime()) ? new Date() : published,
    redeliveryCount: frame.redeliveryCount ?? 0,
    properties: Object.freeze({ ...(frame.properties ?? {}) }),
  }
}

class PulsarSubscription implements Subscription {
  private socket: WebSocket | null = null
  private closing = false
  /** Failed reconnects since the last successful upgrade. */
  private reconnectAttempt = 0
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null

  constructor(
    private readonly url: string,
    private readonly tenant: TenantContext,
    private readonly listener: MessageListener,
    private readonly onLost: SubscriptionLostListener | undefined,
    private readonly options: PulsarBrokerOptions,
    private readonly log: Logger,
  ) {}

  get topic(): string {
    return this.tenant.topic
  }

  /**
   * Opens a new socket and replaces the current one.
   *
   * @returns a promise that resolves once the upgrade succeeded
   * @throws SubscriptionError, not retryable for 401/403 on the upgrade
   */
  open(): Promise<void> {
    return new Promise((resolve, reject) => {
      let settled = false
      let opened = false

      const socket = new WebSocket(this.url, {
        headers: { Authorization: authorization(this.tenant) },
        handshakeTimeout: this.options.handshakeTimeoutMs ?? 10_000,
      })
      this.socket = socket

      const refuse = (error: SubscriptionError) => {
        if (settled) return
        settled = true
        reject(error)
      }

      socket.on('unexpected-response', (_request, response) => {
        const status = response.statusCode ?? 0
        const permanent = status === 401 || status === 403
        refuse(
          new SubscriptionError(
            this.tenant.tenantId,
            `Broker refused subscription on ${this.tenant.topic} with HTTP ${status}`,
            { retryable: !permanent, status },
          ),
        )
        socket.terminate()
      })

      socket.on('open', () => {
        opened = true
        settled = true
        this.reconnectAttempt = 0
        this.log.info({ topic: this.tenant.topic, subscription: this.tenant.subscriptionName }, 'Subscribed')
        resolve()
      })

      socket.on('message', (data) => {
        this.onFrame(socket, data)
      })

      socket.on('error', (err) => {
        if (!settled) {
          refuse(
            new SubscriptionError(this.tenant.tenantId, `Could not reach broker for ${this.tenant.topic}`, {
              retryable: true,
              cause: err,
            }),
          )
          return
        }
        this.log.error({ err, topic: this.tenant.topic }, 'Broker socket error')
      })

      socket.on('close', (code, reason) => {
        if (!opened || this.closing || socket !== this.socket) return
        this.log.warn({ code, reason: reason.toString(), topic: this.tenant.topic }, 'Broker socket closed, reconnecting')
        this.scheduleReconnect()
      })
    })
  }

  /** Closes the socket with 1000 and stops reconnecting. */
  async close(): Promise<void> {
    this.closing = true
    this.cancelReconnect()

    const socket = this.socket
    this.socket = null
    if (!socket || socket.readyState === WebSocket.CLOSED) return

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve())
      if (socket.readyState === WebSocket.OPEN) {
        socket.close(1000, 'consumer closed')
      } else {
        socket.terminate()
      }
    })

    this.log.info({ topic: this.tenant.topic }, 'Subscription closed')
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
  }

  /**
   * Waits `backoffDelay(attempt)` and opens a new socket. A failed reconnect
   * schedules the next one, unless it was refused for good or the budget is
   * spent.
   */
  private scheduleReconnect(): void {
    if (this.closing || this.reconnectTimer) return

    this.reconnectAttempt++
    const delay = backoffDelay(this.reconnectAttempt, {
      baseDelayMs: this.options.reconnectBaseDelayMs ?? 1000,
      maxDelayMs: this.options.reconnectMaxDelayMs ?? 30_000,
      backoffMultiplier: 2,
    })

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      if (this.closing) return

      this.open().catch((err: unknown) => this.onReconnectFailed(err))
    }, delay)
  }

  /**
   * @param err - rejection of {@link open}; always a SubscriptionError in practice
   */
  private onReconnectFailed(err: unknown): void {
    if (this.closing) return

    const maxAttempts = this.options.reconnectMaxAttempts ?? 10
    const attempt = this.reconnectAttempt

    if (err instanceof SubscriptionError && !err.retryable) {
      this.giveUp(err)
      return
    }

    if (attempt >= maxAttempts) {
      this.giveUp(
        new SubscriptionError(
          this.tenant.tenantId,
          `Could not reconnect to ${this.tenant.topic} after ${attempt} attempts`,
          { retryable: false, cause: err },
        ),
      )
      return
    }

    this.log.error({ err, attempt, maxAttempts, topic: this.tenant.topic }, 'Reconnect failed')
    this.scheduleReconnect()
  }

  /** Ends the subscription without a new attempt and reports why. */
  private giveUp(error: SubscriptionError): void {
    this.closing = true
    this.cancelReconnect()

    const socket = this.socket
    this.socket = null
    socket?.terminate()

    this.log.error({ err: error, status: error.status, topic: this.tenant.topic }, 'Subscription lost')
    this.onLost?.(error)
  }

  /**
   * Parses one frame and hands message frames to the listener. Anything else
   * (ack receipts, malformed frames) is logged and dropped.
   */
  private onFrame(socket: WebSocket, data: WebSocket.RawData): void {
    let parsed: unknown
    try {
      parsed = JSON.parse(frameText(data))
    } catch (err) {
      this.log.warn({ err, topic: this.tenant.topic }, 'Ignoring non-JSON broker frame')
      return
    }

    const frame = MessageFrame.safeParse(parsed)
    if (!frame.success) {
      // acknowledgement receipts and other control frames
      this.log.debug({ frame: parsed }, 'Ignoring broker frame')
      return
    }

    const message = toRawMessage(frame.data)
    this.listener(this.delivery(socket, message))
  }

  /**
   * Binds settlement to the socket the message arrived on.
   *
   * @param socket - socket that delivered `message`; frames for a closed socket are not sent
   */
  private delivery(socket: WebSocket, message: RawMessage): Delivery {
    const send = (frame: Record<string, string>) => {
      if (socket.readyState !== WebSocket.OPEN) {
        this.log.debug({ messageId: message.id }, 'Socket gone, leaving message to redelivery')
        return
      }
      socket.send(JSON.stringify(frame))
    }

    return {
      message,
      ack: () => send({ messageId: message.id }),
      nack: ({ redeliver }) =>
        // Pulsar cannot reject without redelivery: a terminal nack drops the message
        redeliver ? send({ type: 'negativeAcknowledge', messageId: message.id }) : send({ messageId: message.id }),
    }
  }
}

export class PulsarWebSocketBroker implements BrokerClient {
  constructor(
    private readonly options: PulsarBrokerOptions,
    private readonly log: Logger,
  ) {}

  /**
   * Opens the tenant's consumer socket.
   *
   * @param listener - called once per message frame
   * @param onLost - called at most once, when reconnecting is given up
   * @returns once the first upgrade succeeded
   * @throws SubscriptionError when the topic is malformed or the first connect fails
   */
  async subscribe(
    tenant: TenantContext,
    listener: MessageListener,
    onLost?: SubscriptionLostListener,
  ): Promise<Subscription> {
    const url = consumerUrl(this.options, tenant)
    const subscription = new PulsarSubscription(
      url,
      tenant,
      listener,
      onLost,
      this.options,
      this.log.child({ tenant: tenant.tenantId }),
    )

    await subscription.open()
    return subscription
  }
}
