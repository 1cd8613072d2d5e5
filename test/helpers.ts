import axios, { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios'
import pino, { type Logger } from 'pino'
import type { Delivery, NackOptions, RawMessage } from '../src/messaging/domain/broker.js'
import type { Result } from '../src/common/domain/result.js'
import { createTenantContext, type TenantContext } from '../src/tenants/domain/models/TenantContext.js'

export const silentLogger: Logger = pino({ level: 'silent' })

export const topicSettings = {
  topicTemplate: 'persistent://{tenant}/mqtt/from-device',
  subscriptionName: 'bridge',
  subscriptionPerTenant: true,
}

export function tenant(id: string, password = 'test-secret'): TenantContext {
  return createTenantContext({ tenant: id, user: 'service', password }, topicSettings)
}

export type RecordedRequest = {
  method: string
  url: string
  body: unknown
  auth?: { username: string; password: string }
  headers: Record<string, unknown>
}

export type FakeReply = { status: number; data?: unknown } | { networkError: string }

/**
 * axios instance whose transport is `reply`; every request is recorded.
 */
export function fakeHttp(reply: (request: RecordedRequest) => FakeReply | Promise<FakeReply>): {
  http: AxiosInstance
  requests: RecordedRequest[]
} {
  const requests: RecordedRequest[] = []

  const http = axios.create({
    baseURL: 'http://platform.test',
    validateStatus: () => true,
    adapter: async (config: InternalAxiosRequestConfig) => {
      const request: RecordedRequest = {
        method: (config.method ?? 'get').toUpperCase(),
        url: config.url ?? '',
        body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
        auth: config.auth,
        headers: config.headers.toJSON(),
      }
      requests.push(request)

      const answer = await reply(request)
      if ('networkError' in answer) {
        throw new AxiosError(answer.networkError, answer.networkError, config)
      }

      return {
        data: answer.data ?? {},
        status: answer.status,
        statusText: String(answer.status),
        headers: {},
        config,
      }
    },
  })

  return { http, requests }
}

export function rawMessage(body: string | Buffer | object, overrides: Partial<RawMessage> = {}): RawMessage {
  const data =
    typeof body === 'string' ? Buffer.from(body, 'utf-8') : Buffer.isBuffer(body) ? body : Buffer.from(JSON.stringify(body))

  return {
    id: 'msg-1',
    data,
    publishTime: new Date('2024-05-01T10:00:00.000Z'),
    redeliveryCount: 0,
    properties: {},
    ...overrides,
  }
}

export type Settlement = { action: 'ack' } | { action: 'nack'; redeliver: boolean }

/** Delivery that records how (and how often) it was settled. */
export class RecordingDelivery implements Delivery {
  readonly settlements: Settlement[] = []

  constructor(readonly message: RawMessage) {}

  ack(): void {
    this.settlements.push({ action: 'ack' })
  }

  nack(options: NackOptions): void {
    this.settlements.push({ action: 'nack', redeliver: options.redeliver })
  }
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}

/** Lets pending promise callbacks and I/O callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

export const noSleep = async (): Promise<void> => undefined

export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`expected success, got ${String(result.error)}`)
  return result.value
}

export function unwrapError<T, E>(result: Result<T, E>): E {
  if (result.ok) throw new Error(`expected failure, got ${JSON.stringify(result.value)}`)
  return result.error
}

/** Error a promise rejects with; fails the test when it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise
  } catch (err) {
    return err
  }
  throw new Error('expected the promise to reject')
}
