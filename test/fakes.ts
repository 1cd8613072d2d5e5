import { SubmissionError } from '../src/common/domain/errors/submission-error.js'
import { fail, ok } from '../src/common/domain/result.js'
import type { MappedEntity } from '../src/mapping/domain/models/MappedEntity.js'
import type { SubscriptionError } from '../src/common/domain/errors/subscription-error.js'
import type {
  BrokerClient,
  Delivery,
  MessageListener,
  Subscription,
  SubscriptionLostListener,
} from '../src/messaging/domain/broker.js'
import type { PlatformClient, SubmissionResult } from '../src/platform/domain/platform-client.js'
import type { TenantContext } from '../src/tenants/domain/models/TenantContext.js'

/** In-memory broker: tests push deliveries through the registered listener. */
export class InMemoryBroker implements BrokerClient {
  readonly listeners = new Map<string, MessageListener>()
  readonly lostListeners = new Map<string, SubscriptionLostListener>()
  readonly closed: string[] = []
  subscribeCalls = 0

  /** Per-tenant failures to throw from `subscribe`, consumed one per call. */
  readonly failures = new Map<string, Error[]>()

  async subscribe(
    tenant: TenantContext,
    listener: MessageListener,
    onLost?: SubscriptionLostListener,
  ): Promise<Subscription> {
    this.subscribeCalls++

    const queued = this.failures.get(tenant.tenantId)
    const failure = queued?.shift()
    if (failure) throw failure

    this.listeners.set(tenant.tenantId, listener)
    if (onLost) this.lostListeners.set(tenant.tenantId, onLost)
    return {
      topic: tenant.topic,
      close: async () => {
        this.listeners.delete(tenant.tenantId)
        this.closed.push(tenant.tenantId)
      },
    }
  }

  /** Ends a tenant's subscription the way a refused reconnect would. */
  lose(tenantId: string, error: SubscriptionError): void {
    const onLost = this.lostListeners.get(tenantId)
    if (!onLost) throw new Error(`no lost listener for ${tenantId}`)
    this.listeners.delete(tenantId)
    this.lostListeners.delete(tenantId)
    onLost(error)
  }

  deliver(tenantId: string, delivery: Delivery): void {
    const listener = this.listeners.get(tenantId)
    if (!listener) throw new Error(`no subscription for ${tenantId}`)
    listener(delivery)
  }
}

export type SubmitCall = { tenantId: string; entity: MappedEntity }

/** Platform stand-in answering every submission through `answer`. */
export class FakePlatform implements PlatformClient {
  readonly calls: SubmitCall[] = []

  constructor(
    private readonly answer: (call: SubmitCall) => SubmissionResult | Promise<SubmissionResult> = (call) =>
      ok({ kind: call.entity.kind, status: 201, id: 'created-1' }),
  ) {}

  async submit(tenant: TenantContext, entity: MappedEntity): Promise<SubmissionResult> {
    const call = { tenantId: tenant.tenantId, entity }
    this.calls.push(call)
    return this.answer(call)
  }
}

export function transientFailure(status = 503): SubmissionResult {
  return fail(new SubmissionError('transient', `Create measurement failed with HTTP ${status}`, { status }))
}

export function permanentFailure(status = 400): SubmissionResult {
  return fail(new SubmissionError('permanent', `Create measurement rejected with HTTP ${status}`, { status }))
}
