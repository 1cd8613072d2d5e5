import { describe, it } from 'mocha'
import { expect } from 'chai'
import { StartupError } from '../src/common/domain/errors/startup-error.js'
import { SubmissionError } from '../src/common/domain/errors/submission-error.js'
import { ResolveTenantsUseCase } from '../src/tenants/app/usecases/resolve-tenants.usecase.js'
import { deriveSubscriptionName, deriveTopic } from '../src/tenants/domain/models/TenantContext.js'
import {
  BootstrapCredentialResolver,
  SUBSCRIPTIONS_PATH,
} from '../src/tenants/infrastructure/providers/bootstrap-credential-resolver.js'
import { StaticCredentialResolver } from '../src/tenants/infrastructure/providers/static-credential-resolver.js'
import { fakeHttp, noSleep, rejectionOf, silentLogger, tenant, topicSettings, type FakeReply } from './helpers.js'

const subscriptions = {
  users: [
    { tenant: 't200', name: 'service_t200', password: 'test-secret-2' },
    { tenant: 't100', name: 'service_t100', password: 'test-secret-1' },
    { tenant: 't200', name: 'service_t200', password: 'test-secret-2' },
  ],
}

function bootstrapResolver(replies: FakeReply[], maxAttempts = 3) {
  let call = 0
  const { http, requests } = fakeHttp(() => replies[Math.min(call++, replies.length - 1)])
  const resolver = new BootstrapCredentialResolver(
    http,
    {
      bootstrap: { tenant: 'management', user: 'bootstrap', password: 'test-secret' },
      topics: topicSettings,
      maxAttempts,
      baseDelayMs: 10,
      sleep: noSleep,
    },
    silentLogger,
  )
  return { resolver, requests }
}

describe('tenant context', () => {
  it('derives topic and subscription from the tenant id', () => {
    expect(deriveTopic('persistent://{tenant}/mqtt/from-device', 't100')).to.equal('persistent://t100/mqtt/from-device')
    expect(deriveSubscriptionName(topicSettings, 't100')).to.equal('t100_bridge')
    expect(deriveSubscriptionName({ ...topicSettings, subscriptionPerTenant: false }, 't100')).to.equal('bridge')
  })

  it('is frozen', () => {
    expect(Object.isFrozen(tenant('t100'))).to.equal(true)
    expect(Object.isFrozen(tenant('t100').credentials)).to.equal(true)
  })
})

describe('StaticCredentialResolver', () => {
  it('yields the configured tenant', async () => {
    const resolver = new StaticCredentialResolver({ tenant: 't100', user: 'service', password: 'test-secret' }, topicSettings)

    expect(await resolver.resolve()).to.deep.equal([tenant('t100')])
  })

  it('fails without credentials', async () => {
    const resolver = new StaticCredentialResolver(undefined, topicSettings)

    expect(await rejectionOf(resolver.resolve())).to.be.instanceOf(StartupError)
  })
})

describe('BootstrapCredentialResolver', () => {
  it('lists subscribed tenants with the bootstrap user', async () => {
    const { resolver, requests } = bootstrapResolver([{ status: 200, data: subscriptions }])

    const tenants = await resolver.resolve()

    expect(requests).to.have.length(1)
    expect(requests[0].url).to.equal(SUBSCRIPTIONS_PATH)
    expect(requests[0].auth).to.deep.equal({ username: 'management/bootstrap', password: 'test-secret' })
    expect(tenants).to.deep.equal([
      {
        tenantId: 't100',
        credentials: { tenant: 't100', user: 'service_t100', password: 'test-secret-1' },
        topic: 'persistent://t100/mqtt/from-device',
        subscriptionName: 't100_bridge',
      },
      {
        tenantId: 't200',
        credentials: { tenant: 't200', user: 'service_t200', password: 'test-secret-2' },
        topic: 'persistent://t200/mqtt/from-device',
        subscriptionName: 't200_bridge',
      },
    ])
  })

  it('yields the same tenants for the same response', async () => {
    const first = await bootstrapResolver([{ status: 200, data: subscriptions }]).resolver.resolve()
    const second = await bootstrapResolver([{ status: 200, data: subscriptions }]).resolver.resolve()

    expect(first).to.deep.equal(second)
  })

  it('retries transient failures', async () => {
    const { resolver, requests } = bootstrapResolver([
      { status: 503 },
      { networkError: 'ECONNRESET' },
      { status: 200, data: subscriptions },
    ])

    expect((await resolver.resolve()).map((t) => t.tenantId)).to.deep.equal(['t100', 't200'])
    expect(requests).to.have.length(3)
  })

  it('fails startup once the attempts are spent', async () => {
    const { resolver, requests } = bootstrapResolver([{ status: 503 }], 3)

    const error = await rejectionOf(resolver.resolve())

    expect(error).to.be.instanceOf(StartupError)
    expect(error instanceof StartupError && error.cause).to.be.instanceOf(SubmissionError)
    expect(requests).to.have.length(3)
  })

  it('does not retry refused bootstrap credentials', async () => {
    const { resolver, requests } = bootstrapResolver([{ status: 401 }], 5)

    expect(await rejectionOf(resolver.resolve())).to.be.instanceOf(StartupError)
    expect(requests).to.have.length(1)
  })

  it('fails startup when no tenant is subscribed', async () => {
    const { resolver } = bootstrapResolver([{ status: 200, data: { users: [] } }])
    const error = await rejectionOf(resolver.resolve())

    expect(error).to.be.instanceOf(StartupError)
    expect(error instanceof Error && error.message).to.equal('No tenant is subscribed to this service')
  })

  it('does not retry an unexpected body', async () => {
    const { resolver, requests } = bootstrapResolver([{ status: 200, data: { tenants: [] } }])

    expect(await rejectionOf(resolver.resolve())).to.be.instanceOf(StartupError)
    expect(requests).to.have.length(1)
  })
})

describe('ResolveTenantsUseCase', () => {
  it('indexes tenants by id', async () => {
    const registry = await new ResolveTenantsUseCase(
      { resolve: async () => [tenant('t100'), tenant('t200')] },
      silentLogger,
    ).execute()

    expect([...registry.keys()]).to.deep.equal(['t100', 't200'])
    expect(registry.get('t200')?.topic).to.equal('persistent://t200/mqtt/from-device')
  })

  it('refuses an empty tenant list', async () => {
    const useCase = new ResolveTenantsUseCase({ resolve: async () => [] }, silentLogger)

    expect(await rejectionOf(useCase.execute())).to.be.instanceOf(StartupError)
  })
})
