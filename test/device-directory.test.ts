import { describe, it } from 'mocha'
import { expect } from 'chai'
import { DirectDeviceDirectory } from '../src/platform/domain/device-directory.js'
import {
  IdentityDeviceDirectory,
  type IdentityDirectoryOptions,
} from '../src/platform/infrastructure/http/identity-device.directory.js'
import { fakeHttp, silentLogger, tenant, unwrap, unwrapError, type FakeReply, type RecordedRequest } from './helpers.js'

const options: IdentityDirectoryOptions = {
  autoRegister: true,
  externalIdType: 'c8y_Serial',
  namePrefix: 'Device-',
  deviceType: 'pulsar_bridge_Device',
}

/** Platform stand-in with an in-memory identity table. */
function identityPlatform(known: Record<string, string>, overrides: { lookup?: FakeReply } = {}) {
  let nextId = 6001
  return fakeHttp((request: RecordedRequest): FakeReply => {
    if (request.method === 'GET') {
      if (overrides.lookup) return overrides.lookup
      const externalId = decodeURIComponent(request.url.split('/').pop() ?? '')
      const id = known[externalId]
      return id ? { status: 200, data: { managedObject: { id } } } : { status: 404 }
    }
    if (request.url === '/inventory/managedObjects') {
      return { status: 201, data: { id: String(nextId++) } }
    }
    return { status: 201, data: {} }
  })
}

describe('IdentityDeviceDirectory', () => {
  it('resolves a known external id and caches it', async () => {
    const { http, requests } = identityPlatform({ 'dev 1': '5001' })
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    expect(unwrap(await directory.resolveSource(tenant('t100'), 'dev 1'))).to.equal('5001')
    expect(unwrap(await directory.resolveSource(tenant('t100'), 'dev 1'))).to.equal('5001')

    expect(requests).to.have.length(1)
    expect(requests[0].url).to.equal('/identity/externalIds/c8y_Serial/dev%201')
    expect(requests[0].auth).to.deep.equal({ username: 't100/service', password: 'test-secret' })
  })

  it('keeps one cache per tenant', async () => {
    const { http, requests } = identityPlatform({ 'dev-1': '5001' })
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    await directory.resolveSource(tenant('t100'), 'dev-1')
    await directory.resolveSource(tenant('t200'), 'dev-1')

    expect(requests.map((r) => r.auth?.username)).to.deep.equal(['t100/service', 't200/service'])
  })

  it('registers an unknown device and binds its external id', async () => {
    const { http, requests } = identityPlatform({})
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    expect(unwrap(await directory.resolveSource(tenant('t100'), 'dev-9'))).to.equal('6001')

    expect(requests.map((r) => `${r.method} ${r.url}`)).to.deep.equal([
      'GET /identity/externalIds/c8y_Serial/dev-9',
      'POST /inventory/managedObjects',
      'POST /identity/globalIds/6001/externalIds',
    ])
    expect(requests[1].body).to.deep.equal({ name: 'Device-dev-9', type: 'pulsar_bridge_Device', c8y_IsDevice: {} })
    expect(requests[2].body).to.deep.equal({ externalId: 'dev-9', type: 'c8y_Serial' })
  })

  it('registers a new device once for concurrent messages', async () => {
    const { http, requests } = identityPlatform({})
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    const [first, second] = await Promise.all([
      directory.resolveSource(tenant('t100'), 'dev-9'),
      directory.resolveSource(tenant('t100'), 'dev-9'),
    ])

    expect(unwrap(first)).to.equal('6001')
    expect(unwrap(second)).to.equal('6001')
    expect(requests).to.have.length(3)
  })

  it('uses the existing device when the external id was bound concurrently', async () => {
    let bound = false
    const { http } = fakeHttp((request): FakeReply => {
      if (request.method === 'GET') {
        return bound ? { status: 200, data: { managedObject: { id: '5555' } } } : { status: 404 }
      }
      if (request.url === '/inventory/managedObjects') return { status: 201, data: { id: '6001' } }
      bound = true
      return { status: 409 }
    })
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    expect(unwrap(await directory.resolveSource(tenant('t100'), 'dev-9'))).to.equal('5555')
  })

  it('fails permanently for unknown devices without auto-registration', async () => {
    const { http, requests } = identityPlatform({})
    const directory = new IdentityDeviceDirectory(http, { ...options, autoRegister: false }, silentLogger)

    const error = unwrapError(await directory.resolveSource(tenant('t100'), 'dev-9'))

    expect(error.kind).to.equal('permanent')
    expect(error.status).to.equal(404)
    expect(requests).to.have.length(1)
  })

  it('does not cache transient failures', async () => {
    const { http, requests } = identityPlatform({}, { lookup: { status: 503 } })
    const directory = new IdentityDeviceDirectory(http, options, silentLogger)

    expect(unwrapError(await directory.resolveSource(tenant('t100'), 'dev-1')).kind).to.equal('transient')
    expect(unwrapError(await directory.resolveSource(tenant('t100'), 'dev-1')).kind).to.equal('transient')
    expect(requests).to.have.length(2)
  })
})

describe('DirectDeviceDirectory', () => {
  it('uses the device id as the source id', async () => {
    expect(unwrap(await new DirectDeviceDirectory().resolveSource(tenant('t100'), '1001'))).to.equal('1001')
  })
})
