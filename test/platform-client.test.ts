import { describe, it } from 'mocha'
import { expect } from 'chai'
import type { MappedEntity } from '../src/mapping/domain/models/MappedEntity.js'
import { classifyStatus } from '../src/platform/infrastructure/http/classify.js'
import { HttpPlatformClient, toPlatformRequest } from '../src/platform/infrastructure/http/http-platform.client.js'
import { fakeHttp, silentLogger, tenant, unwrap, unwrapError, type FakeReply } from './helpers.js'

const measurement: MappedEntity = {
  kind: 'measurement',
  deviceId: '1001',
  type: 'c8y_Climate',
  time: '2024-05-01T10:00:00.000Z',
  values: { temperature: { value: 21.5, unit: 'C' }, humidity: { value: 40 } },
}

const alarm: MappedEntity = {
  kind: 'alarm',
  deviceId: '1001',
  type: 'c8y_Overheat',
  time: '2024-05-01T10:00:00.000Z',
  text: 'Too hot',
  severity: 'MAJOR',
}

function clientReplying(reply: FakeReply) {
  const { http, requests } = fakeHttp(() => reply)
  return { client: new HttpPlatformClient(http, silentLogger), requests }
}

describe('toPlatformRequest', () => {
  it('puts the measurement series under a fragment named after the type', () => {
    expect(toPlatformRequest(measurement)).to.deep.equal({
      path: '/measurement/measurements',
      contentType: 'application/vnd.com.nsn.cumulocity.measurement+json',
      body: {
        source: { id: '1001' },
        type: 'c8y_Climate',
        time: '2024-05-01T10:00:00.000Z',
        c8y_Climate: { temperature: { value: 21.5, unit: 'C' }, humidity: { value: 40 } },
      },
    })
  })

  it('creates events with their text', () => {
    const request = toPlatformRequest({
      kind: 'event',
      deviceId: '1001',
      type: 'c8y_DoorOpened',
      time: '2024-05-01T10:00:00.000Z',
      text: 'Door opened',
    })

    expect(request.path).to.equal('/event/events')
    expect(request.body).to.deep.equal({
      source: { id: '1001' },
      type: 'c8y_DoorOpened',
      time: '2024-05-01T10:00:00.000Z',
      text: 'Door opened',
    })
  })

  it('raises alarms as active', () => {
    const request = toPlatformRequest(alarm)

    expect(request.path).to.equal('/alarm/alarms')
    expect(request.body).to.deep.equal({
      source: { id: '1001' },
      type: 'c8y_Overheat',
      time: '2024-05-01T10:00:00.000Z',
      text: 'Too hot',
      severity: 'MAJOR',
      status: 'ACTIVE',
    })
  })
})

describe('classifyStatus', () => {
  it('classifies platform responses', () => {
    expect(classifyStatus(201, 'op')).to.equal(null)
    expect(classifyStatus(400, 'op')?.kind).to.equal('permanent')
    expect(classifyStatus(404, 'op')?.kind).to.equal('permanent')
    expect(classifyStatus(429, 'op')?.kind).to.equal('transient')
    expect(classifyStatus(500, 'op')?.kind).to.equal('transient')
    expect(classifyStatus(503, 'op')?.kind).to.equal('transient')
    expect(classifyStatus(302, 'op')?.kind).to.equal('transient')
  })
})

describe('HttpPlatformClient', () => {
  it('posts one request with the tenant credentials', async () => {
    const { client, requests } = clientReplying({ status: 201, data: { id: '7781' } })

    const receipt = unwrap(await client.submit(tenant('t100'), alarm))

    expect(receipt).to.deep.equal({ kind: 'alarm', status: 201, id: '7781' })
    expect(requests).to.have.length(1)
    expect(requests[0].method).to.equal('POST')
    expect(requests[0].url).to.equal('/alarm/alarms')
    expect(requests[0].auth).to.deep.equal({ username: 't100/service', password: 'test-secret' })
    expect(requests[0].headers['Content-Type']).to.equal('application/vnd.com.nsn.cumulocity.alarm+json')
  })

  it('treats 4xx other than 429 as permanent', async () => {
    for (const status of [400, 403, 422]) {
      const { client, requests } = clientReplying({ status, data: { error: 'invalid' } })
      const error = unwrapError(await client.submit(tenant('t100'), measurement))

      expect(error.kind).to.equal('permanent')
      expect(error.status).to.equal(status)
      expect(error.retryable).to.equal(false)
      expect(requests).to.have.length(1)
    }
  })

  it('treats 429 and 5xx as transient', async () => {
    for (const status of [429, 500, 503]) {
      const { client, requests } = clientReplying({ status })
      const error = unwrapError(await client.submit(tenant('t100'), measurement))

      expect(error.kind).to.equal('transient')
      expect(error.retryable).to.equal(true)
      expect(requests).to.have.length(1)
    }
  })

  it('treats connection failures as transient', async () => {
    const { client } = clientReplying({ networkError: 'ECONNREFUSED' })
    const error = unwrapError(await client.submit(tenant('t100'), measurement))

    expect(error.kind).to.equal('transient')
    expect(error.message).to.equal('Create measurement failed without response (ECONNREFUSED)')
  })

  it('treats unexpected statuses as transient', async () => {
    const { client } = clientReplying({ status: 302 })
    const error = unwrapError(await client.submit(tenant('t100'), measurement))

    expect(error.kind).to.equal('transient')
    expect(error.message).to.equal('Create measurement got unexpected HTTP 302')
  })

  it('refuses an entity without source locally', async () => {
    const { client, requests } = clientReplying({ status: 201 })
    const error = unwrapError(await client.submit(tenant('t100'), { ...alarm, deviceId: ' ' }))

    expect(error.kind).to.equal('validation')
    expect(requests).to.have.length(0)
  })
})
