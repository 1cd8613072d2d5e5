import type { AxiosInstance, AxiosResponse } from 'axios'
import type { Logger } from 'pino'
import { SubmissionError } from '../../../common/domain/errors/submission-error.js'
import { fail, ok } from '../../../common/domain/result.js'
import {
  assertNever,
  type MappedEntity,
  type MeasurementValue,
} from '../../../mapping/domain/models/MappedEntity.js'
import type { TenantContext } from '../../../tenants/domain/models/TenantContext.js'
import type { PlatformClient, SubmissionResult } from '../../domain/platform-client.js'
import { classifyRequestFailure, classifyStatus } from './classify.js'
import { basicAuth } from './platform-http.js'

/**
 * @file http-platform.client.ts
 * @description
 * REST adapter of {@link PlatformClient}: one POST per entity, to the
 * measurement, event or alarm collection of the tenant.
 */

export type PlatformRequest = {
  path: string
  contentType: string
  body: Record<string, unknown>
}

/**
 * Request for an entity. The switch is exhaustive over `entity.kind`.
 */
export function toPlatformRequest(entity: MappedEntity): PlatformRequest {
  const base = {
    source: { id: entity.deviceId },
    type: entity.type,
    time: entity.time,
  }

  switch (entity.kind) {
    case 'measurement': {
      const series: Record<string, MeasurementValue> = {}
      for (const [name, reading] of Object.entries(entity.values)) {
        series[name] = reading.unit === undefined ? { value: reading.value } : { ...reading }
      }
      return {
        path: '/measurement/measurements',
        contentType: 'application/vnd.com.nsn.cumulocity.measurement+json',
        // the fragment carrying the series is named after the measurement type
        body: { ...base, [entity.type]: series },
      }
    }
    case 'event':
      return {
        path: '/event/events',
        contentType: 'application/vnd.com.nsn.cumulocity.event+json',
        body: { ...base, text: entity.text },
      }
    case 'alarm':
      return {
        path: '/alarm/alarms',
        contentType: 'application/vnd.com.nsn.cumulocity.alarm+json',
        body: { ...base, text: entity.text, severity: entity.severity, status: 'ACTIVE' },
      }
    default:
      return assertNever(entity)
  }
}

function createdId(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'id' in data) {
    const id = data.id
    if (typeof id === 'string' || typeof id === 'number') return String(id)
  }
  return undefined
}

export class HttpPlatformClient implements PlatformClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly log: Logger,
  ) {}

  async submit(tenant: TenantContext, entity: MappedEntity): Promise<SubmissionResult> {
    const operation = `Create ${entity.kind}`

    if (entity.deviceId.trim() === '') {
      return fail(new SubmissionError('validation', `${operation}: entity has no source id`))
    }

    const request = toPlatformRequest(entity)

    let response: AxiosResponse<unknown>
    try {
      response = await this.http.post<unknown>(request.path, request.body, {
        auth: basicAuth(tenant.credentials),
        headers: { 'Content-Type': request.contentType },
      })
    } catch (err) {
      return fail(classifyRequestFailure(err, operation))
    }

    const failure = classifyStatus(response.status, operation)
    if (failure) {
      this.log.debug(
        { tenant: tenant.tenantId, status: response.status, body: response.data },
        'Platform refused entity',
      )
      return fail(failure)
    }

    const id = createdId(response.data)
    this.log.debug(
      { tenant: tenant.tenantId, kind: entity.kind, type: entity.type, source: entity.deviceId, id },
      'Entity created',
    )

    return ok({ kind: entity.kind, status: response.status, id })
  }
}
