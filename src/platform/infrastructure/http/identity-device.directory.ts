import type { AxiosInstance, AxiosResponse } from 'axios'
import type { Logger } from 'pino'
import { SubmissionError } from '../../../common/domain/errors/submission-error.js'
import { fail, ok, type Result } from '../../../common/domain/result.js'
import type { TenantContext } from '../../../tenants/domain/models/TenantContext.js'
import type { DeviceDirectory } from '../../domain/device-directory.js'
import { classifyRequestFailure, classifyStatus } from './classify.js'
import { basicAuth } from './platform-http.js'

/**
 * @file identity-device.directory.ts
 * @description
 * Resolves device ids from messages as external ids through the platform's
 * identity API, registering unknown devices when enabled.
 *
 * Flow for an unknown id:
 * 1. `GET /identity/externalIds/{type}/{id}` → 404
 * 2. `POST /inventory/managedObjects` creates the device
 * 3. `POST /identity/globalIds/{moId}/externalIds` binds the external id
 *
 * Resolved ids are cached per tenant. Concurrent resolutions of the same id
 * share one lookup, so two messages of a new device create it once.
 */

export type IdentityDirectoryOptions = {
  autoRegister: boolean
  externalIdType: string
  namePrefix: string
  deviceType: string
}

type Resolution = Result<string, SubmissionError>

function managedObjectId(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined

  const holder = 'managedObject' in data ? data.managedObject : data
  if (typeof holder === 'object' && holder !== null && 'id' in holder) {
    const id = holder.id
    if (typeof id === 'string' || typeof id === 'number') return String(id)
  }
  return undefined
}

export class IdentityDeviceDirectory implements DeviceDirectory {
  /** tenant id → (external id → managed object id) */
  private readonly cache = new Map<string, Map<string, string>>()
  private readonly inFlight = new Map<string, Promise<Resolution>>()

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: IdentityDirectoryOptions,
    private readonly log: Logger,
  ) {}

  /**
   * Managed object id of `deviceId` in `tenant`.
   *
   * @param deviceId - external id of type `externalIdType`
   * @returns the id, or a SubmissionError classified like a submission failure
   */
  async resolveSource(tenant: TenantContext, deviceId: string): Promise<Resolution> {
    const cached = this.cache.get(tenant.tenantId)?.get(deviceId)
    if (cached) return ok(cached)

    const key = `${tenant.tenantId}\u0000${deviceId}`
    const pending = this.inFlight.get(key)
    if (pending) return pending

    const resolution = this.lookupOrRegister(tenant, deviceId).finally(() => {
      this.inFlight.delete(key)
    })
    this.inFlight.set(key, resolution)
    return resolution
  }

  private async lookupOrRegister(tenant: TenantContext, deviceId: string): Promise<Resolution> {
    const found = await this.lookup(tenant, deviceId)
    if (!found.ok || found.value !== null) {
      return found.ok ? this.remember(tenant, deviceId, found.value) : found
    }

    if (!this.options.autoRegister) {
      return fail(
        new SubmissionError(
          'permanent',
          `Device ${deviceId} (${this.options.externalIdType}) is not registered`,
          { status: 404 },
        ),
      )
    }

    return this.register(tenant, deviceId)
  }

  /** @returns the managed object id, or `null` when the external id is unknown. */
  private async lookup(tenant: TenantContext, deviceId: string): Promise<Result<string | null, SubmissionError>> {
    const operation = 'Look up device identity'
    const path =
      `/identity/externalIds/${encodeURIComponent(this.options.externalIdType)}` +
      `/${encodeURIComponent(deviceId)}`

    const response = await this.call(() => this.http.get<unknown>(path, { auth: basicAuth(tenant.credentials) }), operation)
    if (!response.ok) return response

    if (response.value.status === 404) return ok(null)

    const failure = classifyStatus(response.value.status, operation)
    if (failure) return fail(failure)

    const id = managedObjectId(response.value.data)
    if (!id) {
      return fail(new SubmissionError('transient', `${operation}: response has no managedObject.id`))
    }
    return ok(id)
  }

  /**
   * Creates the device and binds `deviceId` to it. A 409 on the bind means
   * another writer got there first; the existing binding is looked up instead.
   */
  private async register(tenant: TenantContext, deviceId: string): Promise<Resolution> {
    const auth = basicAuth(tenant.credentials)

    const created = await this.call(
      () =>
        this.http.post<unknown>(
          '/inventory/managedObjects',
          {
            name: `${this.options.namePrefix}${deviceId}`,
            type: this.options.deviceType,
            c8y_IsDevice: {},
          },
          { auth, headers: { 'Content-Type': 'application/vnd.com.nsn.cumulocity.managedobject+json' } },
        ),
      'Create device',
    )
    if (!created.ok) return created

    const createFailure = classifyStatus(created.value.status, 'Create device')
    if (createFailure) return fail(createFailure)

    const moId = managedObjectId(created.value.data)
    if (!moId) {
      return fail(new SubmissionError('transient', 'Create device: response has no id'))
    }

    const bound = await this.call(
      () =>
        this.http.post<unknown>(
          `/identity/globalIds/${encodeURIComponent(moId)}/externalIds`,
          { externalId: deviceId, type: this.options.externalIdType },
          { auth, headers: { 'Content-Type': 'application/vnd.com.nsn.cumulocity.externalid+json' } },
        ),
      'Bind external id',
    )
    if (!bound.ok) {
      this.log.warn({ tenant: tenant.tenantId, deviceId, moId }, 'Device created but external id not bound')
      return bound
    }

    if (bound.value.status === 409) {
      // another instance bound the id first; its device wins
      this.log.warn({ tenant: tenant.tenantId, deviceId, orphan: moId }, 'External id already bound, using existing device')
      const existing = await this.lookup(tenant, deviceId)
      if (!existing.ok) return existing
      if (existing.value === null) {
        return fail(new SubmissionError('transient', `Device ${deviceId} bound elsewhere but not found`, { status: 409 }))
      }
      return this.remember(tenant, deviceId, existing.value)
    }

    const bindFailure = classifyStatus(bound.value.status, 'Bind external id')
    if (bindFailure) {
      this.log.warn({ tenant: tenant.tenantId, deviceId, moId }, 'Device created but external id not bound')
      return fail(bindFailure)
    }

    this.log.info({ tenant: tenant.tenantId, deviceId, moId }, 'Registered new device')
    return this.remember(tenant, deviceId, moId)
  }

  private remember(tenant: TenantContext, deviceId: string, moId: string): Resolution {
    let byDevice = this.cache.get(tenant.tenantId)
    if (!byDevice) {
      byDevice = new Map()
      this.cache.set(tenant.tenantId, byDevice)
    }
    byDevice.set(deviceId, moId)
    return ok(moId)
  }

  /**
   * @param operation - prefix of the error message, e.g. `Create device`
   * @returns the response for any HTTP status; a rejection becomes a classified failure
   */
  private async call(
    send: () => Promise<AxiosResponse<unknown>>,
    operation: string,
  ): Promise<Result<AxiosResponse<unknown>, SubmissionError>> {
    try {
      return ok(await send())
    } catch (err) {
      return fail(classifyRequestFailure(err, operation))
    }
  }
}
