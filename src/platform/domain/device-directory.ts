import type { Result } from '../../common/domain/result.js'
import type { SubmissionError } from '../../common/domain/errors/submission-error.js'
import type { TenantContext } from '../../tenants/domain/models/TenantContext.js'

/**
 * Turns the device id found in a message into the platform id that entities
 * are attached to (their `source`).
 */
export interface DeviceDirectory {
  resolveSource(tenant: TenantContext, deviceId: string): Promise<Result<string, SubmissionError>>
}

/** Device ids in messages already are platform ids. */
export class DirectDeviceDirectory implements DeviceDirectory {
  async resolveSource(_tenant: TenantContext, deviceId: string): Promise<Result<string, SubmissionError>> {
    return { ok: true, value: deviceId }
  }
}
