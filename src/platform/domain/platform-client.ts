import type { Result } from '../../common/domain/result.js'
import type { SubmissionError } from '../../common/domain/errors/submission-error.js'
import type { EntityKind, MappedEntity } from '../../mapping/domain/models/MappedEntity.js'
import type { TenantContext } from '../../tenants/domain/models/TenantContext.js'

export type SubmissionReceipt = {
  kind: EntityKind
  /** HTTP status returned by the platform. */
  status: number
  /** Id the platform assigned to the created entity, when it returned one. */
  id?: string
}

export type SubmissionResult = Result<SubmissionReceipt, SubmissionError>

/**
 * Outbound port to the platform REST API.
 *
 * `submit` makes exactly one call and never retries: the retry budget belongs
 * to the message (broker redelivery), not to the call.
 */
export interface PlatformClient {
  submit(tenant: TenantContext, entity: MappedEntity): Promise<SubmissionResult>
}
