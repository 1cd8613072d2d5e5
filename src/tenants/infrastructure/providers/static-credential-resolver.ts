import type { BasicCredentials } from '../../../config/bridge.js'
import { StartupError } from '../../../common/domain/errors/startup-error.js'
import type { CredentialResolver } from '../../domain/providers/credential-resolver.js'
import {
  createTenantContext,
  type TenantContext,
  type TopicSettings,
} from '../../domain/models/TenantContext.js'

/**
 * PER_TENANT isolation: the service user of the single tenant comes straight
 * from configuration.
 */
export class StaticCredentialResolver implements CredentialResolver {
  constructor(
    private readonly credentials: BasicCredentials | undefined,
    private readonly settings: TopicSettings,
  ) {}

  async resolve(): Promise<TenantContext[]> {
    if (!this.credentials) {
      throw new StartupError('No tenant credentials configured for PER_TENANT isolation')
    }
    return [createTenantContext(this.credentials, this.settings)]
  }
}
