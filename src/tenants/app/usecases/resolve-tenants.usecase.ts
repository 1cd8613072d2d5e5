import type { Logger } from 'pino'
import { StartupError } from '../../../common/domain/errors/startup-error.js'
import type { CredentialResolver } from '../../domain/providers/credential-resolver.js'
import type { TenantContext } from '../../domain/models/TenantContext.js'

/** Tenant id → tenant context, fixed for the lifetime of the process. */
export type TenantRegistry = ReadonlyMap<string, TenantContext>

/**
 * Use case: resolve the tenants this instance serves.
 *
 * @remarks
 * Runs once during bootstrap. The registry it returns is never modified
 * afterwards; tenants are passed through the pipeline from it explicitly.
 *
 * @throws StartupError when the resolver yields no tenant.
 */
export class ResolveTenantsUseCase {
  constructor(
    private readonly resolver: CredentialResolver,
    private readonly log: Logger,
  ) {}

  async execute(): Promise<TenantRegistry> {
    const tenants = await this.resolver.resolve()

    if (tenants.length === 0) {
      throw new StartupError('Credential resolution returned no tenant')
    }

    const registry = new Map<string, TenantContext>()
    for (const tenant of tenants) {
      registry.set(tenant.tenantId, tenant)
    }

    for (const tenant of registry.values()) {
      this.log.info(
        {
          tenant: tenant.tenantId,
          user: tenant.credentials.user,
          topic: tenant.topic,
          subscription: tenant.subscriptionName,
        },
        'Tenant context ready',
      )
    }

    return registry
  }
}
