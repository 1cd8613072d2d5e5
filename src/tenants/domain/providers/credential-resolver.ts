import type { TenantContext } from '../models/TenantContext.js'

/**
 * Produces one {@link TenantContext} per tenant the service serves.
 *
 * Implementations may call the platform; they throw `StartupError` when no
 * tenant can be resolved.
 */
export interface CredentialResolver {
  resolve(): Promise<TenantContext[]>
}
