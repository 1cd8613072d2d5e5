import type { AxiosInstance, AxiosResponse } from 'axios'
import type { Logger } from 'pino'
import { z } from 'zod'
import type { BasicCredentials } from '../../../config/bridge.js'
import { StartupError } from '../../../common/domain/errors/startup-error.js'
import { SubmissionError } from '../../../common/domain/errors/submission-error.js'
import { AppError } from '../../../common/domain/errors/app-error.js'
import { retry, type RetryOptions } from '../../../common/utils/retry.js'
import { basicAuth } from '../../../platform/infrastructure/http/platform-http.js'
import {
  classifyRequestFailure,
  classifyStatus,
} from '../../../platform/infrastructure/http/classify.js'
import type { CredentialResolver } from '../../domain/providers/credential-resolver.js'
import {
  createTenantContext,
  type TenantContext,
  type TopicSettings,
} from '../../domain/models/TenantContext.js'

/**
 * @file bootstrap-credential-resolver.ts
 * @description
 * MULTI_TENANT isolation. The bootstrap user lists the tenants subscribed to
 * the service together with the service user created in each of them.
 *
 * The listing is retried with exponential backoff; a 4xx other than 429 stops
 * the retries at once, since the bootstrap credentials themselves are wrong.
 */

export const SUBSCRIPTIONS_PATH = '/application/currentApplication/subscriptions'

const SubscriptionsSchema = z.object({
  users: z.array(
    z.object({
      tenant: z.string().min(1),
      name: z.string().min(1),
      password: z.string().min(1),
    }),
  ),
})

export type BootstrapResolverOptions = {
  bootstrap: BasicCredentials
  topics: TopicSettings
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs?: number
  sleep?: RetryOptions['sleep']
}

export class BootstrapCredentialResolver implements CredentialResolver {
  constructor(
    private readonly http: AxiosInstance,
    private readonly options: BootstrapResolverOptions,
    private readonly log: Logger,
  ) {}

  async resolve(): Promise<TenantContext[]> {
    let users: BasicCredentials[]

    try {
      users = await retry(() => this.fetchSubscriptions(), {
        maxAttempts: this.options.maxAttempts,
        baseDelayMs: this.options.baseDelayMs,
        maxDelayMs: this.options.maxDelayMs ?? 30_000,
        backoffMultiplier: 2,
        sleep: this.options.sleep,
        shouldRetry: (err) => err instanceof AppError && err.retryable,
        onRetry: (err, attempt, delayMs) =>
          this.log.warn(
            { err, attempt, maxAttempts: this.options.maxAttempts, delayMs: Math.round(delayMs) },
            'Tenant bootstrap failed, retrying',
          ),
      })
    } catch (err) {
      throw new StartupError(
        'Could not list subscribed tenants',
        { maxAttempts: this.options.maxAttempts },
        err,
      )
    }

    if (users.length === 0) {
      throw new StartupError('No tenant is subscribed to this service')
    }

    const tenants = users.map((user) => createTenantContext(user, this.options.topics))
    this.log.info({ tenants: tenants.map((t) => t.tenantId) }, 'Resolved subscribed tenants')
    return tenants
  }

  /**
   * One call to the subscriptions endpoint. Entries are de-duplicated by tenant
   * and sorted, so the same response always yields the same tenant list.
   */
  private async fetchSubscriptions(): Promise<BasicCredentials[]> {
    const operation = 'List tenant subscriptions'

    let response: AxiosResponse<unknown>
    try {
      response = await this.http.get<unknown>(SUBSCRIPTIONS_PATH, {
        auth: basicAuth(this.options.bootstrap),
      })
    } catch (err) {
      throw classifyRequestFailure(err, operation)
    }

    const failure = classifyStatus(response.status, operation)
    if (failure) throw failure

    const parsed = SubscriptionsSchema.safeParse(response.data)
    if (!parsed.success) {
      throw new SubmissionError('permanent', `${operation} returned an unexpected body`, {
        status: response.status,
        cause: parsed.error,
      })
    }

    const byTenant = new Map<string, BasicCredentials>()
    for (const user of parsed.data.users) {
      byTenant.set(user.tenant, { tenant: user.tenant, user: user.name, password: user.password })
    }

    return [...byTenant.values()].sort((a, b) => a.tenant.localeCompare(b.tenant))
  }
}
