import type { BasicCredentials } from '../../../config/bridge.js'

/**
 * @file TenantContext.ts
 * @description
 * Everything the pipeline needs to serve one tenant: the credentials bound to
 * it, the topic it consumes and the subscription it consumes under.
 *
 * Built once at startup by the credential resolver and frozen; the pipeline
 * passes it explicitly instead of reading ambient configuration.
 */

export type TenantContext = {
  readonly tenantId: string
  readonly credentials: Readonly<BasicCredentials>
  /** Fully qualified topic, `persistent://{tenant}/{namespace}/{topic}`. */
  readonly topic: string
  readonly subscriptionName: string
}

export type TopicSettings = {
  topicTemplate: string
  subscriptionName: string
  subscriptionPerTenant: boolean
}

/**
 * Topic of a tenant: every `{tenant}` placeholder of the template replaced.
 *
 * @example
 * deriveTopic('persistent://{tenant}/mqtt/from-device', 't100')
 * // 'persistent://t100/mqtt/from-device'
 */
export function deriveTopic(template: string, tenantId: string): string {
  return template.split('{tenant}').join(tenantId)
}

export function deriveSubscriptionName(settings: TopicSettings, tenantId: string): string {
  return settings.subscriptionPerTenant
    ? `${tenantId}_${settings.subscriptionName}`
    : settings.subscriptionName
}

export function createTenantContext(
  credentials: BasicCredentials,
  settings: TopicSettings,
): TenantContext {
  return Object.freeze({
    tenantId: credentials.tenant,
    credentials: Object.freeze({ ...credentials }),
    topic: deriveTopic(settings.topicTemplate, credentials.tenant),
    subscriptionName: deriveSubscriptionName(settings, credentials.tenant),
  })
}

/** `{tenant}/{user}`, the login form the platform and the broker expect. */
export function loginName(credentials: Readonly<BasicCredentials>): string {
  return `${credentials.tenant}/${credentials.user}`
}
