import axios, { type AxiosInstance } from 'axios'
import type { BasicCredentials } from '../../../config/bridge.js'
import { loginName } from '../../../tenants/domain/models/TenantContext.js'

/**
 * Axios instance for the platform REST API.
 *
 * `validateStatus` accepts every status: callers classify responses themselves
 * through `classifyStatus`, so only transport failures reject.
 */
export function createPlatformHttp(options: {
  baseUrl: string
  timeoutMs: number
}): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    validateStatus: () => true,
    headers: { Accept: 'application/json' },
  })
}

/** Basic auth for axios, as `{tenant}/{user}` + password. */
export function basicAuth(credentials: Readonly<BasicCredentials>): {
  username: string
  password: string
} {
  return { username: loginName(credentials), password: credentials.password }
}
