import { z } from 'zod'
import { ConfigError } from '../common/domain/errors/config-error.js'
import { isValidTopicFilter } from '../messaging/domain/topic-filter.js'

/**
 * @file env.ts
 * @description
 * Reads and validates the environment once, at startup.
 *
 * - `.default(...)` gives the fallback of optional variables
 * - `z.coerce` turns the strings of `process.env` into numbers
 * - cross-field rules (credentials per isolation mode) live in `superRefine`
 *
 * Nothing here is re-read later: there is no hot reload.
 */

/** `"true"` / `"false"` flag; `z.coerce.boolean()` would read `"false"` as true. */
const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true')

const positiveInt = z.coerce.number().int().positive()

/** Unit table for flat measurement values, given as a JSON object of strings. */
const unitTable = z
  .string()
  .default('{}')
  .transform((raw, ctx): Record<string, string> => {
    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON object' })
      return z.NEVER
    }

    const result = z.record(z.string()).safeParse(parsed)
    if (!result.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must map series names to unit strings',
      })
      return z.NEVER
    }
    return result.data
  })

export const ALARM_SEVERITIES = ['CRITICAL', 'MAJOR', 'MINOR', 'WARNING'] as const

export const EnvSchema = z
  .object({
    /** Logical service name, used as the root logger name. */
    APP_NAME: z.string().default('pulsar-platform-bridge'),

    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    /** Port of the health endpoint. */
    PORT: z.coerce.number().int().min(0).max(65535).default(80),

    /** Platform REST base URL. */
    C8Y_BASEURL: z.string().url(),

    /** PER_TENANT: one tenant from C8Y_TENANT/C8Y_USER/C8Y_PASSWORD. MULTI_TENANT: bootstrap call. */
    C8Y_MICROSERVICE_ISOLATION: z.enum(['PER_TENANT', 'MULTI_TENANT']).default('PER_TENANT'),

    C8Y_TENANT: z.string().min(1).optional(),
    C8Y_USER: z.string().min(1).optional(),
    C8Y_PASSWORD: z.string().min(1).optional(),

    C8Y_BOOTSTRAP_TENANT: z.string().min(1).optional(),
    C8Y_BOOTSTRAP_USER: z.string().min(1).optional(),
    C8Y_BOOTSTRAP_PASSWORD: z.string().min(1).optional(),

    /** Attempts of the subscriptions bootstrap call before startup fails. */
    BOOTSTRAP_MAX_ATTEMPTS: positiveInt.default(5),
    BOOTSTRAP_BASE_DELAY_MS: positiveInt.default(1000),

    /** Broker address: pulsar://, pulsar+ssl://, ws://, wss://, http:// or https://. */
    C8Y_BASEURL_PULSAR: z.string().url(),

    /** Topic per tenant; `{tenant}` is replaced by the tenant id. */
    PULSAR_TOPIC_TEMPLATE: z
      .string()
      .regex(/^persistent:\/\/[^/]+\/[^/]+\/[^/]+$/, 'must look like persistent://{tenant}/namespace/topic')
      .refine((value) => value.includes('{tenant}'), 'must contain {tenant}')
      .default('persistent://{tenant}/mqtt/from-device'),

    PULSAR_SUBSCRIPTION_NAME: z.string().min(1).default('pulsar-platform-bridge'),

    /** Prefix the subscription name with the tenant id, `{tenant}_{name}`. */
    PULSAR_SUBSCRIPTION_PER_TENANT: booleanFlag(true),

    PULSAR_RECEIVER_QUEUE_SIZE: positiveInt.default(100),

    /** Broker-side redelivery bound. Operational setting: no default on purpose. */
    PULSAR_MAX_REDELIVER_COUNT: positiveInt,

    PULSAR_NACK_REDELIVERY_DELAY_MS: positiveInt.default(60_000),

    /** Where the broker moves messages once the redelivery bound is reached. */
    PULSAR_DEAD_LETTER_TOPIC: z.string().min(1).optional(),

    /** Attempts to open a tenant's subscription before the tenant is excluded. */
    PULSAR_CONNECT_MAX_ATTEMPTS: positiveInt.default(5),

    /** Failed reconnects in a row before a running tenant is excluded. */
    PULSAR_RECONNECT_MAX_ATTEMPTS: positiveInt.default(10),

    /** MQTT topic filter (`+`, `#` wildcards) matched against the `topic` message property. */
    MQTT_TOPIC_FILTER: z
      .string()
      .refine(isValidTopicFilter, 'must be an MQTT topic filter (`+` and a trailing `#` as whole levels)')
      .optional(),

    MAX_IN_FLIGHT: positiveInt.default(16),

    SHUTDOWN_TIMEOUT_MS: positiveInt.default(10_000),

    DEFAULT_ALARM_SEVERITY: z
      .string()
      .transform((value) => value.trim().toUpperCase())
      .pipe(z.enum(ALARM_SEVERITIES))
      .default('MINOR'),

    DEFAULT_MEASUREMENT_TYPE: z.string().min(1).default('c8y_Measurement'),

    MEASUREMENT_UNITS: unitTable,

    /** `external`: device ids are external ids resolved through the identity API. `direct`: used as-is. */
    DEVICE_IDENTITY_MODE: z.enum(['external', 'direct']).default('external'),
    DEVICE_AUTO_REGISTER: booleanFlag(true),
    DEVICE_EXTERNAL_ID_TYPE: z.string().min(1).default('c8y_Serial'),
    DEVICE_NAME_PREFIX: z.string().default('Device-'),
    DEVICE_TYPE: z.string().min(1).default('pulsar_bridge_Device'),

    PLATFORM_REQUEST_TIMEOUT_MS: positiveInt.default(10_000),
  })
  .superRefine((env, ctx) => {
    const required =
      env.C8Y_MICROSERVICE_ISOLATION === 'PER_TENANT'
        ? (['C8Y_TENANT', 'C8Y_USER', 'C8Y_PASSWORD'] as const)
        : (['C8Y_BOOTSTRAP_TENANT', 'C8Y_BOOTSTRAP_USER', 'C8Y_BOOTSTRAP_PASSWORD'] as const)

    for (const key of required) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `required when C8Y_MICROSERVICE_ISOLATION=${env.C8Y_MICROSERVICE_ISOLATION}`,
        })
      }
    }
  })

export type Env = z.infer<typeof EnvSchema>

/**
 * Validates `source` (normally `process.env`).
 *
 * @throws ConfigError listing every invalid variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source)

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    )
    throw new ConfigError('Invalid environment variables', issues)
  }

  return result.data
}
