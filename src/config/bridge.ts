import type { Env } from './env.js'
import type { AlarmSeverity } from '../mapping/domain/models/MappedEntity.js'
import { ConfigError } from '../common/domain/errors/config-error.js'

/**
 * @file bridge.ts
 * @description
 * Typed configuration handed to the components, derived once from {@link Env}.
 *
 * Each block matches one component so that a component only sees the settings
 * it acts on; nothing downstream reads `process.env`.
 */

export type IsolationMode = 'PER_TENANT' | 'MULTI_TENANT'

export type BasicCredentials = {
  tenant: string
  user: string
  password: string
}

export type BridgeConfig = {
  appName: string
  logLevel: string
  http: { port: number }
  platform: {
    baseUrl: string
    requestTimeoutMs: number
  }
  tenants: {
    isolation: IsolationMode
    /** Service user in PER_TENANT mode. */
    credentials?: BasicCredentials
    /** Bootstrap user in MULTI_TENANT mode. */
    bootstrap?: BasicCredentials
    bootstrapMaxAttempts: number
    bootstrapBaseDelayMs: number
  }
  pulsar: {
    /** ws:// or wss:// origin of the broker's WebSocket API. */
    webSocketUrl: string
    topicTemplate: string
    subscriptionName: string
    subscriptionPerTenant: boolean
    receiverQueueSize: number
    maxRedeliverCount: number
    nackRedeliveryDelayMs: number
    deadLetterTopic?: string
    connectMaxAttempts: number
    reconnectMaxAttempts: number
  }
  consumer: {
    maxInFlight: number
    shutdownTimeoutMs: number
    topicFilter?: string
  }
  mapping: {
    defaultAlarmSeverity: AlarmSeverity
    defaultMeasurementType: string
    units: Readonly<Record<string, string>>
  }
  devices: {
    mode: 'external' | 'direct'
    autoRegister: boolean
    externalIdType: string
    namePrefix: string
    deviceType: string
  }
}

const WS_SCHEMES: Record<string, 'ws:' | 'wss:'> = {
  'pulsar:': 'ws:',
  'http:': 'ws:',
  'ws:': 'ws:',
  'pulsar+ssl:': 'wss:',
  'https:': 'wss:',
  'wss:': 'wss:',
}

/**
 * Maps the configured broker URL to the origin of its WebSocket API.
 * Host and port are kept as given; any path is dropped.
 *
 * @example
 * toWebSocketUrl('pulsar+ssl://broker.local:8443') // 'wss://broker.local:8443'
 */
export function toWebSocketUrl(brokerUrl: string): string {
  const url = new URL(brokerUrl)
  const scheme = WS_SCHEMES[url.protocol]

  if (!scheme) {
    throw new ConfigError('Unsupported broker URL scheme', [
      `C8Y_BASEURL_PULSAR: scheme ${url.protocol} is not one of ${Object.keys(WS_SCHEMES).join(', ')}`,
    ])
  }

  return `${scheme}//${url.host}`
}

function credentials(
  tenant: string | undefined,
  user: string | undefined,
  password: string | undefined,
): BasicCredentials | undefined {
  return tenant && user && password ? { tenant, user, password } : undefined
}

export function buildBridgeConfig(env: Env): BridgeConfig {
  return {
    appName: env.APP_NAME,
    logLevel: env.LOG_LEVEL,
    http: { port: env.PORT },
    platform: {
      baseUrl: env.C8Y_BASEURL.replace(/\/+$/, ''),
      requestTimeoutMs: env.PLATFORM_REQUEST_TIMEOUT_MS,
    },
    tenants: {
      isolation: env.C8Y_MICROSERVICE_ISOLATION,
      credentials: credentials(env.C8Y_TENANT, env.C8Y_USER, env.C8Y_PASSWORD),
      bootstrap: credentials(
        env.C8Y_BOOTSTRAP_TENANT,
        env.C8Y_BOOTSTRAP_USER,
        env.C8Y_BOOTSTRAP_PASSWORD,
      ),
      bootstrapMaxAttempts: env.BOOTSTRAP_MAX_ATTEMPTS,
      bootstrapBaseDelayMs: env.BOOTSTRAP_BASE_DELAY_MS,
    },
    pulsar: {
      webSocketUrl: toWebSocketUrl(env.C8Y_BASEURL_PULSAR),
      topicTemplate: env.PULSAR_TOPIC_TEMPLATE,
      subscriptionName: env.PULSAR_SUBSCRIPTION_NAME,
      subscriptionPerTenant: env.PULSAR_SUBSCRIPTION_PER_TENANT,
      receiverQueueSize: env.PULSAR_RECEIVER_QUEUE_SIZE,
      maxRedeliverCount: env.PULSAR_MAX_REDELIVER_COUNT,
      nackRedeliveryDelayMs: env.PULSAR_NACK_REDELIVERY_DELAY_MS,
      deadLetterTopic: env.PULSAR_DEAD_LETTER_TOPIC,
      connectMaxAttempts: env.PULSAR_CONNECT_MAX_ATTEMPTS,
      reconnectMaxAttempts: env.PULSAR_RECONNECT_MAX_ATTEMPTS,
    },
    consumer: {
      maxInFlight: env.MAX_IN_FLIGHT,
      shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS,
      topicFilter: env.MQTT_TOPIC_FILTER,
    },
    mapping: {
      defaultAlarmSeverity: env.DEFAULT_ALARM_SEVERITY,
      defaultMeasurementType: env.DEFAULT_MEASUREMENT_TYPE,
      units: Object.freeze({ ...env.MEASUREMENT_UNITS }),
    },
    devices: {
      mode: env.DEVICE_IDENTITY_MODE,
      autoRegister: env.DEVICE_AUTO_REGISTER,
      externalIdType: env.DEVICE_EXTERNAL_ID_TYPE,
      namePrefix: env.DEVICE_NAME_PREFIX,
      deviceType: env.DEVICE_TYPE,
    },
  }
}
