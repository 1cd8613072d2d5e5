import { container, instanceCachingFactory, type DependencyContainer } from 'tsyringe'
import type { AxiosInstance } from 'axios'
import type { Logger } from 'pino'
import type { BridgeConfig } from '../../../config/bridge.js'
import { StartupError } from '../../domain/errors/startup-error.js'
import { MessageConsumer } from '../../../messaging/app/message-consumer.js'
import type { ConsumerFactory } from '../../../messaging/app/pipeline-coordinator.js'
import type { BrokerClient } from '../../../messaging/domain/broker.js'
import { PulsarWebSocketBroker } from '../../../messaging/infrastructure/pulsar/pulsar-websocket.broker.js'
import { DirectDeviceDirectory, type DeviceDirectory } from '../../../platform/domain/device-directory.js'
import type { PlatformClient } from '../../../platform/domain/platform-client.js'
import { HttpPlatformClient } from '../../../platform/infrastructure/http/http-platform.client.js'
import { IdentityDeviceDirectory } from '../../../platform/infrastructure/http/identity-device.directory.js'
import { createPlatformHttp } from '../../../platform/infrastructure/http/platform-http.js'
import { ResolveTenantsUseCase } from '../../../tenants/app/usecases/resolve-tenants.usecase.js'
import type { CredentialResolver } from '../../../tenants/domain/providers/credential-resolver.js'
import type { TopicSettings } from '../../../tenants/domain/models/TenantContext.js'
import { BootstrapCredentialResolver } from '../../../tenants/infrastructure/providers/bootstrap-credential-resolver.js'
import { StaticCredentialResolver } from '../../../tenants/infrastructure/providers/static-credential-resolver.js'

/**
 * @file index.ts
 * @description
 * Dependency registrations (tsyringe), one child container per process.
 *
 * | Token                     | Implementation                                        | Lifetime |
 * |---------------------------|-------------------------------------------------------|----------|
 * | `'BridgeConfig'`          | validated configuration                               | instance |
 * | `'Logger'`                | root pino logger                                      | instance |
 * | `'PlatformHttp'`          | axios instance on `C8Y_BASEURL`                       | cached   |
 * | `'CredentialResolver'`    | static (PER_TENANT) or bootstrap (MULTI_TENANT)       | cached   |
 * | `'ResolveTenantsUseCase'` | `ResolveTenantsUseCase`                               | factory  |
 * | `'PlatformClient'`        | `HttpPlatformClient`                                  | cached   |
 * | `'DeviceDirectory'`       | identity lookup, or direct ids                        | cached   |
 * | `'BrokerClient'`          | `PulsarWebSocketBroker`                               | cached   |
 * | `'ConsumerFactory'`       | builds one `MessageConsumer` per tenant               | cached   |
 *
 * Registrations are factories, so nothing here needs decorator metadata.
 */

export function registerDependencies(
  config: BridgeConfig,
  log: Logger,
  parent: DependencyContainer = container,
): DependencyContainer {
  const c = parent.createChildContainer()

  c.registerInstance('BridgeConfig', config)
  c.registerInstance('Logger', log)

  c.register('PlatformHttp', {
    useFactory: instanceCachingFactory<AxiosInstance>(() =>
      createPlatformHttp({
        baseUrl: config.platform.baseUrl,
        timeoutMs: config.platform.requestTimeoutMs,
      }),
    ),
  })

  c.register('CredentialResolver', {
    useFactory: instanceCachingFactory<CredentialResolver>((dc) => {
      const topics: TopicSettings = {
        topicTemplate: config.pulsar.topicTemplate,
        subscriptionName: config.pulsar.subscriptionName,
        subscriptionPerTenant: config.pulsar.subscriptionPerTenant,
      }

      if (config.tenants.isolation === 'PER_TENANT') {
        return new StaticCredentialResolver(config.tenants.credentials, topics)
      }

      const bootstrap = config.tenants.bootstrap
      if (!bootstrap) {
        throw new StartupError('No bootstrap credentials configured for MULTI_TENANT isolation')
      }

      return new BootstrapCredentialResolver(
        dc.resolve<AxiosInstance>('PlatformHttp'),
        {
          bootstrap,
          topics,
          maxAttempts: config.tenants.bootstrapMaxAttempts,
          baseDelayMs: config.tenants.bootstrapBaseDelayMs,
        },
        log.child({ component: 'tenant-bootstrap' }),
      )
    }),
  })

  c.register('ResolveTenantsUseCase', {
    useFactory: (dc) =>
      new ResolveTenantsUseCase(
        dc.resolve<CredentialResolver>('CredentialResolver'),
        log.child({ component: 'tenants' }),
      ),
  })

  c.register('PlatformClient', {
    useFactory: instanceCachingFactory<PlatformClient>(
      (dc) =>
        new HttpPlatformClient(dc.resolve<AxiosInstance>('PlatformHttp'), log.child({ component: 'platform-client' })),
    ),
  })

  c.register('DeviceDirectory', {
    useFactory: instanceCachingFactory<DeviceDirectory>((dc) => {
      if (config.devices.mode === 'direct') return new DirectDeviceDirectory()

      return new IdentityDeviceDirectory(
        dc.resolve<AxiosInstance>('PlatformHttp'),
        {
          autoRegister: config.devices.autoRegister,
          externalIdType: config.devices.externalIdType,
          namePrefix: config.devices.namePrefix,
          deviceType: config.devices.deviceType,
        },
        log.child({ component: 'device-directory' }),
      )
    }),
  })

  c.register('BrokerClient', {
    useFactory: instanceCachingFactory<BrokerClient>(
      () =>
        new PulsarWebSocketBroker(
          {
            webSocketUrl: config.pulsar.webSocketUrl,
            receiverQueueSize: config.pulsar.receiverQueueSize,
            maxRedeliverCount: config.pulsar.maxRedeliverCount,
            nackRedeliveryDelayMs: config.pulsar.nackRedeliveryDelayMs,
            deadLetterTopic: config.pulsar.deadLetterTopic,
            reconnectMaxAttempts: config.pulsar.reconnectMaxAttempts,
          },
          log.child({ component: 'pulsar' }),
        ),
    ),
  })

  c.register('ConsumerFactory', {
    useFactory: instanceCachingFactory<ConsumerFactory>((dc) => {
      const broker = dc.resolve<BrokerClient>('BrokerClient')
      const platform = dc.resolve<PlatformClient>('PlatformClient')
      const devices = dc.resolve<DeviceDirectory>('DeviceDirectory')
      const consumerLog = log.child({ component: 'consumer' })

      return (tenant) =>
        new MessageConsumer(tenant, {
          broker,
          platform,
          devices,
          mapping: config.mapping,
          options: {
            maxInFlight: config.consumer.maxInFlight,
            maxRedeliverCount: config.pulsar.maxRedeliverCount,
            deadLetterTopic: config.pulsar.deadLetterTopic,
            topicFilter: config.consumer.topicFilter,
          },
          log: consumerLog,
        })
    }),
  })

  return c
}
