/**
 * @file MappedEntity.ts
 * @description
 * Platform entities a message can become. `kind` discriminates the union;
 * the platform client switches over it exhaustively, so a new kind does not
 * compile until every consumer of the union handles it.
 */

export type AlarmSeverity = 'CRITICAL' | 'MAJOR' | 'MINOR' | 'WARNING'

export type MeasurementValue = {
  value: number
  unit?: string
}

type EntityBase = {
  /** Device the entity belongs to; never empty. */
  deviceId: string
  /** Platform type name, e.g. `c8y_TemperatureAlarm`. */
  type: string
  /** ISO-8601 instant in UTC. */
  time: string
}

export type MeasurementEntity = EntityBase & {
  kind: 'measurement'
  /** Series name → reading. */
  values: Record<string, MeasurementValue>
}

export type EventEntity = EntityBase & {
  kind: 'event'
  text: string
}

export type AlarmEntity = EntityBase & {
  kind: 'alarm'
  text: string
  severity: AlarmSeverity
}

export type MappedEntity = MeasurementEntity | EventEntity | AlarmEntity

export type EntityKind = MappedEntity['kind']

export function assertNever(value: never): never {
  throw new Error(`Unhandled entity: ${JSON.stringify(value)}`)
}
