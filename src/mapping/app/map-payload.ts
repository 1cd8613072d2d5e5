import { MappingError } from '../../common/domain/errors/mapping-error.js'
import { fail, ok, type Result } from '../../common/domain/result.js'
import {
  isRecord,
  RESERVED_KEYS,
  type DecodedPayload,
} from '../domain/models/DecodedPayload.js'
import type {
  AlarmEntity,
  AlarmSeverity,
  EventEntity,
  MappedEntity,
  MeasurementEntity,
  MeasurementValue,
} from '../domain/models/MappedEntity.js'

/**
 * @file map-payload.ts
 * @description
 * Pure mapping of a decoded payload to a platform entity.
 *
 * Recognised shape: `{ device_id?, timestamp?, type?, data? | <flat fields> }`.
 * - `type` of `measurement`, `event` or `alarm` selects the structured form,
 *   whose fields live in `data`
 * - any other payload is a flat measurement: top-level numbers are the values
 *
 * Fields the mapper does not know are ignored, so producers can add fields
 * without breaking the bridge. Failures are returned, never thrown.
 */

export type MappingOptions = {
  defaultAlarmSeverity: AlarmSeverity
  defaultMeasurementType: string
  /** Unit of each series given as a bare number, by series name. */
  units: Readonly<Record<string, string>>
}

export type MappingContext = {
  /** Device id to use when the payload carries none (the MQTT client id). */
  fallbackDeviceId?: string
  /** Entity time when the payload has no `timestamp`. */
  receivedAt: Date
}

const SEVERITIES: readonly AlarmSeverity[] = ['CRITICAL', 'MAJOR', 'MINOR', 'WARNING']

const ISO_8601 =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(Z|z|[+-]\d{2}(?::?\d{2})?)?)?$/

export function mapPayload(
  payload: DecodedPayload,
  context: MappingContext,
  options: MappingOptions,
): Result<MappedEntity, MappingError> {
  const deviceId = resolveDeviceId(payload, context)
  if (!deviceId) {
    return fail(
      new MappingError('MissingDeviceId', 'Payload has no device_id and the message no client id', 'device_id'),
    )
  }

  let time: string
  if (payload.timestamp === undefined || payload.timestamp === null) {
    time = context.receivedAt.toISOString()
  } else {
    const parsed = parseTimestamp(payload.timestamp)
    if (parsed === null) {
      return fail(
        new MappingError(
          'InvalidTimestamp',
          `Timestamp ${JSON.stringify(payload.timestamp)} is not an ISO-8601 date-time`,
          'timestamp',
        ),
      )
    }
    time = parsed
  }

  switch (payload.type) {
    case 'event':
      return mapEvent(payload, deviceId, time)
    case 'alarm':
      return mapAlarm(payload, deviceId, time, options)
    case 'measurement':
      return mapStructuredMeasurement(payload, deviceId, time, options)
    default:
      return mapFlatMeasurement(payload, deviceId, time, options)
  }
}

function resolveDeviceId(payload: DecodedPayload, context: MappingContext): string | null {
  const raw = payload.device_id
  if (typeof raw === 'string' && raw.trim() !== '') return raw.trim()
  if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw)

  const fallback = context.fallbackDeviceId?.trim()
  return fallback ? fallback : null
}

/**
 * ISO-8601 date or date-time → UTC instant (`toISOString()` form).
 * A date-time without offset is read as UTC. Fractions beyond milliseconds
 * are truncated.
 *
 * @returns `null` when the value is not a valid ISO-8601 string.
 */
export function parseTimestamp(value: unknown): string | null {
  if (typeof value !== 'string') return null

  const match = ISO_8601.exec(value.trim())
  if (!match) return null

  const [, year, month, day, hour, minute, second, fraction, offset] = match

  const y = Number(year)
  const m = Number(month)
  const d = Number(day)
  // Date.UTC would read years 0-99 as 1900-1999
  const date = new Date(0)
  date.setUTCFullYear(y, m - 1, d)
  if (m < 1 || m > 12 || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
    return null
  }

  if (hour === undefined) return date.toISOString()

  if (Number(hour) > 23 || Number(minute) > 59 || Number(second ?? '0') > 59) return null

  const millis = (fraction ?? '').padEnd(3, '0').slice(0, 3)
  const normalized =
    `${year}-${month}-${day}T${hour}:${minute}:${second ?? '00'}.${millis}` + normalizeOffset(offset)

  const ms = Date.parse(normalized)
  return Number.isNaN(ms) ? null : new Date(ms).toISOString()
}

function normalizeOffset(offset: string | undefined): string {
  if (offset === undefined || offset === 'Z' || offset === 'z') return 'Z'

  const digits = offset.slice(1).replace(':', '')
  const hours = digits.slice(0, 2)
  const minutes = digits.slice(2, 4) || '00'
  return `${offset[0]}${hours}:${minutes}`
}

function readValue(raw: unknown, tableUnit: string | undefined): MeasurementValue | undefined {
  if (typeof raw === 'number' && Number.isFinite(raw)) {
    return tableUnit === undefined ? { value: raw } : { value: raw, unit: tableUnit }
  }

  if (isRecord(raw) && typeof raw.value === 'number' && Number.isFinite(raw.value)) {
    const unit = typeof raw.unit === 'string' ? raw.unit : tableUnit
    return unit === undefined ? { value: raw.value } : { value: raw.value, unit }
  }

  return undefined
}

function collectValues(
  fields: Readonly<Record<string, unknown>>,
  skip: ReadonlySet<string>,
  units: Readonly<Record<string, string>>,
): Record<string, MeasurementValue> {
  const values: Record<string, MeasurementValue> = {}

  for (const [name, raw] of Object.entries(fields)) {
    if (skip.has(name)) continue
    const unit = Object.prototype.hasOwnProperty.call(units, name) ? units[name] : undefined
    const value = readValue(raw, unit)
    if (value) values[name] = value
  }

  return values
}

function measurement(
  deviceId: string,
  time: string,
  type: string,
  values: Record<string, MeasurementValue>,
): Result<MappedEntity, MappingError> {
  if (Object.keys(values).length === 0) {
    return fail(new MappingError('NoMeasurementValues', 'Measurement payload carries no numeric value'))
  }
  const entity: MeasurementEntity = { kind: 'measurement', deviceId, type, time, values }
  return ok(entity)
}

function mapFlatMeasurement(
  payload: DecodedPayload,
  deviceId: string,
  time: string,
  options: MappingOptions,
): Result<MappedEntity, MappingError> {
  const values = collectValues(payload, RESERVED_KEYS, options.units)
  return measurement(deviceId, time, options.defaultMeasurementType, values)
}

function mapStructuredMeasurement(
  payload: DecodedPayload,
  deviceId: string,
  time: string,
  options: MappingOptions,
): Result<MappedEntity, MappingError> {
  if (!isRecord(payload.data)) {
    return mapFlatMeasurement(payload, deviceId, time, options)
  }

  const data = payload.data
  const type = nonEmptyString(data.type) ?? options.defaultMeasurementType
  const values = collectValues(data, new Set(['type']), options.units)
  return measurement(deviceId, time, type, values)
}

function mapEvent(
  payload: DecodedPayload,
  deviceId: string,
  time: string,
): Result<MappedEntity, MappingError> {
  const data: Record<string, unknown> = isRecord(payload.data) ? payload.data : {}

  const type = nonEmptyString(data.type)
  if (!type) {
    return fail(new MappingError('MissingField', 'Event payload has no data.type', 'data.type'))
  }

  const entity: EventEntity = {
    kind: 'event',
    deviceId,
    type,
    time,
    text: nonEmptyString(data.text) ?? type,
  }
  return ok(entity)
}

function mapAlarm(
  payload: DecodedPayload,
  deviceId: string,
  time: string,
  options: MappingOptions,
): Result<MappedEntity, MappingError> {
  const data: Record<string, unknown> = isRecord(payload.data) ? payload.data : {}

  const type = nonEmptyString(data.type)
  if (!type) {
    return fail(new MappingError('MissingField', 'Alarm payload has no data.type', 'data.type'))
  }

  let severity = options.defaultAlarmSeverity
  if (data.severity !== undefined && data.severity !== null) {
    const requested = typeof data.severity === 'string' ? data.severity.trim().toUpperCase() : ''
    const known = SEVERITIES.find((s) => s === requested)
    if (!known) {
      return fail(
        new MappingError(
          'InvalidField',
          `Alarm severity ${JSON.stringify(data.severity)} is not one of ${SEVERITIES.join(', ')}`,
          'data.severity',
        ),
      )
    }
    severity = known
  }

  const entity: AlarmEntity = {
    kind: 'alarm',
    deviceId,
    type,
    time,
    text: nonEmptyString(data.text) ?? type,
    severity,
  }
  return ok(entity)
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}
