/**
 * JSON object parsed from a message body. Lives only while the message is
 * mapped.
 */
export type DecodedPayload = Readonly<Record<string, unknown>>

/** Keys the mapper interprets; they never become measurement values. */
export const RESERVED_KEYS: ReadonlySet<string> = new Set(['device_id', 'timestamp', 'type', 'data'])

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
