/** Bytes kept from a payload when it is written to a log line. */
export const PREVIEW_BYTES = 200

/**
 * Log-friendly excerpt of a message body.
 *
 * `text` is the lossy UTF-8 reading, `hex` the exact bytes; both cover at most
 * `limit` bytes.
 */
export function previewPayload(
  data: Buffer,
  limit = PREVIEW_BYTES,
): { length: number; truncated: boolean; text: string; hex: string } {
  const head = data.subarray(0, limit)

  return {
    length: data.length,
    truncated: data.length > limit,
    text: head.toString('utf-8'),
    hex: head.toString('hex'),
  }
}
