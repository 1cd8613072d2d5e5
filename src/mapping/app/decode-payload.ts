import { DecodeError } from '../../common/domain/errors/decode-error.js'
import { fail, ok, type Result } from '../../common/domain/result.js'
import { isRecord, type DecodedPayload } from '../domain/models/DecodedPayload.js'

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Message body → JSON object.
 *
 * Invalid UTF-8 is refused instead of being replaced with U+FFFD, and a JSON
 * value other than an object (array, string, number, null) is a decode failure.
 */
export function decodePayload(data: Uint8Array): Result<DecodedPayload, DecodeError> {
  let text: string
  try {
    text = utf8.decode(data)
  } catch (err) {
    return fail(new DecodeError('Message body is not valid UTF-8', 'INVALID_UTF8', err))
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    return fail(new DecodeError('Message body is not valid JSON', 'INVALID_JSON', err))
  }

  if (!isRecord(parsed)) {
    const found = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed
    return fail(new DecodeError(`Message body is a JSON ${found}, expected an object`, 'NOT_AN_OBJECT'))
  }

  return ok(parsed)
}
