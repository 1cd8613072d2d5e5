/**
 * Outcome of an operation whose failures are part of its contract.
 *
 * Used on the per-message path, where a failed message is an expected case and
 * the caller has to branch on it rather than catch it.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}
