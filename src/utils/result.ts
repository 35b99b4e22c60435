/**
 * Result values for I/O that is expected to fail sometimes (HTTP fetches,
 * downloads, file writes). Callers decide whether to degrade or propagate.
 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
