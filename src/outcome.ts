/** Tagged result for operations that fail per item without aborting the caller. */
export type Outcome<T, E = string> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Outcome<never, E> {
  return { ok: false, error };
}
