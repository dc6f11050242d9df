/**
 * Outcome of loading or validating user input: a value, or the reason there
 * is none.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T, E>(value: T): Result<T, E> => ({ ok: true, value });

export const error = <T, E>(error: E): Result<T, E> => ({ ok: false, error });
