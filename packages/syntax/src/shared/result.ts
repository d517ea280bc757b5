import type { ParseError } from "../model/errors.js";

/** Outcome of an assembly step: a complete value or the first failure. */
export type Result<T, E = ParseError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Apply `fn` to each item in order, stopping at the first failure. */
export function collectResults<T, U, E>(
  items: readonly T[],
  fn: (item: T) => Result<U, E>,
): Result<U[], E> {
  const values: U[] = [];
  for (const item of items) {
    const result = fn(item);
    if (!result.ok) return result;
    values.push(result.value);
  }
  return ok(values);
}
