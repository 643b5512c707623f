/**
 * Conversion outcomes and per-argument resolutions.
 */

export type ConversionResult<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

/** Outcome of one declared argument for one parse pass. */
export type Resolution<T, E> =
  | { readonly state: "absent" }
  | { readonly state: "value"; readonly value: T }
  | { readonly state: "error"; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}
