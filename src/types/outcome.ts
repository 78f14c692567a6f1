/**
 * Explicit success/failure values returned by the service adapters.
 * The controller inspects these before any state transition.
 */

export type Outcome<T, E extends Error = Error> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: E };

export function succeed<T>(value: T): Outcome<T, never> {
  return { success: true, value };
}

export function fail<E extends Error>(error: E): Outcome<never, E> {
  return { success: false, error };
}
