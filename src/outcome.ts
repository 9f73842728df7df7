/**
 * Result of a boundary call that never throws.
 *
 * `ok` carries real data. `fallback` carries the degraded stand-in value
 * (empty page, absent movie, placeholder summary) plus why it was used, so
 * callers can tell "nothing there" apart from "could not ask".
 */
export type Outcome<T> =
  | { status: "ok"; value: T }
  | { status: "fallback"; value: T; reason: string };

export function ok<T>(value: T): Outcome<T> {
  return { status: "ok", value };
}

export function fallback<T>(value: T, reason: string): Outcome<T> {
  return { status: "fallback", value, reason };
}
