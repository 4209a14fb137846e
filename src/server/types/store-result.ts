/**
 * store-result.ts — Outcome of a store operation.
 *
 * Keeps "no such row" apart from "the database failed", which a bare
 * null/[] return cannot. `orElse` collapses both back to a fallback for
 * callers that only want the value.
 */

export type StoreResult<T> =
  | { status: "ok"; value: T }
  | { status: "empty" }
  | { status: "failed"; error: Error };

export function ok<T>(value: T): StoreResult<T> {
  return { status: "ok", value };
}

export function empty<T>(): StoreResult<T> {
  return { status: "empty" };
}

export function failed<T>(err: unknown): StoreResult<T> {
  return { status: "failed", error: err instanceof Error ? err : new Error(String(err)) };
}

/** The value on success, `fallback` when empty or failed. */
export function orElse<T, F>(result: StoreResult<T>, fallback: F): T | F {
  return result.status === "ok" ? result.value : fallback;
}

/** Transform the value of an ok result; empty and failed pass through. */
export function mapResult<T, U>(result: StoreResult<T>, fn: (value: T) => U): StoreResult<U> {
  return result.status === "ok" ? ok(fn(result.value)) : result;
}
