/**
 * Result values for fallible operations
 *
 * Operations that can fail for a reason in the error taxonomy return a
 * Result instead of throwing, so callers decide whether to recover or
 * propagate.
 */

import type { MimeError } from './errors.js';

/**
 * Successful outcome
 */
export interface Ok<T> {
  ok: true;
  value: T;
}

/**
 * Failed outcome
 */
export interface Err<E extends MimeError> {
  ok: false;
  error: E;
}

export type Result<T, E extends MimeError = MimeError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E extends MimeError>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Returns the value of a successful result, or throws its error
 */
export function unwrap<T, E extends MimeError>(result: Result<T, E>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Returns the value of a successful result, or the fallback
 */
export function unwrapOr<T, E extends MimeError>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}
