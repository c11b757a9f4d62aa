/**
 * Success-or-failure return type used by every keyseal operation.
 */

import type { KeysealError } from './errors.js'

export interface Ok<T> {
  ok: true
  value: T
}

export interface Err<E> {
  ok: false
  error: E
}

export type Result<T, E extends KeysealError = KeysealError> = Ok<T> | Err<E>

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value }
}

export function err<E extends KeysealError>(error: E): Err<E> {
  return { ok: false, error }
}
