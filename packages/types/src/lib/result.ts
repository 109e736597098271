/**
 * @fileoverview Result type - success or failure with typed errors
 *
 * Commands that can reject user input (such as editing an order row) return
 * a Result instead of throwing, so the caller keeps the prior value on `Err`.
 *
 * @module @medstock/types/result
 */

// =============================================================================
// RESULT TYPE - Success or Failure with Typed Errors
// =============================================================================

/**
 * Represents a successful result containing a value
 */
export interface Ok<T> {
  readonly _tag: 'Ok';
  readonly value: T;
}

/**
 * Represents a failed result containing an error
 */
export interface Err<E> {
  readonly _tag: 'Err';
  readonly error: E;
}

/**
 * Result type - represents either success (Ok) or failure (Err)
 *
 * @example
 * function parseCount(text: string): Result<number, string> {
 *   return /^\d+$/.test(text) ? Ok(Number(text)) : Err('not a count');
 * }
 */
export type Result<T, E> = Ok<T> | Err<E>;

/**
 * Creates a successful Result
 */
export function Ok<T>(value: T): Ok<T> {
  return { _tag: 'Ok', value };
}

/**
 * Creates a failed Result
 */
export function Err<E>(error: E): Err<E> {
  return { _tag: 'Err', error };
}

// =============================================================================
// RESULT TYPE GUARDS
// =============================================================================

/**
 * Type guard for Ok variant
 */
export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result._tag === 'Ok';
}

/**
 * Type guard for Err variant
 */
export function isErr<T, E>(result: Result<T, E>): result is Err<E> {
  return result._tag === 'Err';
}
