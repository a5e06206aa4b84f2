/**
 * @fileoverview Result type for explicit error handling
 *
 * Used where a failure is an expected outcome that the caller recovers from
 * (a singular regression design, an unreadable config file) rather than a
 * fault to propagate.
 */

import * as fs from 'node:fs/promises';

// ============================================================================
// CORE RESULT TYPE
// ============================================================================

export type OkResult<T> = { readonly ok: true; readonly value: T };
export type ErrResult<E> = { readonly ok: false; readonly error: E };
export type Result<T, E = Error> = OkResult<T> | ErrResult<E>;

export const Ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// ============================================================================
// RESULT HELPERS
// ============================================================================

/**
 * Wrap an async function in a Result
 */
export async function safeAsync<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return Ok(await fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

/**
 * Wrap a sync function in a Result
 */
export function safeSync<T>(fn: () => T): Result<T, Error> {
  try {
    return Ok(fn());
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

// ============================================================================
// SAFE FILE OPERATIONS
// ============================================================================

export async function safeReadFile(path: string): Promise<Result<string, Error>> {
  return safeAsync(() => fs.readFile(path, 'utf-8'));
}
