import type { NoteTreeError } from '../errors.js';

/**
 * Explicit outcome of a tree operation. Domain failures are values, not exceptions.
 */
export type Result<T, E extends NoteTreeError = NoteTreeError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends NoteTreeError>(error: E): Result<never, E> {
  return { ok: false, error };
}
