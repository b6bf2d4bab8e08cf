/**
 * Result values and the error taxonomy of the diff engine
 */

export type Result<T, E = DiffError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

export type DiffErrorCode = 'MALFORMED_HUNK' | 'HUNK_NOT_FOUND' | 'TARGET_IO';

export class DiffError extends Error {
  readonly code: DiffErrorCode;

  constructor(code: DiffErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.code = code;
    this.name = this.constructor.name;
  }
}

/**
 * A header matches no grammar, or its counts cannot be reconciled with the
 * body. Also used for hunks that match a grammar only partially.
 */
export class MalformedHunkError extends DiffError {
  constructor(message: string, public readonly position?: number) {
    super('MALFORMED_HUNK', message);
  }
}

export class NotFoundError extends DiffError {
  constructor(message = 'Hunk text not found', public readonly path?: string) {
    super('HUNK_NOT_FOUND', message);
  }
}

export class TargetIOError extends DiffError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super('TARGET_IO', message, cause);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
