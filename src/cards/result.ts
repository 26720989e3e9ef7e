export type StoreErrorCode = 'INVALID_PATH' | 'PROJECT_REQUIRED' | 'PROJECT_NOT_FOUND' | 'MALFORMED_CARD';

export class StoreError extends Error {
  readonly code: StoreErrorCode;

  constructor(code: StoreErrorCode, message: string) {
    super(message);
    this.name = 'StoreError';
    this.code = code;
  }
}

/**
 * Outcome of a store or search call.
 * Absence of a target card is a successful result (`null` / `false`), never an error.
 */
export type StoreResult<T> = { ok: true; value: T } | { ok: false; error: StoreError };

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function fail<T = never>(code: StoreErrorCode, message: string): StoreResult<T> {
  return { ok: false, error: new StoreError(code, message) };
}

export function isResolutionError(error: StoreError): boolean {
  return error.code === 'INVALID_PATH' || error.code === 'PROJECT_REQUIRED';
}

/** One-line message for front ends; resolution errors carry the remedy. */
export function resolutionHint(error: StoreError): string {
  if (!isResolutionError(error)) return `✗ ${error.message}`;
  return `✗ ${error.message}. Provide a project with --project <name> or prefix the path with 'project/'.`;
}
