export enum GridErrorKind {
  OUT_OF_RANGE_LATITUDE = 'OUT_OF_RANGE_LATITUDE',
  OUT_OF_RANGE_LONGITUDE = 'OUT_OF_RANGE_LONGITUDE',
  UNSUPPORTED_POLAR_LATITUDE = 'UNSUPPORTED_POLAR_LATITUDE',
  INVALID_ZONE_NUMBER = 'INVALID_ZONE_NUMBER',
  INVALID_ZONE_LETTER = 'INVALID_ZONE_LETTER',
  MALFORMED_GRID_REFERENCE = 'MALFORMED_GRID_REFERENCE',
  UNRESOLVABLE_GRID_LETTER = 'UNRESOLVABLE_GRID_LETTER'
}

export class GridError extends Error {
  readonly kind: GridErrorKind;

  constructor(kind: GridErrorKind, message: string) {
    super(message);
    this.name = 'GridError';
    this.kind = kind;
  }
}

/**
 * Outcome of a conversion that may fail.
 * Discriminated union: either the converted value or the reason it could not be produced.
 */
export type Result<T> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: GridError };

export function ok<T>(data: T): Result<T> {
  return { success: true, data };
}

export function fail<T>(kind: GridErrorKind, message: string): Result<T> {
  return { success: false, error: new GridError(kind, message) };
}

export function isOk<T>(result: Result<T>): result is { readonly success: true; readonly data: T } {
  return result.success;
}

export function isErr<T>(result: Result<T>): result is { readonly success: false; readonly error: GridError } {
  return !result.success;
}

/** Returns the value, or throws the GridError for callers that prefer exceptions. */
export function unwrap<T>(result: Result<T>): T {
  if (!result.success) throw result.error;
  return result.data;
}
