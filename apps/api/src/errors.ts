export type SearchErrorKind = 'configuration' | 'request' | 'parsing' | 'unexpected';

export abstract class SearchError extends Error {
  abstract readonly kind: SearchErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid caller input, detected before any request is made. */
export class ConfigurationError extends SearchError {
  readonly kind = 'configuration' as const;
}

/** A page could not be fetched, or the marketplace answered with a non-success status. */
export class RequestError extends SearchError {
  readonly kind = 'request' as const;
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, options);
    this.statusCode = options?.statusCode;
  }
}

/** The response body was not JSON, or its envelope had an unexpected shape. */
export class ParsingError extends SearchError {
  readonly kind = 'parsing' as const;
}

export class UnexpectedSearchError extends SearchError {
  readonly kind = 'unexpected' as const;
}

export type Result<T, E = SearchError> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
