/**
 * Core Errors
 *
 * Errors the HTTP layer maps to client-visible responses.
 */

/**
 * A requested entry or entity does not exist.
 */
export class NotFoundError extends Error {
  constructor(
    public readonly resource: 'entry' | 'entity',
    public readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

export type ValidationErrorKind = 'MALFORMED_INPUT';

/**
 * Client input that fails validation.
 */
export class ValidationError extends Error {
  readonly kind: ValidationErrorKind = 'MALFORMED_INPUT';

  constructor(
    message: string,
    public readonly details: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}
