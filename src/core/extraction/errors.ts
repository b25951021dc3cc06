/**
 * Extraction Errors
 *
 * ProviderError is raised by a single provider call and handled inside the
 * runner. ExtractionError is the runner's terminal failure and is what the
 * rest of the system sees.
 */

export type ProviderErrorKind =
  | 'TIMEOUT'
  | 'INVALID_RESPONSE'
  | 'AUTH_FAILURE'
  | 'RATE_LIMITED'
  | 'NETWORK_ERROR';

/** Kinds the runner retries before giving up on a provider. */
const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set([
  'TIMEOUT',
  'NETWORK_ERROR',
  'RATE_LIMITED'
]);

export class ProviderError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    cause?: Error
  ) {
    super(message);
    this.name = 'ProviderError';
    this.cause = cause;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

export type ExtractionFailureKind = ProviderErrorKind | 'CANCELLED';

export class ExtractionError extends Error {
  public override readonly cause?: Error;

  constructor(
    message: string,
    public readonly kind: ExtractionFailureKind,
    cause?: Error
  ) {
    super(message);
    this.name = 'ExtractionError';
    this.cause = cause;
  }
}
