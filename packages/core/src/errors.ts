/**
 * Thrown when caller-supplied coordinates are out of range.
 *
 * Raised before any network call, so the caller can correct the input and retry.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Thrown when every IP geolocation provider failed.
 *
 * `failures` holds one `"<provider>: <reason>"` entry per provider, in the
 * order they were tried.
 */
export class LocationUnavailableError extends Error {
  readonly failures: readonly string[];

  constructor(failures: readonly string[]) {
    super(
      'Could not determine location from IP. ' +
        (failures.length > 0 ? failures.join('; ') : 'No providers available.'),
    );
    this.name = 'LocationUnavailableError';
    this.failures = failures;
  }
}

/**
 * Thrown when a NOAA dataset could not be fetched or decoded.
 */
export class NetworkError extends Error {
  readonly dataset: string;

  constructor(dataset: string, cause: unknown) {
    super(`Could not fetch ${dataset}: ${describeError(cause)}`, { cause });
    this.name = 'NetworkError';
    this.dataset = dataset;
  }
}

/**
 * Best-effort one-line description of a thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
