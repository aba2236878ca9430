/**
 * Base error type for failures coming from a single geolocation provider.
 *
 * The resolver treats it as recoverable: it records the message and moves on
 * to the next provider. Messages are prefixed with the provider name.
 */
export class RecoverableProviderError extends Error {
  readonly provider: string;

  constructor(provider: string, reason: string, options?: { cause?: unknown }) {
    super(`${provider}: ${reason}`, options);
    this.name = 'RecoverableProviderError';
    this.provider = provider;
  }
}

/**
 * Thrown when a provider request exceeds the configured timeout.
 */
export class ProviderTimeoutError extends RecoverableProviderError {
  constructor(provider: string, timeoutMs: number) {
    super(provider, `request timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}
