/**
 * Error taxonomy of the noise data client.
 *
 * Every layer lets these propagate to its caller; none of them is retried.
 */

/**
 * Base class for all errors raised by the client
 */
export class NoiseDataError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NoiseDataError';
  }
}

/**
 * Malformed request parameters, model fields or configuration.
 * Raised before any network call is made.
 */
export class ValidationError extends NoiseDataError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ValidationError';
  }
}

/**
 * Response body does not match the model expected for the request that produced it
 */
export class SchemaMismatchError extends NoiseDataError {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: ErrorOptions,
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'SchemaMismatchError';
  }
}

/**
 * Non-2xx response, network failure or timeout
 */
export class TransportError extends NoiseDataError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly url?: string,
    public readonly responseData?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TransportError';
  }
}
