/**
 * Base error class for router errors
 */
export class RouterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RouterError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Error thrown when a provider rejects the credential (401/403)
 */
export class AuthenticationError extends RouterError {
  /** Provider that rejected the credential */
  readonly provider: string;
  /** HTTP status code */
  readonly statusCode: number;

  constructor(provider: string, statusCode: number, message = "Authentication failed") {
    super(`${message} (${provider}, HTTP ${statusCode})`);
    this.name = "AuthenticationError";
    this.provider = provider;
    this.statusCode = statusCode;
  }
}

/**
 * Error thrown when a provider returns a rate limit error (429)
 */
export class RateLimitError extends RouterError {
  /** Provider that returned the rate limit */
  readonly provider: string;
  /** Time when the rate limit resets (from Retry-After header) */
  readonly resetAt?: Date;
  /** Retry-After header value in seconds */
  readonly retryAfterSeconds?: number;

  constructor(provider: string, message = "Rate limit exceeded", retryAfterSeconds?: number) {
    const retryMsg =
      retryAfterSeconds !== undefined ? ` Retry after ${retryAfterSeconds}s.` : "";
    super(`Rate limited by ${provider}: ${message}.${retryMsg}`);
    this.name = "RateLimitError";
    this.provider = provider;
    this.retryAfterSeconds = retryAfterSeconds;
    this.resetAt =
      retryAfterSeconds !== undefined
        ? new Date(Date.now() + retryAfterSeconds * 1000)
        : undefined;
  }
}

/**
 * Error thrown when a request times out
 */
export class TimeoutError extends RouterError {
  /** Provider that timed out */
  readonly provider: string;
  /** Timeout duration in milliseconds */
  readonly timeoutMs: number;

  constructor(provider: string, timeoutMs: number) {
    super(`Request to ${provider} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.provider = provider;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Error thrown when the connection to a provider fails
 */
export class TransportError extends RouterError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super(`Network error calling ${provider}: ${message}`, { cause });
    this.name = "TransportError";
    this.provider = provider;
  }
}

/**
 * Error thrown when a provider returns an API error or an unusable body
 */
export class ProviderError extends RouterError {
  /** Provider that returned the error */
  readonly provider: string;
  /** HTTP status code (0 when the body, not the status, was the problem) */
  readonly statusCode: number;
  /** Raw error response from provider */
  readonly rawError?: unknown;

  constructor(provider: string, statusCode: number, message: string, rawError?: unknown) {
    super(`Provider ${provider} error (${statusCode}): ${message}`);
    this.name = "ProviderError";
    this.provider = provider;
    this.statusCode = statusCode;
    this.rawError = rawError;
  }
}

/**
 * Summary of one failed attempt, as carried by AllProvidersExhaustedError
 */
export interface ExhaustedAttempt {
  providerId: string;
  outcome: string;
  error?: string;
}

/**
 * Every eligible provider was tried within the attempt budget and failed.
 *
 * The router never throws this from generate(); its message becomes the
 * `error` of the failed GenerationResult.
 */
export class AllProvidersExhaustedError extends RouterError {
  /** Attempts in call order */
  readonly attempts: readonly ExhaustedAttempt[];
  /** Providers that were attempted */
  readonly attemptedProviders: string[];

  constructor(attempts: readonly ExhaustedAttempt[]) {
    const details = attempts
      .map((a) => `${a.providerId}: ${a.outcome}${a.error ? ` (${a.error})` : ""}`)
      .join("; ");
    super(
      `All providers failed after ${attempts.length} attempt(s). ${details}`
    );
    this.name = "AllProvidersExhaustedError";
    this.attempts = attempts;
    this.attemptedProviders = attempts.map((a) => a.providerId);
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends RouterError {
  constructor(message: string) {
    super(`Configuration error: ${message}`);
    this.name = "ConfigurationError";
  }
}

/**
 * Error thrown when the provider registry file is malformed
 */
export class ConfigValidationError extends ConfigurationError {
  /** File the problem was found in */
  readonly filePath?: string;

  constructor(message: string, filePath?: string) {
    super(filePath ? `${message} (in ${filePath})` : message);
    this.name = "ConfigValidationError";
    this.filePath = filePath;
  }
}
