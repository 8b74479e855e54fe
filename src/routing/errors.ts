/**
 * Error Classification
 *
 * Maps whatever an adapter threw onto the outcome the fallback loop acts
 * on. Typed router errors map directly; anything else is inspected
 * structurally (HTTP status, network error codes).
 */

import type { AttemptOutcome } from "../types/generation.js";
import {
  AuthenticationError,
  ProviderError,
  RateLimitError,
  TimeoutError,
  TransportError,
} from "../types/errors.js";
import { isRecord } from "../utils/guards.js";
import { parseRetryAfter, readHeader } from "../utils/retry-after.js";

/**
 * A failed attempt, classified
 */
export interface ClassifiedError {
  outcome: Exclude<AttemptOutcome, "success" | "cancelled">;
  message: string;
  /** Provider's Retry-After, for rate-limited outcomes */
  retryAfterMs?: number;
}

/**
 * Shape of an error with an HTTP status (e.g. an SDK API error)
 */
interface StatusErrorShape {
  status: number;
  message?: unknown;
  headers?: unknown;
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const hasStatus = (error: unknown): error is StatusErrorShape =>
  isRecord(error) && typeof error.status === "number";

/**
 * Check if an error is a rate limit (429) error
 */
export const isRateLimitError = (error: unknown): error is StatusErrorShape =>
  hasStatus(error) && error.status === 429;

/**
 * Check if an error is an authentication (401/403) error
 */
export const isAuthError = (error: unknown): error is StatusErrorShape =>
  hasStatus(error) && (error.status === 401 || error.status === 403);

/**
 * Whether a thrown value is a connection-level failure
 */
export const isNetworkError = (error: unknown): boolean => {
  if (!(error instanceof Error)) {
    return false;
  }
  if (error instanceof TypeError && error.message === "fetch failed") {
    return true;
  }
  const codes = [error, error.cause].map((e) => (isRecord(e) ? e.code : undefined));
  return codes.some((code) => typeof code === "string" && NETWORK_ERROR_CODES.has(code));
};

const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (isRecord(error) && typeof error.message === "string") return error.message;
  return String(error);
};

/**
 * Classify a thrown value into an attempt outcome
 *
 * @param error - Whatever the adapter rejected with
 * @returns The outcome and a one-line description
 */
export const classifyError = (error: unknown): ClassifiedError => {
  if (error instanceof RateLimitError) {
    return {
      outcome: "rate_limited",
      message: error.message,
      retryAfterMs:
        error.retryAfterSeconds !== undefined ? error.retryAfterSeconds * 1000 : undefined,
    };
  }
  if (error instanceof TimeoutError) {
    return { outcome: "timeout", message: error.message };
  }
  if (error instanceof AuthenticationError) {
    return { outcome: "auth_error", message: error.message };
  }
  if (error instanceof TransportError) {
    return { outcome: "network_error", message: error.message };
  }
  if (error instanceof ProviderError) {
    return { outcome: "provider_error", message: error.message };
  }

  if (isRateLimitError(error)) {
    return {
      outcome: "rate_limited",
      message: describeError(error),
      retryAfterMs: parseRetryAfter(readHeader(error.headers, "retry-after")),
    };
  }
  if (isAuthError(error)) {
    return { outcome: "auth_error", message: describeError(error) };
  }
  if (isNetworkError(error)) {
    return { outcome: "network_error", message: describeError(error) };
  }
  return { outcome: "provider_error", message: describeError(error) };
};
