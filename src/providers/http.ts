import {
  AuthenticationError,
  ProviderError,
  RateLimitError,
  TransportError,
} from "../types/errors.js";
import { readString } from "../utils/guards.js";
import { retryAfterSeconds } from "../utils/retry-after.js";

/**
 * Vendor error codes that mean "rate limited" even without a 429
 */
const RATE_LIMIT_CODES = ["RESOURCE_EXHAUSTED", "rate_limit_exceeded"];

/**
 * Whether an error body carries a vendor rate-limit code
 */
export const hasRateLimitCode = (body: string): boolean =>
  RATE_LIMIT_CODES.some((code) => body.includes(code));

/**
 * JSON POST request configuration
 */
export interface PostJsonRequest {
  /** Provider id, for error messages */
  providerId: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  signal: AbortSignal;
}

/**
 * Best-effort error message from a JSON error body
 */
const extractErrorMessage = (text: string): string | undefined => {
  try {
    const parsed: unknown = JSON.parse(text);
    return (
      readString(parsed, ["error", "message"]) ??
      readString(parsed, ["error"]) ??
      readString(parsed, ["message"])
    );
  } catch {
    return undefined;
  }
};

/**
 * POST a JSON body and return the parsed JSON response
 *
 * Status mapping:
 * - 401/403 → AuthenticationError
 * - 429 or a vendor rate-limit code → RateLimitError (with Retry-After)
 * - other non-2xx → ProviderError
 * - connection failure → TransportError
 *
 * An abort is rethrown untouched; the caller that aborted knows why.
 */
export const postJson = async (request: PostJsonRequest): Promise<unknown> => {
  const { providerId, url, headers, body, signal } = request;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Accept: "application/json",
        ...headers,
      },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    if (signal.aborted) {
      throw error;
    }
    throw new TransportError(
      providerId,
      error instanceof Error ? error.message : String(error),
      error
    );
  }

  const text = await response.text();

  if (response.status === 401 || response.status === 403) {
    throw new AuthenticationError(
      providerId,
      response.status,
      extractErrorMessage(text) ?? "Authentication failed"
    );
  }

  if (response.status === 429 || (!response.ok && hasRateLimitCode(text))) {
    throw new RateLimitError(
      providerId,
      extractErrorMessage(text) ?? "Rate limit exceeded",
      retryAfterSeconds(response.headers)
    );
  }

  if (!response.ok) {
    throw new ProviderError(
      providerId,
      response.status,
      extractErrorMessage(text) ?? `API request failed: ${response.status} ${response.statusText}`,
      text
    );
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    throw new ProviderError(providerId, response.status, "Response body is not valid JSON", text);
  }
};

/**
 * Reject a body that carries no generated text
 */
export const requireContent = (
  providerId: string,
  content: string | undefined,
  raw: unknown
): string => {
  if (content === undefined || content.trim() === "") {
    throw new ProviderError(providerId, 0, "Response contained no generated text", raw);
  }
  return content;
};
