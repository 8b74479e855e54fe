/**
 * Retry-After handling shared by adapters and error classification.
 */

import { isRecord } from "./guards.js";

/**
 * Parse a Retry-After header value into milliseconds
 *
 * Accepts delta-seconds or an HTTP date.
 */
export const parseRetryAfter = (
  value: string | null | undefined,
  now: number = Date.now()
): number | undefined => {
  if (!value) return undefined;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Math.round(Number(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
};

/**
 * Read a header from either a Headers instance or a plain record
 */
export const readHeader = (headers: unknown, name: string): string | undefined => {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (!isRecord(headers)) {
    return undefined;
  }
  const wanted = name.toLowerCase();
  const entry = Object.entries(headers).find(([key]) => key.toLowerCase() === wanted);
  const value = entry ? entry[1] : undefined;
  return typeof value === "string" ? value : undefined;
};

/**
 * Retry-After of a response in whole seconds, rounded up
 */
export const retryAfterSeconds = (
  headers: unknown,
  now: number = Date.now()
): number | undefined => {
  const ms = parseRetryAfter(readHeader(headers, "retry-after"), now);
  return ms === undefined ? undefined : Math.ceil(ms / 1000);
};
