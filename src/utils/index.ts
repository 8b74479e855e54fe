/**
 * Utilities Module
 */

export {
  setDebugEnabled,
  isDebugEnabled,
  getLogger,
  resolveLogger,
  createConsoleLogger,
  noopLogger,
} from "./debug.js";
export type { DebugLogger } from "./debug.js";

export { buildMessages, splitSystemMessage, flattenMessages } from "./messages.js";

export { isRecord, readPath, readString, readNumber } from "./guards.js";
export { parseRetryAfter, readHeader, retryAfterSeconds } from "./retry-after.js";
