/**
 * Routing Module
 *
 * Provider selection and request execution with fallback.
 */

// Types
export type {
  ProviderScope,
  SelectionDependencies,
  ExecutionDependencies,
} from "./types.js";

// Provider selection
export {
  buildCandidates,
  countInScope,
  createProviderScope,
  selectProvider,
} from "./provider-selection.js";
export type { ProviderSelectionError } from "./provider-selection.js";

// Error classification
export {
  classifyError,
  isRateLimitError,
  isAuthError,
  isNetworkError,
} from "./errors.js";
export type { ClassifiedError } from "./errors.js";

// Execution
export {
  executeWithFallback,
  callProvider,
  computeAttemptBudget,
} from "./executor.js";
export type { AttemptFailure } from "./executor.js";
