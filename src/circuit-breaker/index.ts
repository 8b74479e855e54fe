export { createCircuitBreaker } from "./breaker.js";
export type { CircuitBreaker } from "./breaker.js";
