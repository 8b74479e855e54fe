export { createStatsCollector } from "./collector.js";
export type { StatsCollector, StatsCollectorConfig, RequestOutcome } from "./collector.js";
