/**
 * Playground: Try the Router Against Real Providers
 *
 * Builds a router from config/providers.yml and whatever keys are set in
 * the environment, then runs a few requests under different strategies and
 * prints the routing decisions, stats and provider health.
 *
 * Usage:
 *   DEEPSEEK_API_KEY=xxx GROQ2_API_KEY=xxx npm run playground
 */

import { createRouterFromEnv, type Router } from "../src/router.js";
import type { GenerationResult } from "../src/types/generation.js";
import type { StrategyName } from "../src/types/strategy.js";
import { STRATEGY_NAMES } from "../src/types/strategy.js";
import { ConfigurationError } from "../src/types/errors.js";

// ─────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────

const log = (message: string) => console.log(`\n${message}`);
const divider = () => console.log("─".repeat(60));

const formatResult = (result: GenerationResult): string => {
  const route = result.attempts
    .map((a) => `${a.providerId}:${a.outcome}(${a.responseTimeMs}ms)`)
    .join(" → ");
  if (result.success) {
    return `✅ ${result.providerName} (${result.model}) in ${result.responseTimeMs}ms\n   route: ${route}\n   ${result.content.slice(0, 200)}`;
  }
  return `❌ ${result.reason}: ${result.error}\n   route: ${route || "(none)"}`;
};

// ─────────────────────────────────────────────────────────────────
// Scenarios
// ─────────────────────────────────────────────────────────────────

const tryStrategy = async (router: Router, strategy: StrategyName) => {
  log(`📌 Strategy: ${strategy}`);
  divider();
  const result = await router.generate({
    prompt: "What is 2 + 2? Answer in one word.",
    systemPrompt: "You are terse.",
    maxTokens: 20,
    strategy,
  });
  console.log(formatResult(result));
};

const tryCancellation = async (router: Router) => {
  log("📌 Cancellation after 50ms");
  divider();
  const controller = new AbortController();
  setTimeout(() => controller.abort(), 50);
  const result = await router.generate({
    prompt: "Write a long story about a lighthouse.",
    signal: controller.signal,
  });
  console.log(formatResult(result));
};

const printHealth = (router: Router) => {
  log("📊 Provider health");
  divider();
  for (const health of router.getProviderHealth()) {
    const rate = health.successRate === null ? "-" : `${Math.round(health.successRate * 100)}%`;
    const latency = health.averageResponseMs === null ? "-" : `${Math.round(health.averageResponseMs)}ms`;
    const reason = health.disabledReason ? ` (${health.disabledReason})` : "";
    console.log(
      `${health.id.padEnd(12)} ${health.status.padEnd(13)} success ${rate.padStart(4)}  avg ${latency}${reason}`
    );
  }

  const stats = router.getStats();
  log(
    `Requests: ${stats.totalRequests}, attempts: ${stats.totalAttempts}, fallbacks: ${stats.totalFallbacks}`
  );
};

// ─────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────

const main = async () => {
  let router: Router;
  try {
    router = createRouterFromEnv({ debug: process.env.DEBUG === "1" });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error("Set at least one *_API_KEY variable listed in config/providers.yml");
      process.exit(1);
    }
    throw error;
  }

  console.log(`Providers: ${router.listProviders().filter((p) => p.enabled).length} enabled`);

  for (const strategy of STRATEGY_NAMES) {
    await tryStrategy(router, strategy);
  }
  await tryCancellation(router);
  printHealth(router);
};

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
