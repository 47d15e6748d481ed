import type { VideoAdapter } from "@clipmesh/ai-providers";
import type { ModelMetrics } from "./metrics.js";

export const LOAD_BALANCING_STRATEGIES = [
  "round-robin",
  "random",
  "least-loaded",
  "fastest-response",
  "cost-optimized",
] as const;

export type LoadBalancingStrategy = (typeof LOAD_BALANCING_STRATEGIES)[number];

export function isLoadBalancingStrategy(value: unknown): value is LoadBalancingStrategy {
  return typeof value === "string" && (LOAD_BALANCING_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Picks one adapter among the candidates that accept a request.
 *
 * The round-robin index lives on the instance and persists across calls.
 */
export class LoadBalancer {
  strategy: LoadBalancingStrategy;
  private roundRobinIndex = 0;
  private readonly random: () => number;

  constructor(strategy: LoadBalancingStrategy = "least-loaded", random: () => number = Math.random) {
    this.strategy = strategy;
    this.random = random;
  }

  select(candidates: readonly VideoAdapter[], metrics: ReadonlyMap<string, ModelMetrics>): VideoAdapter | undefined {
    if (candidates.length <= 1) return candidates[0];

    switch (this.strategy) {
      case "round-robin": {
        const chosen = candidates[this.roundRobinIndex % candidates.length];
        this.roundRobinIndex++;
        return chosen;
      }
      case "least-loaded":
        return leastLoaded(candidates, metrics);
      case "fastest-response":
        return fastest(candidates, metrics) ?? candidates[0];
      case "random":
      // No price data yet, so cost-optimized spreads load like random
      case "cost-optimized":
        return candidates[Math.floor(this.random() * candidates.length)];
    }
  }
}

function leastLoaded(candidates: readonly VideoAdapter[], metrics: ReadonlyMap<string, ModelMetrics>): VideoAdapter {
  let best = candidates[0];
  let bestLoad = metrics.get(best.name)?.currentLoad ?? 0;
  for (const candidate of candidates.slice(1)) {
    const load = metrics.get(candidate.name)?.currentLoad ?? 0;
    if (load < bestLoad) {
      best = candidate;
      bestLoad = load;
    }
  }
  return best;
}

function fastest(
  candidates: readonly VideoAdapter[],
  metrics: ReadonlyMap<string, ModelMetrics>
): VideoAdapter | undefined {
  let best: VideoAdapter | undefined;
  let bestTime = Infinity;
  for (const candidate of candidates) {
    const time = metrics.get(candidate.name)?.averageResponseTime ?? 0;
    if (time > 0 && time < bestTime) {
      best = candidate;
      bestTime = time;
    }
  }
  return best;
}
