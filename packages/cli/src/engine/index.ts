export * from "./context.js";
export * from "./generation-engine.js";
export * from "./load-balancer.js";
export * from "./metrics.js";
export * from "./semaphore.js";
