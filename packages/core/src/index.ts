// Domain types
export * from "./types/generation.js";
export * from "./types/scene.js";

// Errors and Result
export * from "./errors.js";

// Logging
export * from "./logger.js";

// Error handling, circuit breaker, recovery actions
export * from "./recovery/index.js";

// Script validation
export * from "./script/scene-validator.js";
export * from "./script/sample.js";
