export * from "./types.js";
export * from "./severity.js";
export * from "./circuit-breaker.js";
export * from "./actions.js";
export * from "./error-handler.js";
