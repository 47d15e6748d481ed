/**
 * @module interface
 * @description Adapter contract, shared adapter helpers and the adapter registry.
 */

export * from "./types.js";
export * from "./helpers.js";
export * from "./registry.js";
