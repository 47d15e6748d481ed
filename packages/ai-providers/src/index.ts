/**
 * Video backend adapters for clipmesh
 *
 * Each adapter implements {@link VideoAdapter} over one vendor API. Adapters
 * are plain classes built from a {@link ModelConfig}; collect them in an
 * {@link AdapterRegistry} to look them up by name or capability.
 */

// Contract, helpers and registry
export * from "./interface/index.js";

// HTTP session with retry and backoff
export * from "./http/index.js";

// Backends
export * from "./luma/index.js";
export * from "./runway/index.js";
export * from "./pika/index.js";
