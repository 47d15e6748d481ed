import type { GenerationConfig, ModelCapability } from "@clipmesh/core";
import type { ModelInfo, VideoAdapter } from "./types.js";

export interface RegistryInfo {
  totalAdapters: number;
  enabledAdapters: number;
  adapters: Record<string, ModelInfo>;
}

/**
 * Index of live adapters by name, in registration order.
 *
 * The registry only holds references: unregistering an adapter hides it from
 * lookups but leaves calls already running on it untouched.
 */
export class AdapterRegistry {
  private adapters: Map<string, VideoAdapter> = new Map();

  register(adapter: VideoAdapter): void {
    if (this.adapters.has(adapter.name)) {
      throw new Error(`Model adapter '${adapter.name}' already registered`);
    }
    this.adapters.set(adapter.name, adapter);
  }

  unregister(name: string): boolean {
    return this.adapters.delete(name);
  }

  get(name: string): VideoAdapter | undefined {
    return this.adapters.get(name);
  }

  getAll(): VideoAdapter[] {
    return Array.from(this.adapters.values());
  }

  list(enabledOnly = false): string[] {
    return this.getAll()
      .filter((adapter) => !enabledOnly || adapter.enabled)
      .map((adapter) => adapter.name);
  }

  /** Enabled adapters advertising `capability` */
  getByCapability(capability: ModelCapability): VideoAdapter[] {
    return this.getAll().filter((adapter) => adapter.enabled && adapter.capabilities.includes(capability));
  }

  /** First enabled adapter that accepts the request */
  getBestForConfig(config: GenerationConfig): VideoAdapter | undefined {
    return this.getAll().find((adapter) => adapter.enabled && adapter.validateConfig(config).valid);
  }

  getRegistryInfo(): RegistryInfo {
    const adapters: Record<string, ModelInfo> = {};
    for (const adapter of this.adapters.values()) {
      adapters[adapter.name] = adapter.getModelInfo();
    }
    return {
      totalAdapters: this.adapters.size,
      enabledAdapters: this.list(true).length,
      adapters,
    };
  }
}
