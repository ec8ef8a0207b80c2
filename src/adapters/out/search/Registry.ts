import type { ProviderAdapter, ProviderDirectory } from "../../../application/ports/out/ProviderAdapter.ts";
import { debug } from "../../../config/logger.ts";

/**
 * Registry for provider adapters, keyed by provider id
 */
export class ProviderRegistry implements ProviderDirectory {
  private adapters = new Map<string, ProviderAdapter>();

  register(adapter: ProviderAdapter): this {
    if (this.adapters.has(adapter.id)) {
      debug(`[REGISTRY] Replacing adapter ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
    return this;
  }

  get(id: string): ProviderAdapter | undefined {
    return this.adapters.get(id);
  }

  /**
   * All registered adapters, in registration order
   */
  list(): ProviderAdapter[] {
    return Array.from(this.adapters.values());
  }

  get size(): number {
    return this.adapters.size;
  }
}
