/**
 * Platform Registry
 *
 * Marketplaces are registered explicitly at startup; no auto-discovery.
 * Registration order is the order platforms are scraped in a cycle.
 */

import type { PlatformAdapter, PlatformId, PlatformRegistry } from './types.js'

export class InMemoryPlatformRegistry implements PlatformRegistry {
  private readonly adapters = new Map<PlatformId, PlatformAdapter>()

  /**
   * @throws Error if the platform is already registered
   */
  register(adapter: PlatformAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Platform '${adapter.id}' is already registered`)
    }
    const min = adapter.bounds?.min
    const max = adapter.bounds?.max
    if (min !== undefined && max !== undefined && min >= max) {
      throw new Error(`Platform '${adapter.id}' has empty price bounds ${min}-${max}`)
    }
    this.adapters.set(adapter.id, adapter)
  }

  get(id: PlatformId): PlatformAdapter | undefined {
    return this.adapters.get(id)
  }

  list(): PlatformAdapter[] {
    return Array.from(this.adapters.values())
  }
}
