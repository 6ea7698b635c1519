/**
 * Platform Registration
 *
 * Registers every supported marketplace into the given registry, before
 * the first cycle is built. Adapters are explicitly registered here; no
 * auto-discovery.
 */

import type { PlatformRegistry } from '../types.js'
import { stubhubAdapter } from './stubhub/adapter.js'
import { seatgeekAdapter } from './seatgeek/adapter.js'
import { tickpickAdapter } from './tickpick/adapter.js'
import { vividseatsAdapter } from './vividseats/adapter.js'
import { ticketmasterAdapter } from './ticketmaster/adapter.js'

export const ALL_ADAPTERS = [
  stubhubAdapter,
  seatgeekAdapter,
  tickpickAdapter,
  vividseatsAdapter,
  ticketmasterAdapter,
] as const

export function registerAllAdapters(registry: PlatformRegistry): PlatformRegistry {
  for (const adapter of ALL_ADAPTERS) {
    if (!registry.get(adapter.id)) {
      registry.register(adapter)
    }
  }
  return registry
}

export { stubhubAdapter, seatgeekAdapter, tickpickAdapter, vividseatsAdapter, ticketmasterAdapter }
