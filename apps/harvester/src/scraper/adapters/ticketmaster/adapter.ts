/**
 * Ticketmaster
 *
 * Resale and face-value inventory share a page; face-value tiers below the
 * resale floor are excluded by the narrower minimum.
 */

import { DEFAULT_EMBEDDED_SELECTORS } from '../../extract/embedded-json.js'
import type { PlatformAdapter } from '../../types.js'

export const ticketmasterAdapter: PlatformAdapter = {
  id: 'ticketmaster',
  displayName: 'Ticketmaster',
  version: '1.0.0',
  bounds: { min: 400, max: 20000 },
  embeddedScriptSelectors: [...DEFAULT_EMBEDDED_SELECTORS, 'script#__TM_STATE__'],
}
