/**
 * StubHub
 *
 * Listings render client-side from a JSON island; the page also carries
 * JSON-LD AggregateOffer data with lowPrice.
 */

import { DEFAULT_EMBEDDED_SELECTORS } from '../../extract/embedded-json.js'
import type { PlatformAdapter } from '../../types.js'

export const stubhubAdapter: PlatformAdapter = {
  id: 'stubhub',
  displayName: 'StubHub',
  version: '1.0.0',
  embeddedScriptSelectors: [...DEFAULT_EMBEDDED_SELECTORS, 'script#index-data'],
}
