/**
 * TickPick
 *
 * Prices are all-in with no fees. Parking passes and add-ons show up in the
 * same listing payload under 100-ish dollars, and suite packages near the top
 * of the range, so this platform narrows the global bounds.
 */

import { DEFAULT_EMBEDDED_SELECTORS } from '../../extract/embedded-json.js'
import type { PlatformAdapter } from '../../types.js'

export const tickpickAdapter: PlatformAdapter = {
  id: 'tickpick',
  displayName: 'TickPick',
  version: '1.0.0',
  bounds: { min: 300, max: 15000 },
  embeddedScriptSelectors: DEFAULT_EMBEDDED_SELECTORS,
}
