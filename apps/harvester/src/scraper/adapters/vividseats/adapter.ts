/**
 * Vivid Seats
 *
 * Exposes a production listings endpoint that returns plain JSON; the event
 * page is the fallback.
 */

import { DEFAULT_EMBEDDED_SELECTORS } from '../../extract/embedded-json.js'
import type { PlatformAdapter } from '../../types.js'

export const vividseatsAdapter: PlatformAdapter = {
  id: 'vividseats',
  displayName: 'Vivid Seats',
  version: '1.0.0',
  embeddedScriptSelectors: DEFAULT_EMBEDDED_SELECTORS,
  apiHeaders: {
    'X-Requested-With': 'XMLHttpRequest',
  },
}
