import { DEFAULT_EMBEDDED_SELECTORS } from '../../extract/embedded-json.js'
import type { PlatformAdapter } from '../../types.js'

export const seatgeekAdapter: PlatformAdapter = {
  id: 'seatgeek',
  displayName: 'SeatGeek',
  version: '1.0.0',
  embeddedScriptSelectors: DEFAULT_EMBEDDED_SELECTORS,
}
