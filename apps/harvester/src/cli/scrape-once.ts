/**
 * One-shot scrape
 *
 * Runs exactly one cycle with the current environment, prints a summary and
 * exits non-zero if the cycle failed.
 *
 * Usage: npm run scrape:once --workspace @ticketdesk/harvester
 */

import '../env.js'
import { createHarvester } from '../bootstrap.js'
import { loadSettings } from '../config/settings.js'
import { logger } from '../config/logger.js'
import { formatCycleSummary } from '../cycle/summary.js'

async function main(): Promise<number> {
  const settings = loadSettings()
  const { runner } = await createHarvester(settings)
  const result = await runner.runCycle()
  console.log(formatCycleSummary(result))
  return result.ok ? 0 : 1
}

main()
  .then((code) => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.fatal('scrape-once failed', {}, error)
    process.exitCode = 1
  })
