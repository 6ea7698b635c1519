import type { CycleResult } from './runner.js'

/**
 * Human-readable report of one cycle, one line per platform.
 */
export function formatCycleSummary(result: CycleResult): string {
  const lines = result.outcomes.map((o) => {
    if (!o.result) {
      return `  ${o.platform.padEnd(13)} no data (${o.attempts.map((a) => `${a.stage}:${a.outcome}`).join(', ')})`
    }
    const r = o.result
    return `  ${o.platform.padEnd(13)} floor $${r.floor}  median $${r.median}  samples ${r.sampleCount}  [${r.provenance}]`
  })

  if (!result.ok) {
    return ['Scrape failed', ...lines, `  error: ${result.error.message}`].join('\n')
  }

  const { record } = result
  return [
    `Scrape complete for ${record.date}`,
    ...lines,
    `  cross median $${record.crossMedian}  cross floor $${record.crossFloor}  inventory ${record.totalInventory}  spread ${record.platformSpreadPct}%`,
  ].join('\n')
}
