/**
 * Rounding helpers for persisted metrics.
 */

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals
  const rounded = Math.round(value * factor) / factor
  // normalize -0 so JSON never shows "-0"
  return rounded === 0 ? 0 : rounded
}

export function roundOneDecimal(value: number): number {
  return roundTo(value, 1)
}
