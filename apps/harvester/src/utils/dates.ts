/**
 * UTC calendar helpers. Records, relay entries and the cycle all key on the
 * UTC date, regardless of the host timezone.
 */

export function utcDate(now: Date): string {
  return now.toISOString().slice(0, 10)
}

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/
