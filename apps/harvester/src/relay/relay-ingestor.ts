/**
 * Relay Ingestor
 *
 * Accepts per-platform summaries gathered outside this service (a browser on
 * another network, a manual check) for marketplaces that block direct
 * retrieval. Entries are keyed by platform and stamped with the UTC date they
 * were accepted; the scraper only uses an entry on that same date.
 */

import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { RelayValidationError, type RelayValidationIssue } from '../errors.js'
import { withinBounds } from '../scraper/extract/price-extractor.js'
import { tryParseJson } from '../scraper/extract/json-value.js'
import type { PlatformId, PlatformRegistry, PriceBounds } from '../scraper/types.js'
import { withFileLock } from '../storage/file-lock.js'
import { readTextIfExists, writeJsonAtomic } from '../storage/json-file.js'
import { ISO_DATE_PATTERN, utcDate } from '../utils/dates.js'
import type { RelayCache, RelayEntry, RelayFreshness, RelayLookup } from './types.js'

const log = loggers.relay

const numeric = z.union([
  z.number(),
  z
    .string()
    .trim()
    .regex(/^\d+(?:\.\d+)?$/, 'must be a number')
    .transform(Number),
])

export const relaySubmissionSchema = z.object({
  platform: z.string().trim().min(1, 'is required'),
  floor: numeric.refine(Number.isFinite, 'must be a finite number'),
  median: numeric.refine(Number.isFinite, 'must be a finite number'),
  sampleCount: numeric.refine((n) => Number.isInteger(n) && n >= 0, 'must be a non-negative integer').default(0),
})

export type RelaySubmission = z.input<typeof relaySubmissionSchema>

const relayEntrySchema = z.object({
  floor: z.number(),
  median: z.number(),
  sampleCount: z.number().int().nonnegative(),
  date: z.string().regex(ISO_DATE_PATTERN),
  timestamp: z.string(),
})

const relayCacheSchema = z.record(z.string(), relayEntrySchema)

export interface RelayIngestorOptions {
  path: string
  registry: PlatformRegistry
  /** Global bounds; adapters do not narrow relay submissions */
  bounds: PriceBounds
  lockTimeoutMs?: number
  now?: () => Date
}

export class RelayIngestor implements RelayLookup {
  private readonly path: string
  private readonly registry: PlatformRegistry
  private readonly bounds: PriceBounds
  private readonly lockTimeoutMs: number | undefined
  private readonly now: () => Date

  constructor(options: RelayIngestorOptions) {
    this.path = options.path
    this.registry = options.registry
    this.bounds = options.bounds
    this.lockTimeoutMs = options.lockTimeoutMs
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Validate and store a submission. Last submission for a platform wins.
   * @throws RelayValidationError, leaving the cache unchanged
   */
  async submit(input: unknown): Promise<RelayEntry> {
    const { platform, floor, median, sampleCount } = this.validate(input)
    const now = this.now()
    const entry: RelayEntry = {
      platform,
      floor,
      median,
      sampleCount,
      date: utcDate(now),
      timestamp: now.toISOString(),
    }

    await withFileLock(
      this.path,
      async () => {
        const cache = await this.read()
        const previous = cache[platform]
        if (previous) {
          log.info('RELAY_ENTRY_OVERWRITTEN', {
            event_name: 'RELAY_ENTRY_OVERWRITTEN',
            platform,
            previous: { floor: previous.floor, median: previous.median, sampleCount: previous.sampleCount, date: previous.date },
            next: { floor, median, sampleCount },
          })
        }
        await writeJsonAtomic(this.path, { ...cache, [platform]: entry })
      },
      { timeoutMs: this.lockTimeoutMs }
    )

    log.info('RELAY_ENTRY_ACCEPTED', {
      event_name: 'RELAY_ENTRY_ACCEPTED',
      platform,
      floor,
      median,
      sampleCount,
      date: entry.date,
    })

    return entry
  }

  async getEligible(platform: PlatformId, date: string): Promise<RelayEntry | null> {
    const entry = (await this.read())[platform]
    if (!entry || entry.date !== date) return null
    return entry
  }

  async list(): Promise<RelayCache> {
    return this.read()
  }

  async summarizeFreshness(date: string): Promise<Partial<Record<PlatformId, RelayFreshness>>> {
    const cache = await this.read()
    const summary: Partial<Record<PlatformId, RelayFreshness>> = {}
    for (const adapter of this.registry.list()) {
      const entry = cache[adapter.id]
      summary[adapter.id] = {
        present: entry !== undefined,
        fresh: entry?.date === date,
        date: entry?.date ?? null,
        timestamp: entry?.timestamp ?? null,
      }
    }
    return summary
  }

  private validate(input: unknown): Omit<RelayEntry, 'date' | 'timestamp'> {
    const parsed = relaySubmissionSchema.safeParse(input ?? {})
    if (!parsed.success) {
      throw new RelayValidationError(
        parsed.error.issues.map((issue) => ({
          field: issue.path.length > 0 ? issue.path.join('.') : 'body',
          message: issue.message,
        }))
      )
    }

    const { platform, floor, median, sampleCount } = parsed.data
    const issues: RelayValidationIssue[] = []
    const { min, max } = this.bounds

    const adapter = this.registry.list().find((a) => a.id === platform.toLowerCase())
    if (!adapter) {
      issues.push({ field: 'platform', message: `unknown platform '${platform}'` })
    }
    if (!withinBounds(floor, this.bounds)) {
      issues.push({ field: 'floor', message: `must be between ${min} and ${max}` })
    }
    if (!withinBounds(median, this.bounds)) {
      issues.push({ field: 'median', message: `must be between ${min} and ${max}` })
    }
    if (floor > median) {
      issues.push({ field: 'floor', message: 'must not exceed median' })
    }

    if (!adapter || issues.length > 0) {
      throw new RelayValidationError(issues)
    }

    return { platform: adapter.id, floor, median, sampleCount }
  }

  /**
   * Unreadable or malformed cache files read as empty; the next accepted
   * submission rewrites the file.
   */
  private async read(): Promise<RelayCache> {
    const raw = await readTextIfExists(this.path)
    if (raw === null) return {}

    const parsed = tryParseJson(raw)
    const result = parsed.ok ? relayCacheSchema.safeParse(parsed.value) : null
    if (!result?.success) {
      log.warn('Relay cache unreadable, treating as empty', { path: this.path })
      return {}
    }

    const cache: RelayCache = {}
    for (const adapter of this.registry.list()) {
      const stored = result.data[adapter.id]
      if (stored) cache[adapter.id] = { platform: adapter.id, ...stored }
    }
    return cache
  }
}
