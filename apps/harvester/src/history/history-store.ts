/**
 * History Store
 *
 * Owns DATA_DIR/ticket_data.json: a date-keyed log of daily records plus the
 * derived trends and event metadata. Every commit is read-upsert-write under
 * the file lock, and the write is atomic.
 */

import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { HistoryReadError } from '../errors.js'
import { tryParseJson } from '../scraper/extract/json-value.js'
import type { PlatformId } from '../scraper/types.js'
import { withFileLock } from '../storage/file-lock.js'
import { readTextIfExists, writeJsonAtomic } from '../storage/json-file.js'
import { ISO_DATE_PATTERN } from '../utils/dates.js'
import { computeTrends, upsertRecord } from './trends.js'
import type { DailyRecord, HistoryDocument, HistoryMeta } from './types.js'

const log = loggers.history

const platformResultSchema = z.object({
  floor: z.number(),
  median: z.number(),
  sampleCount: z.number().int().nonnegative(),
  provenance: z.enum(['direct', 'relay']),
})

const dailyRecordSchema = z.object({
  date: z.string().regex(ISO_DATE_PATTERN),
  timestamp: z.string(),
  crossMedian: z.number(),
  crossFloor: z.number(),
  totalInventory: z.number(),
  platformSpreadPct: z.number(),
  platformResults: z.object({
    stubhub: platformResultSchema.optional(),
    seatgeek: platformResultSchema.optional(),
    tickpick: platformResultSchema.optional(),
    vividseats: platformResultSchema.optional(),
    ticketmaster: platformResultSchema.optional(),
  } satisfies Record<PlatformId, z.ZodTypeAny>),
})

/** Only the log is read back; meta, today and trends are rebuilt on every commit */
const storedDocumentSchema = z.object({
  history: z.array(dailyRecordSchema),
})

export interface HistoryStoreOptions {
  path: string
  meta: Omit<HistoryMeta, 'generated'>
  lockTimeoutMs?: number
  now?: () => Date
}

export class HistoryStore {
  private readonly path: string
  private readonly meta: Omit<HistoryMeta, 'generated'>
  private readonly lockTimeoutMs: number | undefined
  private readonly now: () => Date

  constructor(options: HistoryStoreOptions) {
    this.path = options.path
    this.meta = options.meta
    this.lockTimeoutMs = options.lockTimeoutMs
    this.now = options.now ?? (() => new Date())
  }

  get filePath(): string {
    return this.path
  }

  /**
   * Persist today's record. A missing file starts an empty log; a file that
   * cannot be parsed fails the commit and is left as it is.
   */
  async commit(record: DailyRecord): Promise<HistoryDocument> {
    return withFileLock(
      this.path,
      async () => {
        const history = upsertRecord(await this.readHistory(), record)
        const document: HistoryDocument = {
          meta: { generated: this.now().toISOString(), ...this.meta },
          today: record,
          trends: computeTrends(history),
          history,
        }

        await writeJsonAtomic(this.path, document)

        log.info('HISTORY_COMMITTED', {
          event_name: 'HISTORY_COMMITTED',
          date: record.date,
          records: history.length,
          crossMedian: record.crossMedian,
          crossFloor: record.crossFloor,
        })

        return document
      },
      { timeoutMs: this.lockTimeoutMs }
    )
  }

  /**
   * Persisted document text as written, or null before the first commit.
   */
  async readRaw(): Promise<string | null> {
    return readTextIfExists(this.path)
  }

  /**
   * @throws HistoryReadError when the file exists but is not a valid document
   */
  async readHistory(): Promise<DailyRecord[]> {
    let raw: string | null
    try {
      raw = await readTextIfExists(this.path)
    } catch (error) {
      throw new HistoryReadError(this.path, error)
    }
    if (raw === null) return []

    const parsed = tryParseJson(raw)
    if (!parsed.ok) {
      throw new HistoryReadError(this.path, new Error(parsed.error))
    }

    const result = storedDocumentSchema.safeParse(parsed.value)
    if (!result.success) {
      throw new HistoryReadError(this.path, result.error)
    }

    return result.data.history
  }
}
