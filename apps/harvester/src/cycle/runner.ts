/**
 * Scrape Cycle Runner
 *
 * Owns the scrape state. One cycle at a time:
 *
 *   scrape each platform (registry order, paced) → aggregate → commit
 *
 * A cycle that fails (no active platforms, deadline, history write) records
 * lastError and leaves the persisted document as it was. Nothing retries
 * automatically; the next trigger starts a fresh cycle.
 */

import type { ILogger } from '@ticketdesk/logger'
import { aggregate, type ActivePlatforms } from '../aggregate/aggregator.js'
import { loggers } from '../config/logger.js'
import { CycleDeadlineError, errorMessage } from '../errors.js'
import type { DailyRecord, HistoryDocument } from '../history/types.js'
import type { PlatformRunContext } from '../scraper/platform-scraper.js'
import type { PlatformId, PlatformScrapeOutcome, PriceBounds } from '../scraper/types.js'
import { utcDate } from '../utils/dates.js'

export interface ScrapeState {
  running: boolean
  startedAt: string | null
  lastSuccess: string | null
  lastError: string | null
  lastDurationMs: number | null
  lastActivePlatforms: PlatformId[] | null
}

export type TriggerResult =
  | { status: 'started'; startedAt: string }
  | { status: 'already_running'; startedAt: string }

export type CycleResult =
  | { ok: true; record: DailyRecord; document: HistoryDocument; outcomes: PlatformScrapeOutcome[] }
  | { ok: false; error: Error; outcomes: PlatformScrapeOutcome[] }

/** What the runner needs from a platform scraper */
export interface CycleScraper {
  readonly platform: PlatformId
  run(ctx: PlatformRunContext): Promise<PlatformScrapeOutcome>
}

export interface HistorySink {
  commit(record: DailyRecord): Promise<HistoryDocument>
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface ScrapeCycleRunnerOptions {
  scrapers: readonly CycleScraper[]
  history: HistorySink
  bounds: PriceBounds
  pacing: { minMs: number; maxMs: number }
  cycleDeadlineMs: number
  logger?: ILogger
  now?: () => Date
  sleep?: Sleep
  random?: () => number
}

/**
 * Resolves after `ms`, or as soon as the signal aborts.
 */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })

export class ScrapeCycleRunner {
  private readonly options: ScrapeCycleRunnerOptions
  private readonly log: ILogger
  private readonly now: () => Date
  private readonly sleep: Sleep
  private readonly random: () => number

  private state: ScrapeState = {
    running: false,
    startedAt: null,
    lastSuccess: null,
    lastError: null,
    lastDurationMs: null,
    lastActivePlatforms: null,
  }

  private inFlight: Promise<CycleResult> | null = null

  constructor(options: ScrapeCycleRunnerOptions) {
    this.options = options
    this.log = options.logger ?? loggers.cycle
    this.now = options.now ?? (() => new Date())
    this.sleep = options.sleep ?? abortableSleep
    this.random = options.random ?? Math.random
  }

  /**
   * Snapshot of the current state. Callers never see the live object.
   */
  getState(): ScrapeState {
    return {
      ...this.state,
      lastActivePlatforms: this.state.lastActivePlatforms ? [...this.state.lastActivePlatforms] : null,
    }
  }

  /**
   * Start a cycle in the background unless one is already running.
   */
  trigger(): TriggerResult {
    if (this.state.running && this.state.startedAt) {
      return { status: 'already_running', startedAt: this.state.startedAt }
    }

    const cycle = this.start()
    return { status: 'started', startedAt: cycle.startedAt }
  }

  /**
   * Run one cycle to completion. Joins the running cycle if there is one.
   */
  async runCycle(): Promise<CycleResult> {
    if (this.inFlight) return this.inFlight
    return this.start().done
  }

  /**
   * Resolves when no cycle is running. For tests and shutdown.
   */
  async whenIdle(): Promise<void> {
    if (this.inFlight) await this.inFlight
  }

  private start(): { startedAt: string; done: Promise<CycleResult> } {
    const cycleNow = this.now()
    const startedAt = cycleNow.toISOString()
    this.state = { ...this.state, running: true, startedAt, lastError: null }

    const done: Promise<CycleResult> = this.execute(cycleNow).finally(() => {
      if (this.inFlight === done) this.inFlight = null
    })
    this.inFlight = done
    return { startedAt, done }
  }

  /**
   * Never rejects: failures are recorded in state and returned.
   *
   * The clock is read once: relay eligibility and the record date both use
   * the cycle's start date, even when the cycle runs past midnight UTC.
   */
  private async execute(cycleNow: Date): Promise<CycleResult> {
    const startedAt = cycleNow.toISOString()
    const startMs = Date.now()
    const outcomes: PlatformScrapeOutcome[] = []
    const { scrapers, cycleDeadlineMs } = this.options

    const controller = new AbortController()
    const deadline = setTimeout(() => controller.abort(), cycleDeadlineMs)

    this.log.info('SCRAPE_CYCLE_START', {
      event_name: 'SCRAPE_CYCLE_START',
      startedAt,
      platforms: scrapers.map((s) => s.platform),
      cycleDeadlineMs,
    })

    try {
      const date = utcDate(cycleNow)
      const active: ActivePlatforms = {}

      for (const [index, scraper] of scrapers.entries()) {
        if (controller.signal.aborted) throw new CycleDeadlineError(cycleDeadlineMs)

        if (index > 0) {
          await this.sleep(this.pacingDelay(), controller.signal)
          if (controller.signal.aborted) throw new CycleDeadlineError(cycleDeadlineMs)
        }

        const outcome = await scraper.run({
          date,
          bounds: this.options.bounds,
          logger: this.log,
          signal: controller.signal,
        })
        outcomes.push(outcome)
        if (outcome.result) {
          active[outcome.platform] = outcome.result
        }
      }

      if (controller.signal.aborted) throw new CycleDeadlineError(cycleDeadlineMs)

      const record = aggregate(active, cycleNow, scrapers.length)
      const document = await this.options.history.commit(record)
      const durationMs = Date.now() - startMs
      const activePlatforms = outcomes.flatMap((o) => (o.result ? [o.platform] : []))

      this.state = {
        ...this.state,
        running: false,
        lastSuccess: this.now().toISOString(),
        lastError: null,
        lastDurationMs: durationMs,
        lastActivePlatforms: activePlatforms,
      }

      this.log.info('SCRAPE_CYCLE_COMPLETE', {
        event_name: 'SCRAPE_CYCLE_COMPLETE',
        durationMs,
        activePlatforms,
        crossMedian: record.crossMedian,
        crossFloor: record.crossFloor,
        totalInventory: record.totalInventory,
      })

      return { ok: true, record, document, outcomes }
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(errorMessage(caught))
      const durationMs = Date.now() - startMs

      this.state = {
        ...this.state,
        running: false,
        lastError: error.message,
        lastDurationMs: durationMs,
        lastActivePlatforms: outcomes.flatMap((o) => (o.result ? [o.platform] : [])),
      }

      this.log.error(
        'SCRAPE_CYCLE_FAILED',
        {
          event_name: 'SCRAPE_CYCLE_FAILED',
          durationMs,
          platformsTried: outcomes.length,
        },
        error
      )

      return { ok: false, error, outcomes }
    } finally {
      clearTimeout(deadline)
    }
  }

  private pacingDelay(): number {
    const { minMs, maxMs } = this.options.pacing
    return minMs + Math.floor(this.random() * (maxMs - minMs + 1))
  }
}
