/**
 * Scrape Scheduler
 *
 * Optional cron schedule (UTC) that triggers the runner. A tick that lands
 * while a cycle is still running is a no-op. Schedules with a timer to the
 * next fire time rather than polling.
 */

import CronParser from 'cron-parser'
import { loggers } from '../config/logger.js'
import { ConfigError, errorMessage } from '../errors.js'
import type { TriggerResult } from './runner.js'

const log = loggers.scheduler

/** Longest single setTimeout; later fire times are reached in hops */
const MAX_TIMER_MS = 2_147_483_647

export interface Triggerable {
  trigger(): TriggerResult
}

export interface ScrapeScheduler {
  /** Next fire time, or null once stopped */
  nextRunAt(): Date | null
  stop(): void
}

/**
 * @throws ConfigError for an invalid cron expression
 */
export function nextFireTime(cron: string, after: Date): Date {
  try {
    return CronParser.parse(cron, { currentDate: after, tz: 'UTC' }).next().toDate()
  } catch (error) {
    throw new ConfigError(`Invalid SCRAPE_CRON '${cron}': ${errorMessage(error)}`)
  }
}

export function startScrapeScheduler(
  runner: Triggerable,
  cron: string,
  now: () => Date = () => new Date()
): ScrapeScheduler {
  let timer: NodeJS.Timeout | null = null
  let nextRun: Date | null = null
  let stopped = false

  const schedule = (): Date => {
    const current = now()
    const next = nextFireTime(cron, current)
    nextRun = next
    arm(current)
    return next
  }

  const arm = (current: Date) => {
    if (stopped || !nextRun) return
    const delay = nextRun.getTime() - current.getTime()
    if (delay > MAX_TIMER_MS) {
      timer = setTimeout(() => arm(now()), MAX_TIMER_MS)
      return
    }
    timer = setTimeout(fire, Math.max(0, delay))
  }

  const fire = () => {
    const result = runner.trigger()
    log.info('SCHEDULED_SCRAPE_TRIGGERED', {
      event_name: 'SCHEDULED_SCRAPE_TRIGGERED',
      status: result.status,
      startedAt: result.startedAt,
    })
    if (!stopped) schedule()
  }

  const first = schedule()
  log.info('Scrape scheduler started', { cron, nextRunAt: first.toISOString() })

  return {
    nextRunAt: () => nextRun,
    stop() {
      stopped = true
      nextRun = null
      if (timer) clearTimeout(timer)
      timer = null
      log.info('Scrape scheduler stopped')
    },
  }
}
