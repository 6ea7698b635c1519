/**
 * Runtime settings
 *
 * Parsed once from the environment and validated with zod. Callers get a
 * frozen, typed object; nothing else in the harvester reads process.env.
 */

import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '../errors.js'
import { loggers } from './logger.js'
import type { PriceBounds } from '../scraper/types.js'

const log = loggers.config

const DEFAULT_SCRAPE_TOKEN = 'changeme'

/** Bundled event definition, next to src/ */
export const DEFAULT_EVENT_CONFIG_PATH = fileURLToPath(new URL('../../config/event.json', import.meta.url))

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback)

const settingsSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(10000),
    SCRAPE_TOKEN: z.string().min(1).optional(),
    PRICE_MIN: z.coerce.number().positive().default(200),
    PRICE_MAX: z.coerce.number().positive().default(20000),
    PACING_MIN_MS: intFromEnv(3000),
    PACING_MAX_MS: intFromEnv(8000),
    FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(25000),
    FETCH_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(5).default(2),
    CYCLE_DEADLINE_MS: z.coerce.number().int().positive().default(300000),
    LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    DATA_DIR: z.string().min(1).default('./data'),
    EVENT_CONFIG: z.string().min(1).optional(),
    SCRAPE_CRON: z.string().min(1).optional(),
    SERVICE_NAME: z.string().min(1).default('Ticket Desk v1.0'),
  })
  .refine((env) => env.PRICE_MAX > env.PRICE_MIN, {
    message: 'PRICE_MAX must be greater than PRICE_MIN',
    path: ['PRICE_MAX'],
  })
  .refine((env) => env.PACING_MAX_MS >= env.PACING_MIN_MS, {
    message: 'PACING_MAX_MS must be at least PACING_MIN_MS',
    path: ['PACING_MAX_MS'],
  })

export interface Settings {
  readonly env: 'development' | 'production' | 'test'
  readonly port: number
  readonly scrapeToken: string
  readonly bounds: Readonly<PriceBounds>
  readonly pacing: Readonly<{ minMs: number; maxMs: number }>
  readonly fetchTimeoutMs: number
  readonly fetchMaxAttempts: number
  readonly cycleDeadlineMs: number
  readonly lockTimeoutMs: number
  readonly dataDir: string
  readonly historyFile: string
  readonly relayFile: string
  readonly eventConfigPath: string
  readonly scrapeCron: string | null
  readonly serviceName: string
}

/**
 * Parse settings from an env-like record.
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = settingsSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  const values = parsed.data

  if (!values.SCRAPE_TOKEN) {
    if (values.NODE_ENV === 'production') {
      throw new ConfigError('SCRAPE_TOKEN is required in production')
    }
    log.warn('SCRAPE_TOKEN not set, using development default')
  }

  const dataDir = resolve(values.DATA_DIR)

  return Object.freeze({
    env: values.NODE_ENV,
    port: values.PORT,
    scrapeToken: values.SCRAPE_TOKEN ?? DEFAULT_SCRAPE_TOKEN,
    bounds: Object.freeze({ min: values.PRICE_MIN, max: values.PRICE_MAX }),
    pacing: Object.freeze({ minMs: values.PACING_MIN_MS, maxMs: values.PACING_MAX_MS }),
    fetchTimeoutMs: values.FETCH_TIMEOUT_MS,
    fetchMaxAttempts: values.FETCH_MAX_ATTEMPTS,
    cycleDeadlineMs: values.CYCLE_DEADLINE_MS,
    lockTimeoutMs: values.LOCK_TIMEOUT_MS,
    dataDir,
    historyFile: resolve(dataDir, 'ticket_data.json'),
    relayFile: resolve(dataDir, 'relay_cache.json'),
    eventConfigPath: values.EVENT_CONFIG ? resolve(values.EVENT_CONFIG) : DEFAULT_EVENT_CONFIG_PATH,
    scrapeCron: values.SCRAPE_CRON ?? null,
    serviceName: values.SERVICE_NAME,
  })
}
