/**
 * Event definition
 *
 * The one event/section this deployment tracks, plus the per-platform
 * endpoints the strategy chain fetches. Loaded from a JSON file so a new
 * event needs no code change.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../errors.js'
import { PLATFORM_IDS, type PlatformId, type PlatformTargets } from '../scraper/types.js'

const targetsSchema = z.object({
  apiUrl: z.string().url().optional(),
  pageUrls: z.array(z.string().url()).default([]),
})

const platformsSchema = z
  .object({
    stubhub: targetsSchema.optional(),
    seatgeek: targetsSchema.optional(),
    tickpick: targetsSchema.optional(),
    vividseats: targetsSchema.optional(),
    ticketmaster: targetsSchema.optional(),
  } satisfies Record<PlatformId, z.ZodTypeAny>)
  .strict()

export const eventDefinitionSchema = z.object({
  event: z.string().min(1),
  section: z.string().min(1),
  row: z.string().min(1).optional(),
  seatType: z.string().min(1).optional(),
  platforms: platformsSchema,
})

export type EventDefinitionInput = z.input<typeof eventDefinitionSchema>

export interface EventDefinition {
  event: string
  section: string
  row: string | null
  seatType: string | null
  platforms: Partial<Record<PlatformId, PlatformTargets>>
}

export function parseEventDefinition(raw: unknown): EventDefinition {
  const parsed = eventDefinitionSchema.safeParse(raw)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid event definition: ${details}`)
  }

  const platforms: Partial<Record<PlatformId, PlatformTargets>> = {}
  for (const id of PLATFORM_IDS) {
    const targets = parsed.data.platforms[id]
    if (targets) {
      platforms[id] = { apiUrl: targets.apiUrl, pageUrls: targets.pageUrls }
    }
  }

  return {
    event: parsed.data.event,
    section: parsed.data.section,
    row: parsed.data.row ?? null,
    seatType: parsed.data.seatType ?? null,
    platforms,
  }
}

export async function loadEventDefinition(path: string): Promise<EventDefinition> {
  let raw: unknown
  try {
    raw = JSON.parse(await readFile(path, 'utf8'))
  } catch (error) {
    throw new ConfigError(`Cannot load event definition from ${path}: ${errorMessage(error)}`)
  }
  return parseEventDefinition(raw)
}
