/**
 * Embedded page state
 *
 * Marketplace pages ship their listing data as JSON inside script tags
 * (Next.js __NEXT_DATA__, application/json islands, JSON-LD). Each matching
 * block is parsed independently; a block that fails to parse is skipped.
 */

import * as cheerio from 'cheerio'
import { tryParseJson } from './json-value.js'

export const DEFAULT_EMBEDDED_SELECTORS = [
  'script#__NEXT_DATA__',
  'script[type="application/json"]',
  'script[type="application/ld+json"]',
] as const

export interface EmbeddedJsonResult {
  documents: unknown[]
  blocksFound: number
  blocksFailed: number
}

export function extractEmbeddedJson(
  html: string,
  selectors: readonly string[] = DEFAULT_EMBEDDED_SELECTORS
): EmbeddedJsonResult {
  const $ = cheerio.load(html)
  const documents: unknown[] = []
  const seen = new Set<string>()
  let blocksFound = 0
  let blocksFailed = 0

  for (const selector of selectors) {
    const scripts = $(selector)

    for (let i = 0; i < scripts.length; i++) {
      const content = scripts.eq(i).html()?.trim()
      if (!content || seen.has(content)) continue
      seen.add(content)
      blocksFound++

      const parsed = tryParseJson(content)
      if (parsed.ok) {
        documents.push(parsed.value)
      } else {
        blocksFailed++
      }
    }
  }

  return { documents, blocksFound, blocksFailed }
}
