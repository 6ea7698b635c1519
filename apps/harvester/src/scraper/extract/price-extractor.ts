/**
 * Price Extractor
 *
 * Two passes over a platform response:
 * 1. Structured: every number (or numeric string) under a price-like key,
 *    anywhere in the JSON tree
 * 2. Text fallback: dollar amounts in the raw body, used only when the
 *    structured pass finds nothing
 *
 * Both passes apply the same inclusive bounds. Out-of-range values are other
 * inventory tiers, not extraction failures, and are dropped without notice.
 */

import type { PriceBounds } from '../types.js'
import { classify, walkJson } from './json-value.js'

/**
 * Field names treated as listing prices (compared lowercase).
 */
export const PRICE_FIELD_NAMES: ReadonlySet<string> = new Set([
  'price',
  'amount',
  'cost',
  'sellingprice',
  'listprice',
  'rawprice',
  'displayprice',
  'totalprice',
  'allinprice',
  'priceperticket',
  'minprice',
  'lowprice',
])

/**
 * `$`, digits with optional thousands separators, optional cents.
 */
const MONEY_PATTERN = /\$\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?)(?!\d|,\d)/g

const CURRENCY_NOISE = /[$€£,\s]|USD/gi

export function isPriceField(key: string): boolean {
  return PRICE_FIELD_NAMES.has(key.toLowerCase())
}

export function withinBounds(value: number, bounds: PriceBounds): boolean {
  return Number.isFinite(value) && value >= bounds.min && value <= bounds.max
}

/**
 * Coerce a price-like scalar to a number.
 * Handles 1234.5, "1234.50", "$1,234.50", " USD 980 ".
 */
export function parsePriceValue(value: unknown): number | null {
  const node = classify(value)

  if (node.kind === 'number') {
    return Number.isFinite(node.value) ? node.value : null
  }

  if (node.kind === 'string') {
    const cleaned = node.value.replace(CURRENCY_NOISE, '')
    if (!/^\d+(?:\.\d+)?$/.test(cleaned)) return null
    return Number.parseFloat(cleaned)
  }

  return null
}

function collectScalar(value: unknown, bounds: PriceBounds, out: number[]): void {
  const parsed = parsePriceValue(value)
  if (parsed !== null && withinBounds(parsed, bounds)) {
    out.push(parsed)
  }
}

/**
 * Recursively collect in-bounds prices reachable under price-like keys.
 */
export function extractStructuredPrices(root: unknown, bounds: PriceBounds): number[] {
  const prices: number[] = []

  walkJson(root, {
    enterEntry(key, value) {
      if (!isPriceField(key)) return

      const node = classify(value)
      if (node.kind === 'array') {
        for (const item of node.items) collectScalar(item, bounds, prices)
        return
      }
      collectScalar(value, bounds, prices)
    },
  })

  return prices
}

/**
 * Scan raw text (markup, or a body that failed to parse) for dollar amounts.
 */
export function extractTextPrices(text: string, bounds: PriceBounds): number[] {
  const prices: number[] = []
  for (const match of text.matchAll(MONEY_PATTERN)) {
    const raw = match[1]
    if (raw === undefined) continue
    const value = Number.parseFloat(raw.replace(/,/g, ''))
    if (withinBounds(value, bounds)) {
      prices.push(value)
    }
  }
  return prices
}

export type PriceExtractionMethod = 'structured' | 'text' | 'none'

export interface PriceExtraction {
  prices: number[]
  method: PriceExtractionMethod
}

/**
 * Structured pass over every document, then the text fallback over the raw
 * body if nothing was found.
 *
 * @param documents - Parsed JSON values (API body, embedded page scripts)
 * @param rawText - Original response body
 */
export function extractPrices(
  documents: readonly unknown[],
  rawText: string,
  bounds: PriceBounds
): PriceExtraction {
  const structured = documents.flatMap((doc) => extractStructuredPrices(doc, bounds))
  if (structured.length > 0) {
    return { prices: structured, method: 'structured' }
  }

  const text = extractTextPrices(rawText, bounds)
  if (text.length > 0) {
    return { prices: text, method: 'text' }
  }

  return { prices: [], method: 'none' }
}

/**
 * Intersect global bounds with an adapter's narrower bounds.
 */
export function effectiveBounds(global: PriceBounds, narrower?: Partial<PriceBounds>): PriceBounds {
  return {
    min: Math.max(global.min, narrower?.min ?? global.min),
    max: Math.min(global.max, narrower?.max ?? global.max),
  }
}
