/**
 * JSON value classification
 *
 * Parsed payloads arrive as `unknown`. Classifying each node by kind lets the
 * extractors walk any schema without trusting its shape.
 */

export type JsonNode =
  | { kind: 'object'; entries: Array<[string, unknown]> }
  | { kind: 'array'; items: unknown[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' }

export function classify(value: unknown): JsonNode {
  if (value === null || value === undefined) return { kind: 'null' }
  if (Array.isArray(value)) return { kind: 'array', items: value }

  switch (typeof value) {
    case 'string':
      return { kind: 'string', value }
    case 'number':
      return { kind: 'number', value }
    case 'boolean':
      return { kind: 'boolean', value }
    case 'object':
      return { kind: 'object', entries: Object.entries(value) }
    default:
      // functions, symbols, bigint: not producible by JSON.parse
      return { kind: 'null' }
  }
}

export interface JsonVisitor {
  /** Called for every object entry before descending into it */
  enterEntry?(key: string, value: unknown): void
}

const MAX_DEPTH = 64

/**
 * Depth-first walk over every container in the tree. Nesting deeper than
 * MAX_DEPTH is not visited.
 */
export function walkJson(root: unknown, visitor: JsonVisitor): void {
  const visit = (value: unknown, depth: number): void => {
    if (depth > MAX_DEPTH) return

    const node = classify(value)
    switch (node.kind) {
      case 'object':
        for (const [key, inner] of node.entries) {
          visitor.enterEntry?.(key, inner)
          visit(inner, depth + 1)
        }
        return
      case 'array':
        for (const item of node.items) visit(item, depth + 1)
        return
      default:
        return
    }
  }

  visit(root, 0)
}

/**
 * JSON.parse that reports failure instead of throwing.
 */
export function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(text)
    return { ok: true, value }
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) }
  }
}
