import { describe, expect, it } from 'vitest'
import { classify, tryParseJson, walkJson } from '../json-value.js'

describe('classify', () => {
  it('tags each JSON kind', () => {
    expect(classify({ a: 1 })).toEqual({ kind: 'object', entries: [['a', 1]] })
    expect(classify([1])).toEqual({ kind: 'array', items: [1] })
    expect(classify('x')).toEqual({ kind: 'string', value: 'x' })
    expect(classify(undefined)).toEqual({ kind: 'null' })
  })
})

describe('walkJson', () => {
  it('visits object entries depth-first, through arrays', () => {
    const keys: string[] = []

    walkJson({ a: { b: 1 }, list: [{ c: 2 }, { d: 3 }] }, {
      enterEntry(key) {
        keys.push(key)
      },
    })

    expect(keys).toEqual(['a', 'b', 'list', 'c', 'd'])
  })

  it('stops descending past the depth limit', () => {
    let root: unknown = 1
    for (let i = 0; i < 100; i += 1) {
      root = { a: root }
    }
    let entries = 0

    walkJson(root, {
      enterEntry() {
        entries += 1
      },
    })

    expect(entries).toBe(65)
  })
})

describe('tryParseJson', () => {
  it('reports failure instead of throwing', () => {
    expect(tryParseJson('{"a":1}')).toEqual({ ok: true, value: { a: 1 } })
    expect(tryParseJson('{').ok).toBe(false)
  })
})
