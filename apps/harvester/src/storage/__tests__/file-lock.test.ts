import { mkdtemp, readFile, readdir, rm, utimes, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { acquireFileLock, releaseFileLock, withFileLock } from '../file-lock.js'
import { readTextIfExists, writeJsonAtomic } from '../json-file.js'
import { LockTimeoutError } from '../../errors.js'

describe('file locks', () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'file-lock-'))
    path = join(dir, 'data.json')
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('creates and removes the lock file', async () => {
    const handle = await acquireFileLock(path)
    expect(await readdir(dir)).toEqual(['data.json.lock'])

    expect(await releaseFileLock(handle)).toBe(true)
    expect(await readdir(dir)).toEqual([])
  })

  it('times out while another owner holds a live lock', async () => {
    const handle = await acquireFileLock(path, { ttlMs: 60_000 })

    await expect(acquireFileLock(path, { timeoutMs: 120 })).rejects.toBeInstanceOf(LockTimeoutError)

    await releaseFileLock(handle)
  })

  it('takes over an expired lock', async () => {
    await writeFile(`${path}.lock`, JSON.stringify({ token: 'old-owner', pid: 1, expiresAt: Date.now() - 1000 }))

    const handle = await acquireFileLock(path, { timeoutMs: 200 })
    const contents: unknown = JSON.parse(await readFile(`${path}.lock`, 'utf8'))

    expect(contents).toMatchObject({ token: handle.token })
    await releaseFileLock(handle)
  })

  it('waits on a freshly created lock whose owner has not written it yet', async () => {
    await writeFile(`${path}.lock`, '')

    await expect(acquireFileLock(path, { timeoutMs: 150, ttlMs: 60_000 })).rejects.toBeInstanceOf(LockTimeoutError)
    expect(await readFile(`${path}.lock`, 'utf8')).toBe('')
  })

  it('takes over an unreadable lock once it is older than the ttl', async () => {
    await writeFile(`${path}.lock`, '')
    const old = new Date(Date.now() - 120_000)
    await utimes(`${path}.lock`, old, old)

    const handle = await acquireFileLock(path, { timeoutMs: 200, ttlMs: 60_000 })

    expect(await readFile(`${path}.lock`, 'utf8')).toContain(handle.token)
    await releaseFileLock(handle)
  })

  it('does not release a lock it no longer owns', async () => {
    const handle = await acquireFileLock(path)
    await writeFile(`${path}.lock`, JSON.stringify({ token: 'someone-else', pid: 1, expiresAt: Date.now() + 60_000 }))

    expect(await releaseFileLock(handle)).toBe(false)
    expect(await readdir(dir)).toEqual(['data.json.lock'])
  })

  it('runs callers one at a time', async () => {
    const order: string[] = []
    const task = (name: string) =>
      withFileLock(path, async () => {
        order.push(`${name}:start`)
        await new Promise((resolve) => setTimeout(resolve, 10))
        order.push(`${name}:end`)
      })

    await Promise.all([task('a'), task('b')])

    expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end'])
  })

  it('releases the lock when the callback throws', async () => {
    await expect(
      withFileLock(path, async () => {
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    expect(await readdir(dir)).toEqual([])
  })
})

describe('writeJsonAtomic', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'json-file-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('writes pretty JSON and leaves no temp files behind', async () => {
    const path = join(dir, 'nested', 'doc.json')
    await writeJsonAtomic(path, { a: 1 })

    expect(await readTextIfExists(path)).toBe('{\n  "a": 1\n}\n')
    expect(await readdir(join(dir, 'nested'))).toEqual(['doc.json'])
  })

  it('reads a missing file as null', async () => {
    expect(await readTextIfExists(join(dir, 'absent.json'))).toBeNull()
  })
})
