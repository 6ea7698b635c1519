/**
 * File locks
 *
 * Two layers guard every read-modify-write of a data file:
 * - an in-process mutex per path (serializes callers in this process)
 * - an advisory `<file>.lock` created with O_EXCL, holding an owner token
 *   and expiry; an expired lock is taken over. A lock whose body cannot be
 *   read yet (its owner is between create and write) is only abandoned once
 *   the file itself is older than the TTL.
 *
 * Release only removes the lock file if the token still matches.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, open, readFile, rm, stat } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import { LockTimeoutError } from '../errors.js'
import { tryParseJson } from '../scraper/extract/json-value.js'

const log = loggers.storage

export const DEFAULT_LOCK_TTL_MS = 30_000
export const DEFAULT_LOCK_TIMEOUT_MS = 10_000
const RETRY_INTERVAL_MS = 50

export interface FileLockHandle {
  lockPath: string
  token: string
}

export interface FileLockOptions {
  /** How long to wait for the lock before failing */
  timeoutMs?: number
  /** Age after which another owner's lock is considered abandoned */
  ttlMs?: number
}

const lockFileSchema = z.object({
  token: z.string(),
  pid: z.number(),
  expiresAt: z.number(),
})

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

function parseLockFile(raw: string): z.infer<typeof lockFileSchema> | null {
  const parsed = tryParseJson(raw)
  if (!parsed.ok) return null
  const result = lockFileSchema.safeParse(parsed.value)
  return result.success ? result.data : null
}

function readLockToken(raw: string): string | null {
  return parseLockFile(raw)?.token ?? null
}

function readLockExpiry(raw: string): number | null {
  return parseLockFile(raw)?.expiresAt ?? null
}

async function tryCreateLock(lockPath: string, ttlMs: number): Promise<FileLockHandle | null> {
  const token = randomUUID()
  try {
    const handle = await open(lockPath, 'wx')
    try {
      await handle.writeFile(JSON.stringify({ token, pid: process.pid, expiresAt: Date.now() + ttlMs }))
    } finally {
      await handle.close()
    }
    return { lockPath, token }
  } catch (error) {
    if (isErrnoException(error) && error.code === 'EEXIST') {
      return null
    }
    throw error
  }
}

/**
 * Remove the existing lock file if it has expired, or if it is unreadable
 * and older than the TTL. Returns true if the lock is gone.
 */
async function clearStaleLock(lockPath: string, ttlMs: number): Promise<boolean> {
  let raw: string
  let modifiedMs: number
  try {
    raw = await readFile(lockPath, 'utf8')
    modifiedMs = (await stat(lockPath)).mtimeMs
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return true
    throw error
  }

  const expiresAt = readLockExpiry(raw)
  if (expiresAt !== null && expiresAt > Date.now()) return false
  if (expiresAt === null && Date.now() - modifiedMs < ttlMs) return false

  log.warn('Taking over stale lock', {
    event_name: 'LOCK_STALE_TAKEOVER',
    lockPath,
    reason: expiresAt === null ? 'unreadable' : 'expired',
  })
  await rm(lockPath, { force: true })
  return true
}

export async function acquireFileLock(path: string, options: FileLockOptions = {}): Promise<FileLockHandle> {
  const lockPath = `${path}.lock`
  const timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS
  const ttlMs = options.ttlMs ?? DEFAULT_LOCK_TTL_MS
  const startedAt = Date.now()
  await mkdir(dirname(lockPath), { recursive: true })

  while (true) {
    const handle = await tryCreateLock(lockPath, ttlMs)
    if (handle) return handle

    if (await clearStaleLock(lockPath, ttlMs)) continue

    const waited = Date.now() - startedAt
    if (waited >= timeoutMs) {
      throw new LockTimeoutError(lockPath, waited)
    }
    await sleep(RETRY_INTERVAL_MS)
  }
}

/**
 * Release a lock only if its token matches the current owner.
 */
export async function releaseFileLock(handle: FileLockHandle): Promise<boolean> {
  let raw: string
  try {
    raw = await readFile(handle.lockPath, 'utf8')
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') return false
    throw error
  }

  if (readLockToken(raw) !== handle.token) {
    log.warn('Lock owned by someone else at release', { lockPath: handle.lockPath })
    return false
  }

  await rm(handle.lockPath, { force: true })
  return true
}

// ═══════════════════════════════════════════════════════════════════════════════
// In-process mutex
// ═══════════════════════════════════════════════════════════════════════════════

const tails = new Map<string, Promise<void>>()

async function withMutex<T>(key: string, fn: () => Promise<T>): Promise<T> {
  const previous = tails.get(key) ?? Promise.resolve()
  let release: () => void = () => {}
  const current = new Promise<void>((resolve) => {
    release = resolve
  })
  const tail = previous.then(() => current)
  tails.set(key, tail)

  await previous
  try {
    return await fn()
  } finally {
    release()
    if (tails.get(key) === tail) {
      tails.delete(key)
    }
  }
}

/**
 * Run `fn` while holding both the in-process mutex and the lock file for `path`.
 */
export async function withFileLock<T>(
  path: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  return withMutex(path, async () => {
    const handle = await acquireFileLock(path, options)
    try {
      return await fn()
    } finally {
      await releaseFileLock(handle)
    }
  })
}
