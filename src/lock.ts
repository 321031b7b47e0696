import * as fse from 'fs-extra'
import * as z from 'zod'
import { LockError, errorCode, errorMessage } from './errors'

const LOCK_STALE_MS = 30 * 60 * 1000

const lockDataSchema = z.object({
  pid: z.number().int(),
  startedAt: z.string().datetime(),
})

export interface LockHandle {
  readonly path: string
  release(): Promise<void>
}

// Sits beside the destination, never inside it
export const getLockPath = (destination: string) => `${destination}.lock`

const isPidAlive = (pid: number) => {
  try {
    process.kill(pid, 0)
    return true
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === 'EPERM'
  }
}

const isLockStale = async (lockPath: string) => {
  let raw: unknown
  try {
    raw = await fse.readJson(lockPath)
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return true
    // Unreadable or half-written lock file
    return err instanceof SyntaxError
  }
  const parsed = lockDataSchema.safeParse(raw)
  if (!parsed.success) return true
  if (isPidAlive(parsed.data.pid)) return false
  return Date.now() - new Date(parsed.data.startedAt).getTime() >= LOCK_STALE_MS
}

const alreadyRunning = (lockPath: string) =>
  new LockError(
    'Another backup into this destination is already running. ' +
      `If not, delete ${lockPath} and retry.`
  )

const writeLockFile = (lockPath: string, content: string) =>
  fse.writeFile(lockPath, content, { encoding: 'utf8', flag: 'wx' })

/**
 * Takes an exclusive lock on a destination directory so two runs never race
 * on the existence check and the retention sweep. A lock left behind by a
 * dead process is reclaimed once it is older than 30 minutes.
 */
export const acquireLock = async (destination: string): Promise<LockHandle> => {
  const lockPath = getLockPath(destination)
  const content = JSON.stringify({
    pid: process.pid,
    startedAt: new Date().toISOString(),
  })

  try {
    await writeLockFile(lockPath, content)
  } catch (err) {
    if (errorCode(err) !== 'EEXIST') {
      throw new LockError(
        `Cannot create lock at ${lockPath}: ${errorMessage(err)}`,
        { cause: err }
      )
    }
    if (!(await isLockStale(lockPath))) throw alreadyRunning(lockPath)

    await fse.remove(lockPath)
    try {
      await writeLockFile(lockPath, content)
    } catch (retryErr) {
      // Another run reclaimed the stale lock first
      if (errorCode(retryErr) === 'EEXIST') throw alreadyRunning(lockPath)
      throw new LockError(
        `Cannot create lock at ${lockPath}: ${errorMessage(retryErr)}`,
        { cause: retryErr }
      )
    }
  }

  return {
    path: lockPath,
    release: () => fse.remove(lockPath),
  }
}
