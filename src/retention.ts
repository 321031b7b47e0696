import path from 'path'
import * as fse from 'fs-extra'
import { parseBackupFilename } from './listing'
import { FilesystemError, wrapError } from './errors'

const DAY_MS = 24 * 60 * 60 * 1000

// Whole calendar days between the backup's date and the local date of `now`
export const backupAgeInDays = (date: Date, now: Date) => {
  const today = Date.UTC(now.getFullYear(), now.getMonth(), now.getDate())
  return Math.round((today - date.getTime()) / DAY_MS)
}

/**
 * Deletes backups whose embedded date is more than `maxAgeDays` days old.
 * Files that do not look like backups are never touched.
 */
export const removeOldBackups = async (
  destination: string,
  maxAgeDays: number,
  now = new Date()
): Promise<string[]> => {
  const entries = await fse
    .readdir(destination, { withFileTypes: true })
    .catch((err: unknown) => {
      throw wrapError(FilesystemError, `Cannot read ${destination}`, err)
    })

  const removed: string[] = []
  for (const entry of entries) {
    if (!entry.isFile()) continue
    const backup = parseBackupFilename(entry.name)
    if (!backup) continue

    const age = backupAgeInDays(backup.date, now)
    if (age <= maxAgeDays) continue

    console.log(`Removing old backup file: ${backup.name} - ${age} days old`)
    try {
      await fse.remove(path.join(destination, backup.name))
    } catch (err) {
      throw wrapError(FilesystemError, `Cannot remove ${backup.name}`, err)
    }
    removed.push(backup.name)
  }
  return removed
}
