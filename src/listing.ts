import { BackupFilename } from './types'

// <YYYY-MM-DD>~<version>.lzf, e.g. 2024-03-01~2.3.8.139.lzf
const BACKUP_NAME = String.raw`(\d{4})-(\d{2})-(\d{2})~([\w.-]+?)\.lzf`

const BACKUP_NAME_IN_TEXT = new RegExp(
  String.raw`(?<![\w.~-])${BACKUP_NAME}(?![\w.~-])`,
  'g'
)
const BACKUP_NAME_EXACT = new RegExp(`^${BACKUP_NAME}$`)

const toBackupFilename = (
  match: RegExpMatchArray
): BackupFilename | undefined => {
  const [name, year, month, day, version] = match
  if (!name || !year || !month || !day || !version) return undefined

  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
  // Rejects days that roll over, such as 2024-02-30
  if (
    date.getUTCFullYear() !== Number(year) ||
    date.getUTCMonth() !== Number(month) - 1 ||
    date.getUTCDate() !== Number(day)
  )
    return undefined

  return { name, date, version }
}

export const parseBackupFilename = (
  name: string
): BackupFilename | undefined => {
  const match = name.match(BACKUP_NAME_EXACT)
  return match ? toBackupFilename(match) : undefined
}

/**
 * Extracts backup file names from a listing body. The body is treated as
 * plain text, so the HTML page and the JSON api both work. Duplicates are
 * dropped, keeping first-seen order.
 */
export const parseListing = (body: string): BackupFilename[] => {
  const byName = new Map<string, BackupFilename>()
  for (const match of body.matchAll(BACKUP_NAME_IN_TEXT)) {
    const backup = toBackupFilename(match)
    if (backup && !byName.has(backup.name)) byName.set(backup.name, backup)
  }
  return Array.from(byName.values())
}
