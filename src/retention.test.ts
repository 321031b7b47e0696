import os from 'os'
import path from 'path'
import * as fse from 'fs-extra'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { backupAgeInDays, removeOldBackups } from './retention'
import { FilesystemError } from './errors'

// Noon local time, 1 April 2024
const NOW = new Date(2024, 3, 1, 12)

let destination: string

const writeFiles = async (...names: string[]) => {
  for (const name of names) {
    await fse.writeFile(path.join(destination, name), 'backup bytes')
  }
}

const listFiles = async () => (await fse.readdir(destination)).sort()

beforeEach(async () => {
  destination = await fse.mkdtemp(path.join(os.tmpdir(), 'hubitat-retention-'))
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
})

afterEach(async () => {
  vi.restoreAllMocks()
  await fse.remove(destination)
})

describe('backupAgeInDays', () => {
  it('counts calendar days across a leap february', () => {
    expect(backupAgeInDays(new Date(Date.UTC(2024, 0, 2)), NOW)).toBe(90)
    expect(backupAgeInDays(new Date(Date.UTC(2024, 0, 1)), NOW)).toBe(91)
  })

  it('is zero for a backup taken today', () => {
    expect(backupAgeInDays(new Date(Date.UTC(2024, 3, 1)), NOW)).toBe(0)
  })
})

describe('removeOldBackups', () => {
  it('keeps a backup at the limit and removes one a day older', async () => {
    await writeFiles('2024-01-01~1.lzf', '2024-01-02~1.lzf', '2024-03-31~1.lzf')

    const removed = await removeOldBackups(destination, 90, NOW)

    expect(removed).toEqual(['2024-01-01~1.lzf'])
    expect(await listFiles()).toEqual(['2024-01-02~1.lzf', '2024-03-31~1.lzf'])
  })

  it('logs each removal with its age', async () => {
    await writeFiles('2024-01-01~1.lzf')

    await removeOldBackups(destination, 90, NOW)

    expect(console.log).toHaveBeenCalledWith(
      'Removing old backup file: 2024-01-01~1.lzf - 91 days old'
    )
  })

  it('never touches files that are not backups', async () => {
    await writeFiles('notes.txt', '2001-01-01.lzf', 'old~backup.lzf')

    const removed = await removeOldBackups(destination, 0, NOW)

    expect(removed).toEqual([])
    expect(await listFiles()).toEqual([
      '2001-01-01.lzf',
      'notes.txt',
      'old~backup.lzf',
    ])
  })

  it('ignores directories named like backups', async () => {
    await fse.mkdir(path.join(destination, '2001-01-01~1.lzf'))

    const removed = await removeOldBackups(destination, 90, NOW)

    expect(removed).toEqual([])
    expect(await listFiles()).toEqual(['2001-01-01~1.lzf'])
  })

  it('removes everything before today with a zero day window', async () => {
    await writeFiles('2024-03-31~1.lzf', '2024-04-01~1.lzf')

    const removed = await removeOldBackups(destination, 0, NOW)

    expect(removed).toEqual(['2024-03-31~1.lzf'])
    expect(await listFiles()).toEqual(['2024-04-01~1.lzf'])
  })

  it('fails with a filesystem error for a missing directory', async () => {
    await expect(
      removeOldBackups(path.join(destination, 'missing'), 90, NOW)
    ).rejects.toBeInstanceOf(FilesystemError)
  })
})
