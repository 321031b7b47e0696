import path from 'path'
import * as fse from 'fs-extra'
import { BackupFilename, BackupResult, Config, SyncResult } from './types'
import { HubClient, createHubClient } from './hub'
import { parseBackupFilename, parseListing } from './listing'
import { removeOldBackups } from './retention'
import { acquireLock } from './lock'
import {
  DownloadError,
  FilesystemError,
  ListingParseError,
  errorMessage,
  wrapError,
} from './errors'

// Any entry holding a backup's name counts, directories and symlinks too
const listLocalBackups = async (destination: string) => {
  const names = await fse.readdir(destination).catch((err: unknown) => {
    throw wrapError(FilesystemError, `Cannot read ${destination}`, err)
  })
  return new Set(names.filter(name => parseBackupFilename(name)))
}

const writeBackupFile = async (
  destination: string,
  name: string,
  content: Buffer
) => {
  const target = path.join(destination, name)
  const partial = path.join(destination, `.${name}.partial`)
  try {
    await fse.writeFile(partial, content)
    await fse.move(partial, target, { overwrite: false })
  } catch (err) {
    await fse.remove(partial).catch((cleanupErr: unknown) => {
      console.error(`Cannot remove ${partial}: ${errorMessage(cleanupErr)}`)
    })
    throw wrapError(FilesystemError, `Cannot write ${target}`, err)
  }
}

/**
 * Downloads every listed backup that is not in `destination` yet. A file that
 * already exists is never fetched again, whatever its content. A failed
 * download is recorded and the remaining files are still attempted.
 */
export const downloadNewBackups = async (
  hub: HubClient,
  destination: string,
  remote: BackupFilename[]
): Promise<SyncResult> => {
  const local = await listLocalBackups(destination)
  const result: SyncResult = { downloaded: [], skipped: [], failed: [] }

  for (const { name } of remote) {
    if (local.has(name)) {
      console.log(`Skipping already downloaded backup file: ${name}`)
      result.skipped.push(name)
      continue
    }

    let content: Buffer
    try {
      content = await hub.download(name)
    } catch (err) {
      const failure = new DownloadError(
        name,
        `Failed to download ${name}: ${errorMessage(err)}`,
        { cause: err }
      )
      console.error(failure.message)
      result.failed.push({ name, error: failure.message })
      continue
    }

    console.log(`Downloading backup file: ${name}`)
    await writeBackupFile(destination, name, content)
    local.add(name)
    result.downloaded.push(name)
  }

  return result
}

export const backup = async (
  config: Config,
  hub: HubClient = createHubClient(config)
): Promise<BackupResult> => {
  const { destination, maxAgeDays } = config
  console.log(
    `Downloading backup files to ${destination}, ` +
      `removing files older than ${maxAgeDays} days`
  )

  await fse.ensureDir(destination).catch((err: unknown) => {
    throw wrapError(FilesystemError, `Cannot create ${destination}`, err)
  })

  const lock = await acquireLock(destination)
  try {
    await hub.login()
    const remote = parseListing(await hub.fetchListing())
    if (remote.length === 0) {
      throw new ListingParseError(
        'No backups found. Make sure backups are enabled on ' +
          `http://${config.host}/hub/backup`
      )
    }

    const synced = await downloadNewBackups(hub, destination, remote)
    const removed = await removeOldBackups(destination, maxAgeDays)
    return { ...synced, removed }
  } finally {
    await lock.release().catch((err: unknown) => {
      console.error(`Cannot remove lock ${lock.path}: ${errorMessage(err)}`)
    })
  }
}
