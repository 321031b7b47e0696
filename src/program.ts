import path from 'path'
import * as fse from 'fs-extra'
import * as z from 'zod'
import { Command, InvalidArgumentError } from 'commander'
import { readConfig } from './config'
import { backup } from './backup'
import {
  BackupResult,
  Config,
  DEFAULT_MAX_AGE_DAYS,
  DEFAULT_TIMEOUT_SECONDS,
} from './types'

const packageSchema = z.object({ version: z.string() })

const readVersion = () =>
  packageSchema.parse(
    fse.readJSONSync(path.join(__dirname, '..', 'package.json'))
  ).version

const parseInteger = (value: string) => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.')
  }
  return parsed
}

export type BackupAction = (config: Config) => Promise<BackupResult>

export const createProgram = (run: BackupAction = backup) => {
  const program = new Command()

  program
    .name('hubitat-backup')
    .version(readVersion())
    .description(
      'Download Hubitat hub backups into a local directory and remove old ' +
        'ones. Meant to run from cron.'
    )
    .argument('<ip>', 'ip address or host name of the hub')
    .argument(
      '<mac>',
      'MAC address of the hub, used to sign in to its diagnostic tool'
    )
    .argument(
      '<destination>',
      'directory to store backups in, created if missing'
    )
    .option(
      '-a, --max-age-days <days>',
      'remove backups older than this many days',
      parseInteger,
      DEFAULT_MAX_AGE_DAYS
    )
    .option(
      '-t, --timeout <seconds>',
      'give up on a request to the hub after this many seconds',
      parseInteger,
      DEFAULT_TIMEOUT_SECONDS
    )
    .action(
      async (
        host: string,
        mac: string,
        destination: string,
        options: { maxAgeDays: number; timeout: number }
      ) => {
        const config = readConfig({
          host,
          mac,
          destination,
          maxAgeDays: options.maxAgeDays,
          timeoutSeconds: options.timeout,
        })

        const { downloaded, skipped, removed, failed } = await run(config)
        console.log(
          `Done: ${downloaded.length} downloaded, ` +
            `${skipped.length} already present, ${removed.length} removed`
        )
        if (failed.length > 0) {
          const names = failed.map(f => f.name).join(', ')
          console.error(
            `${failed.length} backup(s) could not be downloaded: ${names}`
          )
          process.exitCode = 1
        }
      }
    )

  return program
}
