import * as z from 'zod'

export const DIAGNOSTIC_PORT = 8081
export const DEFAULT_MAX_AGE_DAYS = 90
export const DEFAULT_TIMEOUT_SECONDS = 30

const macAddressSchema = z
  .string()
  .trim()
  .regex(
    /^[0-9a-f]{2}([:-]?[0-9a-f]{2}){5}$/i,
    'must be a MAC address such as 34:e1:d1:00:11:22'
  )

export const configSchema = z.object({
  host: z.string().trim().min(1, 'must not be empty'),
  mac: macAddressSchema,
  destination: z.string().min(1, 'must not be empty'),
  maxAgeDays: z.number().int().nonnegative().default(DEFAULT_MAX_AGE_DAYS),
  timeoutSeconds: z.number().int().positive().default(DEFAULT_TIMEOUT_SECONDS),
  port: z.number().int().min(1).max(65535).default(DIAGNOSTIC_PORT),
})

export type ConfigInput = z.input<typeof configSchema>

export type Config = z.infer<typeof configSchema>

export interface BackupFilename {
  name: string
  // UTC midnight of the day embedded in the name
  date: Date
  version: string
}

export interface FailedDownload {
  name: string
  error: string
}

export interface SyncResult {
  downloaded: string[]
  skipped: string[]
  failed: FailedDownload[]
}

export interface BackupResult extends SyncResult {
  removed: string[]
}
