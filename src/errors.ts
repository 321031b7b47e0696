export class HubitatBackupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

// Invalid command-line input
export class ConfigError extends HubitatBackupError {}

// Hub unreachable or timed out, a non-success status, or the MAC token refused
export class ConnectivityError extends HubitatBackupError {}

export class ListingParseError extends HubitatBackupError {}

export class DownloadError extends HubitatBackupError {
  constructor(
    readonly fileName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

export class FilesystemError extends HubitatBackupError {}

export class LockError extends HubitatBackupError {}

/**
 * Wraps an unknown error value with additional context, keeping the original
 * as `cause`.
 */
export const wrapError = <T extends HubitatBackupError>(
  ErrorType: new (message: string, options?: { cause?: unknown }) => T,
  context: string,
  err: unknown
): T =>
  err instanceof Error
    ? new ErrorType(`${context}: ${err.message}`, { cause: err })
    : new ErrorType(`${context}: ${String(err)}`)

export const errorCode = (err: unknown): string | undefined =>
  typeof err === 'object' &&
  err !== null &&
  'code' in err &&
  typeof err.code === 'string'
    ? err.code
    : undefined

export const errorMessage = (err: unknown) =>
  err instanceof Error ? err.message : String(err)
