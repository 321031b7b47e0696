import path from 'path'
import { Config, ConfigInput, configSchema } from './types'
import { ConfigError } from './errors'

export const readConfig = (input: ConfigInput): Config => {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map(
      issue => `${issue.path.join('.') || 'config'} ${issue.message}`
    )
    throw new ConfigError(`Invalid arguments: ${issues.join('; ')}`)
  }
  return {
    ...result.data,
    destination: path.resolve(result.data.destination),
  }
}

// The diagnostic endpoint takes the bare hex digits, upper-cased
export const macToken = (mac: string) =>
  mac.replace(/[^0-9a-f]/gi, '').toUpperCase()
