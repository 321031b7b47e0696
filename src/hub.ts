import got, { Got, HTTPError, RequestError } from 'got'
import * as z from 'zod'
import { Config } from './types'
import { macToken } from './config'
import { ConnectivityError } from './errors'

export interface HubClient {
  readonly baseUrl: string
  login(): Promise<void>
  fetchListing(): Promise<string>
  download(fileName: string): Promise<Buffer>
}

const apiResponseSchema = z.object({ success: z.boolean() }).passthrough()

const describeFailure = (err: unknown) => {
  if (err instanceof HTTPError) {
    const { statusCode, statusMessage } = err.response
    return `${statusCode} ${statusMessage ?? ''}`.trim()
  }
  if (err instanceof RequestError) return err.code ?? err.message
  return err instanceof Error ? err.message : String(err)
}

const isSuccessful = (body: string) => {
  let json: unknown
  try {
    json = JSON.parse(body)
  } catch {
    // Older firmware answers the login with an html page
    return true
  }
  const parsed = apiResponseSchema.safeParse(json)
  return !parsed.success || parsed.data.success
}

export const createHubClient = (
  config: Pick<Config, 'host' | 'mac' | 'port' | 'timeoutSeconds'>
): HubClient => {
  const baseUrl = `http://${config.host}:${config.port}`

  let client: Got = got.extend({
    prefixUrl: baseUrl,
    timeout: config.timeoutSeconds * 1000,
    retry: 0,
  })

  const request = async <T>(
    method: string,
    requestPath: string,
    send: () => Promise<T>
  ) => {
    try {
      return await send()
    } catch (err) {
      throw new ConnectivityError(
        `${method} request to /${requestPath} failed: ${describeFailure(err)}`,
        { cause: err }
      )
    }
  }

  return {
    baseUrl,

    login: async () => {
      console.log(`Signing in to ${baseUrl}`)
      const response = await request('POST', 'newLogin', () =>
        client.post('newLogin', { body: macToken(config.mac) })
      )
      if (!isSuccessful(response.body)) {
        throw new ConnectivityError(
          `POST request to /newLogin not successful: ${response.body}`
        )
      }

      const cookies = (response.headers['set-cookie'] ?? []).map(
        c => c.split(';')[0]
      )
      if (cookies.length > 0) {
        client = client.extend({ headers: { cookie: cookies.join('; ') } })
      }
    },

    fetchListing: () =>
      request('GET', 'api/backups', () => client.get('api/backups').text()),

    download: (fileName: string) => {
      const requestPath = `api/downloadBackup/${encodeURIComponent(fileName)}`
      return request('GET', requestPath, () => client.get(requestPath).buffer())
    },
  }
}
