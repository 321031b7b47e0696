import os from 'os'
import path from 'path'
import * as fse from 'fs-extra'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { backup } from './backup'
import { HubClient } from './hub'
import { readConfig } from './config'
import { ConnectivityError } from './errors'

const { mockRelease } = vi.hoisted(() => ({ mockRelease: vi.fn() }))

vi.mock('./lock', () => ({
  acquireLock: async (destination: string) => ({
    path: `${destination}.lock`,
    release: mockRelease,
  }),
}))

let testDir: string
let destination: string

const unreachableHub: HubClient = {
  baseUrl: 'http://hub.test:8081',
  login: async () => {
    throw new ConnectivityError('POST request to /newLogin failed: ETIMEDOUT')
  },
  fetchListing: async () => '',
  download: async () => Buffer.alloc(0),
}

beforeEach(async () => {
  testDir = await fse.mkdtemp(path.join(os.tmpdir(), 'hubitat-lock-release-'))
  destination = path.join(testDir, 'backups')
  mockRelease.mockRejectedValue(new Error('EBUSY: resource busy or locked'))
  vi.spyOn(console, 'log').mockImplementation(() => undefined)
  vi.spyOn(console, 'error').mockImplementation(() => undefined)
})

afterEach(async () => {
  vi.restoreAllMocks()
  mockRelease.mockReset()
  await fse.remove(testDir)
})

describe('backup lock release', () => {
  it('keeps the run error when the lock cannot be removed', async () => {
    const config = readConfig({
      host: 'hub.test',
      mac: '34:e1:d1:00:11:22',
      destination,
    })

    await expect(backup(config, unreachableHub)).rejects.toThrow(
      'POST request to /newLogin failed: ETIMEDOUT'
    )
    expect(mockRelease).toHaveBeenCalledTimes(1)
    expect(console.error).toHaveBeenCalledWith(
      `Cannot remove lock ${destination}.lock: EBUSY: resource busy or locked`
    )
  })
})
