import { mkdtemp, readFile, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { runCli, USAGE, type CliIO } from './cli'
import { ConfigError } from './shared/lib/error'
import { NO_TOKEN_MESSAGE, setToken } from './shared/lib/config'

describe('runCli', () => {
  let dir: string
  let io: CliIO & { out: Mock<(text: string) => void>; err: Mock<(text: string) => void> }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reader-cli-'))
    io = {
      out: vi.fn<(text: string) => void>(),
      err: vi.fn<(text: string) => void>(),
      env: { READER_CONFIG_DIR: dir },
      run: vi.fn(async () => {}),
    }
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('prints usage for help', async () => {
    for (const flag of ['help', '--help', '-h']) {
      await expect(runCli([flag], io)).resolves.toBe(0)
    }
    expect(io.out).toHaveBeenCalledTimes(3)
    expect(io.out).toHaveBeenLastCalledWith(USAGE)
    expect(io.err).not.toHaveBeenCalled()
  })

  it('rejects unknown commands', async () => {
    await expect(runCli(['sync'], io)).resolves.toBe(1)

    expect(io.err).toHaveBeenCalledWith("Error: unknown command 'sync'\n")
    expect(io.out).toHaveBeenCalledWith(USAGE)
  })

  it('requires a config subcommand', async () => {
    await expect(runCli(['config'], io)).resolves.toBe(1)
    await expect(runCli(['config', 'wipe'], io)).resolves.toBe(1)

    expect(io.err.mock.calls).toEqual([
      ['Error: config command requires a subcommand\n'],
      ["Error: unknown config subcommand 'wipe'\n"],
    ])
  })

  it('saves the token to the config file', async () => {
    await expect(runCli(['config', 'set-token', 'test-token'], io)).resolves.toBe(0)

    const path = join(dir, 'config.json')
    expect(io.out).toHaveBeenCalledWith(`Token saved to ${path}`)
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual({ token: 'test-token' })
  })

  it('requires a token argument', async () => {
    await expect(runCli(['config', 'set-token'], io)).resolves.toBe(1)

    expect(io.err).toHaveBeenCalledWith('Error: set-token requires a token argument\n')
  })

  it('reports a blank token', async () => {
    await expect(runCli(['config', 'set-token', '  '], io)).resolves.toBe(1)

    expect(io.err).toHaveBeenCalledWith('Error setting token: token must not be empty')
  })

  it('tells where the token comes from without printing it', async () => {
    await setToken('test-token', io.env)

    await expect(runCli(['config', 'get-token'], io)).resolves.toBe(0)
    expect(io.out).toHaveBeenCalledWith(`Token is saved in ${join(dir, 'config.json')}`)

    io.env = { ...io.env, READWISE_TOKEN: 'env-token' }
    await expect(runCli(['config', 'get-token'], io)).resolves.toBe(0)
    expect(io.out).toHaveBeenLastCalledWith('Token is set by the READWISE_TOKEN environment variable.')
  })

  it('explains how to get a token when none is set', async () => {
    await expect(runCli(['config', 'get-token'], io)).resolves.toBe(1)

    expect(io.err).toHaveBeenCalledWith(NO_TOKEN_MESSAGE)
  })

  it('starts the reader without arguments', async () => {
    await expect(runCli([], io)).resolves.toBe(0)

    expect(io.run).toHaveBeenCalledWith(io.env)
  })

  it('exits with an error when the reader cannot start', async () => {
    io.run = vi.fn(async () => {
      throw new ConfigError(NO_TOKEN_MESSAGE)
    })

    await expect(runCli([], io)).resolves.toBe(1)
    expect(io.err).toHaveBeenCalledWith(`Error: ${NO_TOKEN_MESSAGE}`)
  })
})
