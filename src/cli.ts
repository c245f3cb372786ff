import { configPath, loadConfig, NO_TOKEN_MESSAGE, setToken, TOKEN_URL, type ConfigEnv } from './shared/lib/config'
import { getErrorMessage } from './shared/lib/error'

export type CliIO = {
  out: (text: string) => void
  err: (text: string) => void
  env: ConfigEnv
  run: (env: ConfigEnv) => Promise<void>
}

export const USAGE = [
  'reader - Terminal user-interface for Readwise Reader',
  '',
  'Usage:',
  '  reader                           Start the reader',
  '  reader config set-token <token>  Save your Readwise access token',
  '  reader config get-token          Show where the access token comes from',
  '  reader help                      Show this help',
  '',
  `Get your token from: ${TOKEN_URL}`,
].join('\n')

const fail = (io: CliIO, message: string) => {
  io.err(`Error: ${message}\n`)
  io.out(USAGE)
  return 1
}

const getToken = async (io: CliIO) => {
  if (io.env.READWISE_TOKEN?.trim()) {
    io.out('Token is set by the READWISE_TOKEN environment variable.')
    return 0
  }
  const config = await loadConfig(io.env)
  if (config.token?.trim()) {
    io.out(`Token is saved in ${configPath(io.env)}`)
    return 0
  }
  io.err(NO_TOKEN_MESSAGE)
  return 1
}

const runConfig = async (args: string[], io: CliIO) => {
  const [subcommand, token] = args
  if (!subcommand) return fail(io, 'config command requires a subcommand')

  switch (subcommand) {
    case 'set-token': {
      if (token === undefined) return fail(io, 'set-token requires a token argument')
      try {
        const path = await setToken(token, io.env)
        io.out(`Token saved to ${path}`)
        return 0
      } catch (error) {
        io.err(`Error setting token: ${getErrorMessage(error)}`)
        return 1
      }
    }
    case 'get-token':
      try {
        return await getToken(io)
      } catch (error) {
        io.err(`Error: ${getErrorMessage(error)}`)
        return 1
      }
    default:
      return fail(io, `unknown config subcommand '${subcommand}'`)
  }
}

// Resolves to the process exit code.
export const runCli = async (argv: string[], io: CliIO): Promise<number> => {
  const [command, ...rest] = argv

  if (command === undefined) {
    try {
      await io.run(io.env)
      return 0
    } catch (error) {
      io.err(`Error: ${getErrorMessage(error)}`)
      return 1
    }
  }

  switch (command) {
    case 'config':
      return runConfig(rest, io)
    case 'help':
    case '--help':
    case '-h':
      io.out(USAGE)
      return 0
    default:
      return fail(io, `unknown command '${command}'`)
  }
}
