import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { z } from 'zod'
import { ConfigError, getErrorCode, getErrorMessage } from './error'

export type ConfigEnv = Record<string, string | undefined>

export const TOKEN_URL = 'https://readwise.io/access_token'

const DEFAULT_API_URL = 'https://readwise.io/api/v3'
const DEFAULT_AUTH_URL = 'https://readwise.io/api/v2/auth/'
const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_LOG_LEVEL = 'info'

export const NO_TOKEN_MESSAGE = [
  'no token found. Set it with: reader config set-token <token>',
  'Or set READWISE_TOKEN environment variable',
  `Get your token from: ${TOKEN_URL}`,
].join('\n')

const configSchema = z.object({
  token: z.string().optional(),
})

export type ReaderConfig = z.infer<typeof configSchema>

export type ReaderSettings = {
  apiUrl: string
  authUrl: string
  timeoutMs: number
  logFile: string
  logLevel: string
}

const timeoutSchema = z.coerce.number().int().positive()

export const configDir = (env: ConfigEnv = process.env) =>
  env.READER_CONFIG_DIR || join(homedir(), '.config', 'reader-tui')

export const configPath = (env: ConfigEnv = process.env) => join(configDir(env), 'config.json')

export const loadConfig = async (env: ConfigEnv = process.env): Promise<ReaderConfig> => {
  let text: string
  try {
    text = await readFile(configPath(env), 'utf8')
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return {}
    throw new ConfigError(`failed to read config file: ${getErrorMessage(error)}`, { cause: error })
  }

  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`failed to parse config file: ${getErrorMessage(error)}`, { cause: error })
  }

  const parsed = configSchema.safeParse(data)
  if (!parsed.success) {
    throw new ConfigError('failed to parse config file: expected an object with a string "token"')
  }
  return parsed.data
}

export const saveConfig = async (config: ReaderConfig, env: ConfigEnv = process.env) => {
  const path = configPath(env)
  try {
    await mkdir(dirname(path), { recursive: true, mode: 0o700 })
    await writeFile(path, `${JSON.stringify(config, null, 2)}\n`, { mode: 0o600 })
  } catch (error) {
    throw new ConfigError(`failed to write config file: ${getErrorMessage(error)}`, { cause: error })
  }
  return path
}

export const setToken = async (token: string, env: ConfigEnv = process.env) => {
  const trimmed = token.trim()
  if (!trimmed) throw new ConfigError('token must not be empty')
  const config = await loadConfig(env)
  return saveConfig({ ...config, token: trimmed }, env)
}

// READWISE_TOKEN wins over the saved token.
export const resolveToken = async (env: ConfigEnv = process.env) => {
  const fromEnv = env.READWISE_TOKEN?.trim()
  if (fromEnv) return fromEnv
  const config = await loadConfig(env)
  const saved = config.token?.trim()
  if (!saved) throw new ConfigError(NO_TOKEN_MESSAGE)
  return saved
}

export const resolveSettings = (env: ConfigEnv = process.env): ReaderSettings => {
  const timeout = timeoutSchema.safeParse(env.READER_TIMEOUT_MS)
  return {
    apiUrl: (env.READER_API_URL || DEFAULT_API_URL).replace(/\/+$/, ''),
    authUrl: DEFAULT_AUTH_URL,
    timeoutMs: env.READER_TIMEOUT_MS && timeout.success ? timeout.data : DEFAULT_TIMEOUT_MS,
    logFile: env.READER_LOG_FILE || join(configDir(env), 'reader.log'),
    logLevel: env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  }
}
