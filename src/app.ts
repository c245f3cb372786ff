import {
  createReaderApi,
  createReaderState,
  createRichRenderer,
  renderView,
  shouldUseColor,
  type FetchLike,
} from './features/reader'
import { resolveSettings, resolveToken, type ConfigEnv } from './shared/lib/config'
import { createLogger } from './shared/lib/logger'
import { createTerminalHost, type TerminalHost } from './shared/lib/terminal'

export type ReaderAppOptions = {
  env?: ConfigEnv
  host?: TerminalHost
  fetch?: FetchLike
  color?: boolean
}

/**
 * Runs the interactive reader until the user quits. Rejects before touching
 * the terminal when no token is configured.
 */
export const startReader = async ({
  env = process.env,
  host = createTerminalHost(),
  fetch,
  color = shouldUseColor(env, Boolean(process.stdout.isTTY)),
}: ReaderAppOptions = {}) => {
  const token = await resolveToken(env)
  const settings = resolveSettings(env)
  const logger = createLogger({ file: settings.logFile, level: settings.logLevel })
  const api = createReaderApi({
    token,
    baseUrl: settings.apiUrl,
    authUrl: settings.authUrl,
    timeoutMs: settings.timeoutMs,
    fetch,
  })
  const renderer = createRichRenderer({ color })

  logger.info({ apiUrl: settings.apiUrl }, 'reader started')

  return new Promise<void>((resolve) => {
    let unsubscribe = () => {}
    const store = createReaderState(
      {
        source: api,
        renderMarkdown: renderer.render,
        logger,
        onQuit: () => {
          unsubscribe()
          host.stop()
          logger.info('reader stopped')
          resolve()
        },
      },
      host.size(),
    )

    host.start(store.dispatch)
    unsubscribe = store.subscribe((state) => host.paint(renderView(state, { color })))
    store.start()
  })
}
