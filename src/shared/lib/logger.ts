import pino from 'pino'
import type { Logger } from 'pino'

export type { Logger }

type LoggerOptions = {
  file: string
  level: string
}

/**
 * File-backed logger. The terminal is owned by the painted frame, so log
 * lines never go to stdout or stderr while the reader is running.
 */
export const createLogger = ({ file, level }: LoggerOptions): Logger =>
  pino(
    {
      level,
      base: { service: 'reader-tui' },
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: file, mkdir: true, sync: true }),
  )

export const createSilentLogger = (): Logger => pino({ level: 'silent' })
