import pino, { type Logger, type TransportTargetOptions } from 'pino'
import type { LoggingConfig } from '../schemas/migrator-config.js'

export type { Logger } from 'pino'

export interface CreateLoggerOptions {
  /** Absolute path of the durable log file. Overrides `config.file`. */
  filePath?: string | null
}

const STDERR = 2

/**
 * Console logs go to stderr so stdout stays free for the operator prompt.
 * When a file is configured, a `pino/file` target writes the durable copy.
 */
export function createLogger(
  config: LoggingConfig,
  options?: CreateLoggerOptions,
): Logger {
  const usePretty =
    config.pretty || process.env.NODE_ENV !== 'production'
  const filePath =
    options?.filePath !== undefined ? options.filePath : config.file

  if (!filePath && !usePretty) {
    return pino({ level: config.level }, pino.destination(STDERR))
  }

  const targets: TransportTargetOptions[] = [
    usePretty
      ? { target: 'pino-pretty', level: config.level, options: { destination: STDERR } }
      : { target: 'pino/file', level: config.level, options: { destination: STDERR } },
  ]
  if (filePath) {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: filePath, mkdir: true },
    })
  }

  return pino({ level: config.level, transport: { targets } })
}
