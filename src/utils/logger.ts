import { pino, type Logger, type DestinationStream } from 'pino'

export type { Logger }

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export function createLogger(level: LogLevel | 'silent' = 'info', destination?: DestinationStream): Logger {
  const options = {
    name: 'g15keys',
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  }
  return destination ? pino(options, destination) : pino(options)
}

/**
 * Child logger tagged with the component that owns it
 */
export function componentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component })
}
