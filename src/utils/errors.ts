import { ZodError } from 'zod'

export class AppError extends Error {
  constructor(
    public code: string,
    message: string,
    public details?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONFIG_ERROR', message, details)
    this.name = 'ConfigError'
  }

  static fromZod(path: string, error: ZodError): ConfigError {
    return new ConfigError(
      `Invalid configuration in ${path}`,
      error.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    )
  }
}

/**
 * The daemon answered with something other than the expected greeting.
 * Fatal on the first connection of the process.
 */
export class HandshakeError extends AppError {
  constructor(public received: Buffer) {
    super('HANDSHAKE_ERROR', `Wrong daemon greeting: ${JSON.stringify(received.toString('latin1'))}`)
    this.name = 'HandshakeError'
  }
}

export class ConnectionError extends AppError {
  constructor(message: string, details?: unknown) {
    super('CONNECTION_ERROR', message, details)
    this.name = 'ConnectionError'
  }
}

export class ProtocolError extends AppError {
  constructor(message: string, details?: unknown) {
    super('PROTOCOL_ERROR', message, details)
    this.name = 'ProtocolError'
  }
}

export const ExitCode = {
  Ok: 0,
  Failure: 1,
  Handshake: 3,
  Config: 4,
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
