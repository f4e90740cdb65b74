/**
 * Environment variable handling for g15keys
 * Provides type-safe access to environment configuration with defaults
 */

import {
  DEFAULT_DAEMON_HOST,
  DEFAULT_DAEMON_PORT,
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_SCREEN_TYPE,
  isScreenType,
  type ScreenType,
} from '../protocol/constants.js'
import type { LogLevel } from '../utils/logger.js'

export interface EnvConfig {
  // Daemon connection
  daemonHost: string
  daemonPort: number
  screenType: ScreenType
  reconnectDelayMs: number

  logLevel: LogLevel

  // Paths
  configPath?: string
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

/**
 * Parse a string to a non-negative integer with a default value
 */
function parseIntWithDefault(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue
  const parsed = parseInt(value, 10)
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed
}

/**
 * Validate log level string
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.toLowerCase()
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info'
}

function parseScreenType(value: string | undefined): ScreenType {
  return value && isScreenType(value) ? value : DEFAULT_SCREEN_TYPE
}

/**
 * Get environment configuration
 * Reads from environment variables with G15KEYS_ prefix
 */
export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return {
    daemonHost: env.G15KEYS_DAEMON_HOST || DEFAULT_DAEMON_HOST,
    daemonPort: parseIntWithDefault(env.G15KEYS_DAEMON_PORT, DEFAULT_DAEMON_PORT),
    screenType: parseScreenType(env.G15KEYS_SCREEN_TYPE),
    reconnectDelayMs: parseIntWithDefault(env.G15KEYS_RECONNECT_DELAY_MS, DEFAULT_RECONNECT_DELAY_MS),

    logLevel: parseLogLevel(env.G15KEYS_LOG_LEVEL),

    configPath: env.G15KEYS_CONFIG_PATH,
  }
}
