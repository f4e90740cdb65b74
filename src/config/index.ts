/**
 * ConfigStore - reads and writes the profile/binding file
 */

import fs from 'fs'
import path from 'path'
import { ConfigError, errorMessage } from '../utils/errors.js'
import { ConfigFileSchema, configFromDocument, configToDocument, type Config } from './bindings.js'
import { ensureDir, getConfigPath } from './paths.js'

function readConfigFile(configPath: string): unknown {
  let text: string
  try {
    text = fs.readFileSync(configPath, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${errorMessage(error)}`, error)
  }

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${errorMessage(error)}`, error)
  }
}

export class ConfigStore {
  constructor(private readonly configPath: string = getConfigPath()) {}

  get path(): string {
    return this.configPath
  }

  /**
   * Load and parse the configuration. Throws `ConfigError` when the file is
   * missing, malformed or has no profile.
   */
  load(): Config {
    const parsed = ConfigFileSchema.safeParse(readConfigFile(this.configPath))
    if (!parsed.success) {
      throw ConfigError.fromZod(this.configPath, parsed.error)
    }
    return configFromDocument(parsed.data)
  }

  /**
   * Rewrite the whole file from the in-memory configuration
   */
  save(config: Config): void {
    ensureDir(path.dirname(this.configPath))
    fs.writeFileSync(this.configPath, `${JSON.stringify(configToDocument(config), null, 4)}\n`)
  }
}

export { getConfigPath, ensureDir } from './paths.js'
export { getEnvConfig, parseLogLevel, type EnvConfig } from './env.js'
export * from './bindings.js'
export * from './commands.js'
