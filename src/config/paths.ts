import path from 'path'
import os from 'os'
import fs from 'fs'

const CONFIG_DIR_NAME = '.g15keys'
const CONFIG_FILE_NAME = 'config'

/**
 * Get the config file path, `~/.g15keys/config` unless overridden with
 * G15KEYS_CONFIG_PATH
 */
export function getConfigPath(homeDir: string = os.homedir()): string {
  if (process.env.G15KEYS_CONFIG_PATH) {
    return process.env.G15KEYS_CONFIG_PATH
  }
  return path.join(homeDir, CONFIG_DIR_NAME, CONFIG_FILE_NAME)
}

/**
 * Ensure a directory exists, creating it if necessary
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true })
  }
}
