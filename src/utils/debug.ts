/**
 * Debug switch for g15keys: `--debug`/`-d` on the command line or
 * `DEBUG=g15keys` (or `*`, `all`) in the environment
 */

export interface DebugFlags {
  debug: boolean
}

function strToBool(v: string | undefined): boolean {
  if (!v) return false
  const s = v.toLowerCase()
  return s === '1' || s === 'true' || s === 'yes' || s === 'on'
}

export function initDebugFlags(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): DebugFlags {
  const hasAny = (...names: string[]) => names.some(name => argv.includes(name))

  const envDebug = (env.DEBUG || '').toLowerCase()
  const envParts = envDebug.split(/[,:\s]+/).filter(Boolean)

  const debug =
    hasAny('--debug', '-d') ||
    strToBool(env.G15KEYS_DEBUG) ||
    envDebug === '*' ||
    envParts.includes('all') ||
    envParts.includes('g15keys')

  return { debug }
}
