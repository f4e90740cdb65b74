import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'

import { ConfigStore, getConfigPath, getEnvConfig, parseLogLevel, commandForPhase, configToDocument } from './index.js'
import { ConfigError } from '../utils/errors.js'

describe('paths.ts', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('should default to ~/.g15keys/config', () => {
    vi.stubEnv('G15KEYS_CONFIG_PATH', '')
    expect(getConfigPath('/home/alice')).toBe(path.join('/home/alice', '.g15keys', 'config'))
  })

  it('should return G15KEYS_CONFIG_PATH when set', () => {
    vi.stubEnv('G15KEYS_CONFIG_PATH', '/tmp/custom-config.json')
    expect(getConfigPath('/home/alice')).toBe('/tmp/custom-config.json')
  })
})

describe('env.ts', () => {
  it('should use defaults when nothing is set', () => {
    expect(getEnvConfig({})).toEqual({
      daemonHost: 'localhost',
      daemonPort: 15550,
      screenType: 'RBUF',
      reconnectDelayMs: 10000,
      logLevel: 'info',
      configPath: undefined,
    })
  })

  it('should read G15KEYS_ variables', () => {
    const env = getEnvConfig({
      G15KEYS_DAEMON_HOST: '127.0.0.1',
      G15KEYS_DAEMON_PORT: '15551',
      G15KEYS_SCREEN_TYPE: 'GBUF',
      G15KEYS_RECONNECT_DELAY_MS: '500',
      G15KEYS_LOG_LEVEL: 'DEBUG',
      G15KEYS_CONFIG_PATH: '/etc/g15keys.json',
    })

    expect(env).toEqual({
      daemonHost: '127.0.0.1',
      daemonPort: 15551,
      screenType: 'GBUF',
      reconnectDelayMs: 500,
      logLevel: 'debug',
      configPath: '/etc/g15keys.json',
    })
  })

  it('should fall back on invalid values', () => {
    const env = getEnvConfig({
      G15KEYS_DAEMON_PORT: 'not-a-port',
      G15KEYS_SCREEN_TYPE: 'XBUF',
      G15KEYS_RECONNECT_DELAY_MS: '-5',
    })

    expect(env.daemonPort).toBe(15550)
    expect(env.screenType).toBe('RBUF')
    expect(env.reconnectDelayMs).toBe(10000)
  })

  it('should parse log levels', () => {
    expect(parseLogLevel('warn')).toBe('warn')
    expect(parseLogLevel('verbose')).toBe('info')
    expect(parseLogLevel(undefined)).toBe('info')
  })
})

describe('ConfigStore', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'g15keys-test-'))
    configPath = path.join(tempDir, '.g15keys', 'config')
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  function writeConfig(content: unknown): void {
    fs.mkdirSync(path.dirname(configPath), { recursive: true })
    fs.writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content))
  }

  it('should load profiles in file order with typed bindings', () => {
    writeConfig({
      Default: {
        G1: 'xterm',
        G2: ['set-leds M1', 'switch-profile Games'],
        G3: { pressed: 'emit k+50', released: 'emit k-50' },
      },
      Games: {},
    })

    const config = new ConfigStore(configPath).load()

    expect([...config.keys()]).toEqual(['Default', 'Games'])
    const profile = config.get('Default')
    expect(profile?.get('G1')).toEqual({ kind: 'single', value: 'xterm', command: { type: 'shell', commandLine: 'xterm' } })
    expect(profile?.get('G2')?.kind).toBe('sequence')
    expect(profile?.get('G3')?.kind).toBe('phase-pair')
  })

  it('should throw ConfigError when the file is missing', () => {
    const store = new ConfigStore(configPath)
    expect(() => store.load()).toThrow(ConfigError)
  })

  it('should throw ConfigError for malformed JSON', () => {
    writeConfig('{ "Default": ')
    expect(() => new ConfigStore(configPath).load()).toThrow(/not valid JSON/)
  })

  it('should reject a configuration without profiles', () => {
    writeConfig({})

    try {
      new ConfigStore(configPath).load()
      expect.unreachable('load should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError)
      expect(error).toMatchObject({ details: [{ path: '', message: 'No profile found' }] })
    }
  })

  it('should reject bindings of the wrong shape', () => {
    writeConfig({ Default: { G1: 42 } })
    expect(() => new ConfigStore(configPath).load()).toThrow(ConfigError)
  })

  it('should round-trip through save and load', () => {
    const document = {
      Default: {
        G1: 'xterm',
        G2: ['set-leds M1', ['emit k+10,k-10', 'record']],
        G3: { pressed: 'emit k+50' },
        MR: 'record',
      },
      Games: {
        L1: { released: ['switch-profile Default'], note: 'kept as is' },
      },
    }
    writeConfig(document)

    const store = new ConfigStore(configPath)
    store.save(store.load())

    expect(JSON.parse(fs.readFileSync(configPath, 'utf8'))).toEqual(document)
    expect(configToDocument(store.load())).toEqual(document)
  })

  it('should create the directory when saving', () => {
    const store = new ConfigStore(path.join(tempDir, 'nested', 'dir', 'config'))
    store.save(new Map([['Default', new Map()]]))

    expect(JSON.parse(fs.readFileSync(store.path, 'utf8'))).toEqual({ Default: {} })
  })
})

describe('commandForPhase', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'g15keys-test-'))
  })

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true })
  })

  it('should fire single and sequence bindings on release only', () => {
    const configPath = path.join(tempDir, 'config')
    fs.writeFileSync(configPath, JSON.stringify({ P: { G1: 'xterm', G2: ['xterm'], G3: { pressed: 'a' } } }))
    const profile = new ConfigStore(configPath).load().get('P')
    const single = profile?.get('G1')
    const sequence = profile?.get('G2')
    const pair = profile?.get('G3')
    if (!single || !sequence || !pair) throw new Error('bindings missing')

    expect(commandForPhase(single, true)).toBeUndefined()
    expect(commandForPhase(single, false)).toEqual({ type: 'shell', commandLine: 'xterm' })
    expect(commandForPhase(sequence, true)).toBeUndefined()
    expect(commandForPhase(sequence, false)?.type).toBe('sequence')
    expect(commandForPhase(pair, true)).toEqual({ type: 'shell', commandLine: 'a' })
    expect(commandForPhase(pair, false)).toBeUndefined()
  })
})
