#!/usr/bin/env node
import { ConfigStore, getConfigPath, getEnvConfig } from './config/index.js'
import { UiohookInput } from './input/uiohook.js'
import { ProtocolClient } from './protocol/client.js'
import { ActionDispatcher } from './services/dispatcher.js'
import { EventLoop } from './services/event-loop.js'
import { MacroRecorder } from './services/recorder.js'
import { ClientState } from './services/state.js'
import { initDebugFlags } from './utils/debug.js'
import { ConfigError, ExitCode, HandshakeError } from './utils/errors.js'
import { componentLogger, createLogger } from './utils/logger.js'

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'] as const
const RELOAD_SIGNAL = 'SIGUSR1'

async function main(): Promise<ExitCode> {
  const { debug } = initDebugFlags()
  const env = getEnvConfig()
  const logger = createLogger(debug ? 'debug' : env.logLevel)

  const store = new ConfigStore(env.configPath ?? getConfigPath())
  logger.info({ path: store.path }, 'Loading configuration')

  let state: ClientState
  try {
    state = ClientState.fromConfig(store.load())
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ details: error.details }, error.message)
      return ExitCode.Config
    }
    throw error
  }

  const input = new UiohookInput(componentLogger(logger, 'input'))
  const client = new ProtocolClient({
    host: env.daemonHost,
    port: env.daemonPort,
    screenType: env.screenType,
    reconnectDelayMs: env.reconnectDelayMs,
    logger: componentLogger(logger, 'protocol'),
  })
  const recorder = new MacroRecorder(input, { logger: componentLogger(logger, 'recorder') })
  const dispatcher = new ActionDispatcher({
    daemon: client,
    injector: input,
    recorder,
    logger: componentLogger(logger, 'dispatcher'),
  })
  const loop = new EventLoop({
    client,
    store,
    state,
    dispatcher,
    recorder,
    logger: componentLogger(logger, 'loop'),
  })

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => {
      logger.info({ signal }, 'Graceful shutdown')
      loop.requestShutdown()
    })
  }
  process.on(RELOAD_SIGNAL, () => {
    logger.info({ signal: RELOAD_SIGNAL }, 'Reload requested')
    loop.requestReload()
  })

  try {
    await loop.run()
  } catch (error) {
    if (error instanceof HandshakeError) {
      logger.error(error.message)
      return ExitCode.Handshake
    }
    throw error
  }

  return ExitCode.Ok
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error('g15keys failed:', err)
    process.exit(ExitCode.Failure)
  })
