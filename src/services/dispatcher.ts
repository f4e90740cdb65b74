import { spawn, type SpawnOptions } from 'child_process'
import { setTimeout as delay } from 'timers/promises'
import type { Logger } from '../utils/logger.js'
import { errorMessage } from '../utils/errors.js'
import { splitCommandLine } from '../utils/shell-parse.js'
import { commandForPhase } from '../config/bindings.js'
import type { Command, EmitStep } from '../config/commands.js'
import type { InputInjector } from '../input/types.js'
import type { ProtocolClient } from '../protocol/client.js'
import type { MacroRecorder } from './recorder.js'
import type { ClientState } from './state.js'

/** The part of `ChildProcess` the dispatcher touches after spawning */
export interface SpawnedProcess {
  on(event: 'error', listener: (error: Error) => void): unknown
  unref(): void
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedProcess

export interface ActionDispatcherOptions {
  daemon: Pick<ProtocolClient, 'setLeds' | 'reconnect'>
  injector: InputInjector
  recorder: Pick<MacroRecorder, 'start'>
  spawnProcess?: SpawnFn
  logger: Logger
}

/**
 * Runs the commands bound to keys of the active profile
 */
export class ActionDispatcher {
  private readonly daemon: ActionDispatcherOptions['daemon']
  private readonly injector: InputInjector
  private readonly recorder: ActionDispatcherOptions['recorder']
  private readonly spawnProcess: SpawnFn
  private readonly log: Logger

  constructor(options: ActionDispatcherOptions) {
    this.daemon = options.daemon
    this.injector = options.injector
    this.recorder = options.recorder
    this.spawnProcess = options.spawnProcess ?? spawn
    this.log = options.logger
  }

  async handleKey(state: ClientState, key: string, pressed: boolean): Promise<void> {
    this.log.debug(`${key} button ${pressed ? 'pressed' : 'released'}`)

    const binding = state.bindingFor(key)
    if (!binding) return

    const command = commandForPhase(binding, pressed)
    if (command) {
      await this.execute(state, command)
    }
  }

  async execute(state: ClientState, command: Command): Promise<void> {
    this.log.debug({ command }, 'Executing command')

    switch (command.type) {
      case 'switch-profile':
        this.switchProfile(state, command.profile)
        return
      case 'set-leds':
        await this.setLeds(command.leds)
        return
      case 'emit':
        await this.emit(command.steps)
        return
      case 'record':
        this.recorder.start()
        return
      case 'shell':
        this.runShell(command.commandLine)
        return
      case 'sequence':
        for (const child of command.commands) {
          try {
            await this.execute(state, child)
          } catch (error) {
            this.log.error({ err: error, command: child }, 'Command failed')
          }
        }
        return
      case 'invalid':
        this.log.warn({ source: command.source }, `Ignoring invalid command: ${command.reason}`)
        return
      default: {
        const unreachable: never = command
        throw new Error(`Unhandled command ${JSON.stringify(unreachable)}`)
      }
    }
  }

  private switchProfile(state: ClientState, profile: string): void {
    if (state.switchProfile(profile)) {
      this.log.info({ profile }, 'Switching profile')
    } else {
      this.log.warn({ profile }, 'Profile not found')
    }
  }

  private async setLeds(leds: Array<{ name: string; mask: number }>): Promise<void> {
    this.log.debug('Setting LED state')
    for (const { name, mask } of leds) {
      const result = await this.daemon.setLeds(mask)
      if (result.status === 'disconnected') {
        this.log.warn({ led: name }, 'Lost connection while setting LEDs, reconnecting')
        if (!(await this.daemon.reconnect())) return
      }
    }
  }

  private async emit(steps: EmitStep[]): Promise<void> {
    this.log.debug('Emitting input events')
    for (const step of steps) {
      if (step.kind === 'pause') {
        await delay(step.ms)
      } else {
        await this.injector.inject(step.kind, step.direction, step.code)
      }
    }
    await this.injector.sync()
  }

  private runShell(commandLine: string): void {
    let argv: string[]
    try {
      argv = splitCommandLine(commandLine)
    } catch (error) {
      this.log.warn({ commandLine }, `Cannot parse command: ${errorMessage(error)}`)
      return
    }

    if (argv.length === 0) {
      this.log.warn('Ignoring empty command')
      return
    }

    const [command, ...args] = argv
    try {
      const child = this.spawnProcess(command, args, { detached: true, stdio: 'ignore' })
      child.on('error', (error) => {
        this.log.error({ err: error, commandLine }, 'Failed to spawn process')
      })
      child.unref()
    } catch (error) {
      this.log.error({ err: error, commandLine }, 'Failed to spawn process')
    }
  }
}
