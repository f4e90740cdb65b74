import type { Logger } from '../utils/logger.js'
import { Channel } from '../utils/channel.js'
import { formatMacro } from '../config/commands.js'
import type { ConfigStore } from '../config/index.js'
import { decodeKeyTransitions, type KeyTransition } from '../keys/decoder.js'
import type { ProtocolClient } from '../protocol/client.js'
import type { ActionDispatcher } from './dispatcher.js'
import type { MacroRecorder } from './recorder.js'
import { ClientState } from './state.js'

export type ControlMessage = { type: 'reload' } | { type: 'shutdown' }

export interface EventLoopOptions {
  client: Pick<ProtocolClient, 'reconnect' | 'waitForKeyState' | 'disconnect' | 'isDisconnecting'>
  store: Pick<ConfigStore, 'load' | 'save'>
  state: ClientState
  dispatcher: Pick<ActionDispatcher, 'handleKey'>
  recorder: Pick<MacroRecorder, 'isCapturing' | 'stop'>
  logger: Logger
}

type LoopEvent =
  | { source: 'daemon'; keys: number | null }
  | { source: 'control'; message: ControlMessage | undefined }

/**
 * Waits for key-state snapshots and control messages, one at a time, and
 * routes every key transition to the recorder or the dispatcher.
 */
export class EventLoop {
  private state: ClientState
  private readonly control = new Channel<ControlMessage>()
  private reloadDeferred = false
  private running = false

  private readonly client: EventLoopOptions['client']
  private readonly store: EventLoopOptions['store']
  private readonly dispatcher: EventLoopOptions['dispatcher']
  private readonly recorder: EventLoopOptions['recorder']
  private readonly log: Logger

  constructor(options: EventLoopOptions) {
    this.client = options.client
    this.store = options.store
    this.state = options.state
    this.dispatcher = options.dispatcher
    this.recorder = options.recorder
    this.log = options.logger
  }

  get currentState(): ClientState {
    return this.state
  }

  requestReload(): void {
    this.control.trySend({ type: 'reload' })
  }

  /**
   * Stop the loop. Also closes the connection so a blocked read or a retry
   * delay returns right away.
   */
  requestShutdown(): void {
    this.control.trySend({ type: 'shutdown' })
    this.client.disconnect()
  }

  /**
   * Runs until shutdown. Rejects only when the first connection gets a wrong
   * greeting.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Event loop is already running')
    }
    this.running = true

    try {
      if (await this.client.reconnect()) {
        await this.loop()
      }
    } finally {
      this.finish()
    }
  }

  private async loop(): Promise<void> {
    let pendingKeys: Promise<number | null> | null = null
    let pendingControl: Promise<ControlMessage | undefined> | null = null

    for (;;) {
      pendingKeys ??= this.client.waitForKeyState()
      pendingControl ??= this.control.receive()

      const event: LoopEvent = await Promise.race([
        pendingKeys.then((keys): LoopEvent => ({ source: 'daemon', keys })),
        pendingControl.then((message): LoopEvent => ({ source: 'control', message })),
      ])

      if (event.source === 'control') {
        pendingControl = null
        if (!event.message || event.message.type === 'shutdown') return
        this.reload()
        continue
      }

      pendingKeys = null
      // The daemon writes a second word after every snapshot; only its
      // arrival matters. It is consumed before any action runs, since an
      // action may reconnect and leave the loop reading a new session.
      const connected = event.keys !== null && (await this.client.waitForKeyState()) !== null
      if (connected && event.keys !== null) {
        await this.handleSnapshot(event.keys)
      }

      if (!connected) {
        if (this.client.isDisconnecting) return
        this.log.warn('Lost connection to daemon')
        if (!(await this.client.reconnect())) return
      }
    }
  }

  private async handleSnapshot(keys: number): Promise<void> {
    const transitions = decodeKeyTransitions(this.state.keys, keys)
    this.state.keys = keys

    for (const transition of transitions) {
      try {
        await this.handleTransition(transition)
      } catch (error) {
        this.log.error(
          { err: error, key: transition.key, pressed: transition.pressed, profile: this.state.activeProfile },
          'Failed to handle key event'
        )
      }
    }
  }

  private async handleTransition({ key, pressed }: KeyTransition): Promise<void> {
    if (this.recorder.isCapturing) {
      if (!pressed) {
        this.finishRecording(key)
      }
      return
    }
    await this.dispatcher.handleKey(this.state, key, pressed)
  }

  private finishRecording(key: string): void {
    const recording = this.recorder.stop()
    if (!recording) return

    if (recording.tokens.length === 0) {
      this.log.info({ key }, 'Nothing recorded, keeping the current binding')
    } else {
      const command = formatMacro(recording.tokens)
      this.state.bind(key, command)
      this.log.info({ key, profile: this.state.activeProfile, command }, 'Saving macro')
      try {
        this.store.save(this.state.config)
      } catch (error) {
        this.log.error({ err: error }, 'Could not save configuration')
      }
    }

    if (this.reloadDeferred) {
      this.reloadDeferred = false
      this.reload()
    }
  }

  private reload(): void {
    if (this.recorder.isCapturing) {
      this.reloadDeferred = true
      this.log.info('Recording in progress, reloading configuration once it is saved')
      return
    }

    this.log.info('Loading configuration')
    try {
      const config = this.store.load()
      this.state = ClientState.fromConfig(config, this.state.activeProfile, this.state.keys)
      this.log.info({ profile: this.state.activeProfile }, 'Configuration reloaded')
    } catch (error) {
      this.log.error({ err: error }, 'Reload failed, keeping the current configuration')
    }
  }

  private finish(): void {
    if (this.recorder.stop()) {
      this.log.info('Recording aborted')
    }
    this.control.close()
    this.client.disconnect()
    this.running = false
  }
}
