import net, { type Socket } from 'net'
import { setTimeout as delay } from 'timers/promises'
import type { Logger } from '../utils/logger.js'
import { ConnectionError, HandshakeError, ProtocolError, errorMessage } from '../utils/errors.js'
import { SocketReader } from './socket-reader.js'
import {
  BOOLEAN_RESPONSE_OFFSET,
  BOOLEAN_RESPONSE_SIZE,
  DAEMON_GREETING,
  DEFAULT_DAEMON_HOST,
  DEFAULT_DAEMON_PORT,
  DEFAULT_LED_MASK,
  DEFAULT_RECONNECT_DELAY_MS,
  DEFAULT_SCREEN_TYPE,
  KEYSTATE_SIZE,
  OPCODE_MAX_VALUE,
  OPCODE_RESPONSE,
  Opcode,
  type ScreenType,
} from './constants.js'

export type CommandResult =
  | { status: 'sent' }
  | { status: 'response'; value: number }
  | { status: 'disconnected' }

const DISCONNECTED: CommandResult = { status: 'disconnected' }
const SENT: CommandResult = { status: 'sent' }

export interface ProtocolClientOptions {
  host?: string
  port?: number
  screenType?: ScreenType
  reconnectDelayMs?: number
  /** LED mask restored after every (re)connect until a `set-leds` replaces it */
  initialLedMask?: number
  logger: Logger
}

function openSocket(host: string, port: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port })

    const onError = (error: Error) => {
      socket.destroy()
      reject(new ConnectionError(`Cannot connect to daemon at ${host}:${port}: ${error.message}`, error))
    }

    socket.once('error', onError)
    socket.once('connect', () => {
      socket.off('error', onError)
      socket.setNoDelay(true)
      resolve(socket)
    })
  })
}

/**
 * Client side of the g15daemon socket protocol: a 16-byte greeting, a 4-byte
 * screen type registration, then single-byte commands with fixed-size binary
 * responses and 4-byte key-state pushes.
 */
export class ProtocolClient {
  private socket: Socket | null = null
  private reader: SocketReader | null = null
  private disconnecting = false
  private hasConnected = false
  private readonly retryAbort = new AbortController()
  private ledMask: number

  private readonly host: string
  private readonly port: number
  private readonly screenType: ScreenType
  private readonly reconnectDelayMs: number
  private readonly log: Logger

  constructor(options: ProtocolClientOptions) {
    this.host = options.host ?? DEFAULT_DAEMON_HOST
    this.port = options.port ?? DEFAULT_DAEMON_PORT
    this.screenType = options.screenType ?? DEFAULT_SCREEN_TYPE
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS
    this.ledMask = options.initialLedMask ?? DEFAULT_LED_MASK
    this.log = options.logger
  }

  get isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed && this.reader !== null && !this.reader.isEnded
  }

  get isDisconnecting(): boolean {
    return this.disconnecting
  }

  get currentLedMask(): number {
    return this.ledMask
  }

  /**
   * Open the socket, check the greeting and register the screen type.
   * Throws `HandshakeError` on a wrong greeting and `ConnectionError` on any
   * socket failure.
   */
  async connect(screenType: ScreenType = this.screenType): Promise<void> {
    this.closeSocket()

    const socket = await openSocket(this.host, this.port)
    const reader = new SocketReader(socket)
    socket.on('error', (error) => {
      if (!this.disconnecting) {
        this.log.warn({ err: error }, 'Daemon socket error')
      }
    })
    this.socket = socket
    this.reader = reader

    const greeting = await reader.read(DAEMON_GREETING.length)
    if (!greeting) {
      this.closeSocket()
      throw new ConnectionError('Daemon closed the connection during the handshake')
    }
    if (!greeting.equals(DAEMON_GREETING)) {
      this.closeSocket()
      throw new HandshakeError(greeting)
    }

    if (!(await this.write(Buffer.from(screenType, 'latin1')))) {
      this.closeSocket()
      throw new ConnectionError('Could not register the screen type with the daemon')
    }

    this.hasConnected = true
    this.log.debug({ screenType }, 'Handshake complete')
  }

  /**
   * Connect, retrying forever with a fixed delay. Resolves `true` once a
   * session is set up, `false` when `disconnect()` interrupts the retries.
   * A wrong greeting before the first successful handshake is rethrown.
   */
  async reconnect(): Promise<boolean> {
    let attempt = 0

    while (!this.disconnecting) {
      attempt++
      try {
        await this.connect()
        await this.setupSession()
        this.log.info({ host: this.host, port: this.port, attempt }, 'Connected to daemon')
        return true
      } catch (error) {
        if (this.disconnecting) break
        if (error instanceof HandshakeError && !this.hasConnected) {
          throw error
        }
        this.log.warn(
          { attempt, retryInMs: this.reconnectDelayMs },
          `Daemon unavailable (${errorMessage(error)}), retrying in ${this.reconnectDelayMs / 1000}s`
        )
      }

      if (!(await this.waitBeforeRetry())) break
    }

    return false
  }

  /**
   * Send a single command byte. Query opcodes also read and decode their
   * response. I/O failures resolve `{ status: 'disconnected' }`.
   */
  async sendCommand(opcode: Opcode, value = 0): Promise<CommandResult> {
    const max = OPCODE_MAX_VALUE[opcode] ?? 0
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new ProtocolError(`Value ${value} out of range 0-${max} for opcode 0x${opcode.toString(16)}`)
    }

    const packet = opcode | value
    this.log.debug({ packet }, 'Sending packet (1 byte) to daemon')
    if (!(await this.write(Buffer.from([packet])))) {
      return DISCONNECTED
    }

    if (opcode === Opcode.MKeyLeds) {
      this.ledMask = value
    }

    const response = OPCODE_RESPONSE[opcode]
    if (!response || !this.reader) {
      return response ? DISCONNECTED : SENT
    }

    if (response === 'keystate') {
      const data = await this.reader.read(KEYSTATE_SIZE)
      return data ? { status: 'response', value: data.readUInt32LE(0) } : DISCONNECTED
    }

    const data = await this.reader.read(BOOLEAN_RESPONSE_SIZE)
    return data ? { status: 'response', value: data.readUInt16LE(0) - BOOLEAN_RESPONSE_OFFSET } : DISCONNECTED
  }

  /**
   * Next key-state snapshot pushed by the daemon, `null` once the connection
   * is gone.
   */
  async waitForKeyState(): Promise<number | null> {
    if (!this.reader) return null
    const data = await this.reader.read(KEYSTATE_SIZE)
    return data ? data.readUInt32LE(0) : null
  }

  enableKeyHandler(): Promise<CommandResult> {
    return this.sendCommand(Opcode.KeyHandler)
  }

  setLeds(mask: number): Promise<CommandResult> {
    return this.sendCommand(Opcode.MKeyLeds, mask)
  }

  setContrast(level: number): Promise<CommandResult> {
    return this.sendCommand(Opcode.Contrast, level)
  }

  setBacklight(level: number): Promise<CommandResult> {
    return this.sendCommand(Opcode.Backlight, level)
  }

  switchPriorities(): Promise<CommandResult> {
    return this.sendCommand(Opcode.SwitchPriorities)
  }

  async getKeyState(): Promise<number | null> {
    const result = await this.sendCommand(Opcode.GetKeyState)
    return result.status === 'response' ? result.value : null
  }

  async isForeground(): Promise<boolean | null> {
    const result = await this.sendCommand(Opcode.IsForeground)
    return result.status === 'response' ? result.value !== 0 : null
  }

  async isUserSelected(): Promise<boolean | null> {
    const result = await this.sendCommand(Opcode.IsUserSelected)
    return result.status === 'response' ? result.value !== 0 : null
  }

  /**
   * Close for good. Pending reads resolve `null` and a running `reconnect()`
   * stops waiting.
   */
  disconnect(): void {
    this.disconnecting = true
    this.retryAbort.abort()
    this.closeSocket()
  }

  private async setupSession(): Promise<void> {
    const handler = await this.enableKeyHandler()
    const leds = handler.status === 'disconnected' ? handler : await this.setLeds(this.ledMask)
    if (leds.status === 'disconnected') {
      this.closeSocket()
      throw new ConnectionError('Daemon closed the connection during session setup')
    }
  }

  private async waitBeforeRetry(): Promise<boolean> {
    try {
      await delay(this.reconnectDelayMs, undefined, { signal: this.retryAbort.signal })
      return true
    } catch (error) {
      this.log.debug({ err: error }, 'Reconnect delay interrupted')
      return false
    }
  }

  private write(data: Buffer): Promise<boolean> {
    const socket = this.socket
    if (!socket || socket.destroyed || !socket.writable) {
      return Promise.resolve(false)
    }

    return new Promise((resolve) => {
      socket.write(data, (error) => {
        if (error && !this.disconnecting) {
          this.log.warn({ err: error }, 'Failed to send to daemon')
        }
        resolve(!error)
      })
    })
  }

  private closeSocket(): void {
    if (this.socket) {
      this.socket.destroy()
    }
    this.socket = null
    this.reader = null
  }
}
