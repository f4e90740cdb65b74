import net, { type Server, type Socket } from 'net'
import { Writable } from 'stream'
import { DAEMON_GREETING } from './protocol/constants.js'
import type { CaptureListener, EventCaptureService, InputDirection, InputInjector, InputKind } from './input/types.js'
import { createLogger, type Logger } from './utils/logger.js'

export interface LogEntry {
  level: number
  msg: string
  [key: string]: unknown
}

export const LogLevel = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
} as const

/**
 * pino logger that keeps every entry in memory
 */
export function createTestLogger(): { logger: Logger; entries: LogEntry[]; messages: (level: number) => string[] } {
  const entries: LogEntry[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      for (const line of chunk.toString().split('\n')) {
        if (!line) continue
        const entry: LogEntry = JSON.parse(line)
        entries.push(entry)
      }
      callback()
    },
  })

  return {
    logger: createLogger('debug', stream),
    entries,
    messages: (level: number) => entries.filter((entry) => entry.level === level).map((entry) => entry.msg),
  }
}

export class FakeDaemonConnection {
  private received = Buffer.alloc(0)
  private waiters: Array<{ length: number; resolve: (data: Buffer) => void }> = []

  constructor(readonly socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.received = Buffer.concat([this.received, chunk])
      this.flush()
    })
    // The client may reset the connection when it shuts down
    socket.on('error', () => this.socket.destroy())
  }

  get bytes(): Buffer {
    return this.received
  }

  /**
   * Resolves once at least `length` bytes have arrived on this connection
   */
  waitForBytes(length: number): Promise<Buffer> {
    return new Promise((resolve) => {
      this.waiters.push({ length, resolve })
      this.flush()
    })
  }

  /** Key-state push: the snapshot followed by an all-zero second word */
  sendKeyState(mask: number): void {
    const frame = Buffer.alloc(8)
    frame.writeUInt32LE(mask >>> 0, 0)
    this.socket.write(frame)
  }

  write(data: Buffer): void {
    this.socket.write(data)
  }

  close(): void {
    this.socket.destroy()
  }

  private flush(): void {
    this.waiters = this.waiters.filter((waiter) => {
      if (this.received.length < waiter.length) return true
      waiter.resolve(this.received.subarray(0, waiter.length))
      return false
    })
  }
}

/**
 * In-process stand-in for g15daemon: greets every client and records what it
 * sends
 */
export class FakeDaemon {
  greeting: Buffer = DAEMON_GREETING
  readonly connections: FakeDaemonConnection[] = []
  private readonly server: Server
  private waiters: Array<{ index: number; resolve: (connection: FakeDaemonConnection) => void }> = []

  constructor() {
    this.server = net.createServer((socket) => {
      const connection = new FakeDaemonConnection(socket)
      this.connections.push(connection)
      socket.write(this.greeting)
      this.waiters = this.waiters.filter((waiter) => {
        const match = this.connections[waiter.index]
        if (!match) return true
        waiter.resolve(match)
        return false
      })
    })
  }

  listen(port = 0): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject)
      this.server.listen(port, '127.0.0.1', () => {
        this.server.off('error', reject)
        const address = this.server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('Fake daemon is not listening on a TCP port'))
          return
        }
        resolve(address.port)
      })
    })
  }

  /**
   * Resolves with the `index`-th accepted connection (0-based)
   */
  connection(index: number): Promise<FakeDaemonConnection> {
    const existing = this.connections[index]
    if (existing) return Promise.resolve(existing)
    return new Promise((resolve) => {
      this.waiters.push({ index, resolve })
    })
  }

  /** Stop accepting new clients, keeping open connections */
  stopListening(): void {
    if (this.server.listening) {
      this.server.close()
    }
  }

  close(): void {
    for (const connection of this.connections) {
      connection.close()
    }
    this.stopListening()
  }
}

export class FakeInput implements InputInjector, EventCaptureService {
  readonly injected: string[] = []
  syncCount = 0
  listener: CaptureListener | null = null
  startCount = 0
  stopCount = 0

  async inject(kind: InputKind, direction: InputDirection, code: number): Promise<void> {
    this.injected.push(`${kind === 'mouse' ? 'm' : 'k'}${direction === 'press' ? '+' : '-'}${code}`)
  }

  async sync(): Promise<void> {
    this.syncCount++
  }

  startCapture(listener: CaptureListener): void {
    this.startCount++
    this.listener = listener
  }

  stopCapture(): void {
    this.stopCount++
    this.listener = null
  }

  /** Deliver a captured key event as the capture service would */
  capture(keyCode: number, direction: InputDirection): void {
    this.listener?.({ keyCode, direction })
  }
}
