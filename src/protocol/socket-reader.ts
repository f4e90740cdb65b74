import type { Socket } from 'net'

interface PendingRead {
  length: number
  resolve: (data: Buffer | null) => void
}

/**
 * Exact-length reads over a stream socket.
 *
 * Reads are served in the order they were requested. Once the socket ends,
 * closes or errors, every pending and future read resolves `null`.
 */
export class SocketReader {
  private chunks: Buffer[] = []
  private buffered = 0
  private pending: PendingRead[] = []
  private ended = false

  constructor(socket: Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk)
      this.buffered += chunk.length
      this.flush()
    })
    socket.on('end', () => this.finish())
    socket.on('close', () => this.finish())
    // Errors are reported by the owner; here they only mean no more data
    socket.on('error', () => this.finish())
  }

  read(length: number): Promise<Buffer | null> {
    return new Promise((resolve) => {
      this.pending.push({ length, resolve })
      this.flush()
    })
  }

  get isEnded(): boolean {
    return this.ended
  }

  private finish(): void {
    this.ended = true
    this.flush()
  }

  private flush(): void {
    while (this.pending.length > 0) {
      const next = this.pending[0]
      if (this.buffered >= next.length) {
        this.pending.shift()
        next.resolve(this.take(next.length))
      } else if (this.ended) {
        this.pending.shift()
        next.resolve(null)
      } else {
        return
      }
    }
  }

  private take(length: number): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks)
    const data = all.subarray(0, length)
    const rest = all.subarray(length)
    this.chunks = rest.length > 0 ? [rest] : []
    this.buffered = rest.length
    return data
  }
}
