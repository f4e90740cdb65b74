/**
 * Single-consumer message channel.
 *
 * Producers never block: `trySend` refuses the value once `capacity` items are
 * buffered. The consumer either awaits `receive()` or takes everything that is
 * buffered with `drain()`.
 */
export class Channel<T> {
  private buffer: T[] = []
  private waiters: Array<(value: T | undefined) => void> = []
  private closed = false
  private dropped = 0

  constructor(private readonly capacity = Number.POSITIVE_INFINITY) {}

  trySend(value: T): boolean {
    if (this.closed) return false

    const waiter = this.waiters.shift()
    if (waiter) {
      waiter(value)
      return true
    }

    if (this.buffer.length >= this.capacity) {
      this.dropped++
      return false
    }
    this.buffer.push(value)
    return true
  }

  /**
   * Resolves with the next value, or `undefined` once the channel is closed
   * and empty.
   */
  receive(): Promise<T | undefined> {
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift())
    }
    if (this.closed) {
      return Promise.resolve(undefined)
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  drain(): T[] {
    const values = this.buffer
    this.buffer = []
    return values
  }

  close(): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined)
    }
  }

  get size(): number {
    return this.buffer.length
  }

  get droppedCount(): number {
    return this.dropped
  }

  get isClosed(): boolean {
    return this.closed
  }
}
