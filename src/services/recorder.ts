import type { Logger } from '../utils/logger.js'
import { Channel } from '../utils/channel.js'
import type { CapturedKeyEvent, EventCaptureService } from '../input/types.js'

export const DEFAULT_RECORDING_CAPACITY = 4096

export interface MacroRecording {
  tokens: string[]
  /** Events lost because the channel was full */
  dropped: number
}

export interface MacroRecorderOptions {
  capacity?: number
  logger: Logger
}

export function captureToken(event: CapturedKeyEvent): string {
  return `k${event.direction === 'press' ? '+' : '-'}${event.keyCode}`
}

/**
 * Idle/Capturing recorder. While capturing, the capture service pushes tokens
 * into a bounded channel; `stop()` drains it on the caller's side.
 */
export class MacroRecorder {
  private channel: Channel<string> | null = null
  private readonly capacity: number
  private readonly log: Logger

  constructor(
    private readonly capture: EventCaptureService,
    options: MacroRecorderOptions
  ) {
    this.capacity = options.capacity ?? DEFAULT_RECORDING_CAPACITY
    this.log = options.logger
  }

  get isCapturing(): boolean {
    return this.channel !== null
  }

  /**
   * Returns false when a recording is already running or capture could not
   * be started
   */
  start(): boolean {
    if (this.channel) {
      this.log.debug('Recording already in progress')
      return false
    }

    const channel = new Channel<string>(this.capacity)
    try {
      this.capture.startCapture((event) => {
        channel.trySend(captureToken(event))
      })
    } catch (error) {
      this.log.error({ err: error }, 'Could not start input capture')
      return false
    }

    this.channel = channel
    this.log.info('Started recording macro')
    return true
  }

  /**
   * Stop capturing and hand back everything recorded. `null` when idle.
   */
  stop(): MacroRecording | null {
    const channel = this.channel
    if (!channel) return null
    this.channel = null

    try {
      this.capture.stopCapture()
    } catch (error) {
      this.log.error({ err: error }, 'Could not stop input capture')
    }

    channel.close()
    const recording = { tokens: channel.drain(), dropped: channel.droppedCount }
    if (recording.dropped > 0) {
      this.log.warn({ dropped: recording.dropped }, 'Recording buffer overflowed, events were lost')
    }
    this.log.debug({ tokens: recording.tokens }, 'Finished recording')
    return recording
  }
}
