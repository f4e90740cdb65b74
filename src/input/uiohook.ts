import { spawn, type ChildProcess } from 'child_process'
import { uIOhook, type UiohookKeyboardEvent } from 'uiohook-napi'
import type { Logger } from '../utils/logger.js'
import type { CaptureListener, EventCaptureService, InputDirection, InputInjector, InputKind } from './types.js'

const XDOTOOL = 'xdotool'

export const runXdotool = (args: string[]) => {
  return new Promise<void>((resolve, reject) => {
    const child: ChildProcess = spawn(XDOTOOL, args)

    let stderr = ''

    child.stderr?.on('data', (data) => {
      stderr += data.toString()
    })

    child.on('error', (error) => {
      reject(new Error(`Failed to spawn ${XDOTOOL}: ${error.message}`))
    })

    child.on('close', (code) => {
      if (code === 0) {
        resolve()
      } else {
        const errorMessage = `${XDOTOOL} ${args.join(' ')} exited with code ${code}${stderr.trim() ? `. stderr: ${stderr.trim()}` : ''}`
        reject(new Error(errorMessage))
      }
    })
  })
}

/**
 * Keyboard capture and key injection through libuiohook, mouse buttons
 * through xdotool. Key codes are uiohook key codes in both directions, so a
 * recorded macro replays the keys it captured.
 */
export class UiohookInput implements InputInjector, EventCaptureService {
  private listener: CaptureListener | null = null

  private readonly onKeyDown = (event: UiohookKeyboardEvent) => {
    this.listener?.({ keyCode: event.keycode, direction: 'press' })
  }

  private readonly onKeyUp = (event: UiohookKeyboardEvent) => {
    this.listener?.({ keyCode: event.keycode, direction: 'release' })
  }

  constructor(private readonly log: Logger) {}

  async inject(kind: InputKind, direction: InputDirection, code: number): Promise<void> {
    if (kind === 'key') {
      uIOhook.keyToggle(code, direction === 'press' ? 'down' : 'up')
      return
    }
    await runXdotool([direction === 'press' ? 'mousedown' : 'mouseup', String(code)])
  }

  async sync(): Promise<void> {
    // keyToggle and xdotool both return after the event was sent
    this.log.debug('Input events delivered')
  }

  startCapture(listener: CaptureListener): void {
    if (this.listener) {
      throw new Error('Input capture is already running')
    }
    this.listener = listener
    uIOhook.on('keydown', this.onKeyDown)
    uIOhook.on('keyup', this.onKeyUp)
    uIOhook.start()
    this.log.debug('Keyboard hook started')
  }

  stopCapture(): void {
    if (!this.listener) return
    this.listener = null
    uIOhook.off('keydown', this.onKeyDown)
    uIOhook.off('keyup', this.onKeyUp)
    uIOhook.stop()
    this.log.debug('Keyboard hook stopped')
  }
}
