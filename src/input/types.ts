export type InputKind = 'key' | 'mouse'
export type InputDirection = 'press' | 'release'

/**
 * Synthesizes keyboard and mouse events on the display server
 */
export interface InputInjector {
  inject(kind: InputKind, direction: InputDirection, code: number): Promise<void>
  /** Resolves once every injected event has been delivered */
  sync(): Promise<void>
}

export interface CapturedKeyEvent {
  keyCode: number
  direction: InputDirection
}

export type CaptureListener = (event: CapturedKeyEvent) => void

/**
 * Reports real keyboard events while a capture is running. Listeners may be
 * called at any time between `startCapture` and `stopCapture`.
 */
export interface EventCaptureService {
  startCapture(listener: CaptureListener): void
  stopCapture(): void
}
