export const DEFAULT_DAEMON_HOST = 'localhost'
export const DEFAULT_DAEMON_PORT = 15550
export const DEFAULT_RECONNECT_DELAY_MS = 10_000

export const DAEMON_GREETING = Buffer.from('G15 daemon HELLO', 'latin1')

/**
 * Screen buffer types a client registers with, sent right after the greeting
 */
export const SCREEN_TYPES = {
  text: 'TBUF',
  wbmp: 'WBUF',
  g15r: 'RBUF',
  pixel: 'GBUF',
} as const

export type ScreenType = (typeof SCREEN_TYPES)[keyof typeof SCREEN_TYPES]

export const DEFAULT_SCREEN_TYPE: ScreenType = SCREEN_TYPES.g15r

export function isScreenType(value: string): value is ScreenType {
  return Object.values<string>(SCREEN_TYPES).includes(value)
}

export const Opcode = {
  KeyHandler: 0x10,
  MKeyLeds: 0x20,
  Contrast: 0x40,
  Backlight: 0x80,
  GetKeyState: 0x6b,
  SwitchPriorities: 0x70,
  IsUserSelected: 0x75,
  IsForeground: 0x76,
} as const

export type Opcode = (typeof Opcode)[keyof typeof Opcode]

/**
 * Largest value each opcode accepts in its low bits. Opcodes that are not
 * listed take no value.
 */
export const OPCODE_MAX_VALUE: Partial<Record<Opcode, number>> = {
  [Opcode.KeyHandler]: 1 << 3,
  [Opcode.MKeyLeds]: 1 << 3,
  [Opcode.Contrast]: 1 << 2,
  [Opcode.Backlight]: 1 << 2,
}

export type ResponseKind = 'keystate' | 'boolean'

export const OPCODE_RESPONSE: Partial<Record<Opcode, ResponseKind>> = {
  [Opcode.GetKeyState]: 'keystate',
  [Opcode.IsForeground]: 'boolean',
  [Opcode.IsUserSelected]: 'boolean',
}

export const KEYSTATE_SIZE = 4
export const BOOLEAN_RESPONSE_SIZE = 2
/** Boolean responses arrive as an ASCII digit */
export const BOOLEAN_RESPONSE_OFFSET = 48

/** LED masks used by `set-leds`; an L-key name selects the same LED as its M-key */
export const LED_MASKS: Readonly<Record<string, number>> = {
  M1: 1 << 0,
  M2: 1 << 1,
  M3: 1 << 2,
  M4: 1 << 3,
  MR: 1 << 3,
  L1: 1 << 0,
  L2: 1 << 1,
  L3: 1 << 2,
  L4: 1 << 3,
}

export const DEFAULT_LED_MASK = LED_MASKS.M3
