import { LED_MASKS } from '../protocol/constants.js'
import type { InputDirection, InputKind } from '../input/types.js'

/** A command as written in the configuration file; lists may nest */
export type CommandValue = string | CommandValue[]

export type EmitStep =
  | { kind: InputKind; direction: InputDirection; code: number }
  | { kind: 'pause'; ms: number }

export type Command =
  | { type: 'switch-profile'; profile: string }
  | { type: 'set-leds'; leds: Array<{ name: string; mask: number }> }
  | { type: 'emit'; steps: EmitStep[] }
  | { type: 'record' }
  | { type: 'shell'; commandLine: string }
  | { type: 'sequence'; commands: Command[] }
  | { type: 'invalid'; source: string; reason: string }

const SWITCH_PROFILE_PREFIX = 'switch-profile '
const SET_LEDS_PREFIX = 'set-leds '
const EMIT_PREFIX = 'emit '
const RECORD_COMMAND = 'record'

const INPUT_TOKEN = /^([mk])([+-])(\d+)$/
const PAUSE_TOKEN = /^s(\d+)$/

function splitList(list: string): string[] {
  return list.split(',').map((token) => token.trim())
}

export function parseEmitToken(token: string): EmitStep {
  const input = INPUT_TOKEN.exec(token)
  if (input) {
    return {
      kind: input[1] === 'm' ? 'mouse' : 'key',
      direction: input[2] === '+' ? 'press' : 'release',
      code: Number(input[3]),
    }
  }

  const pause = PAUSE_TOKEN.exec(token)
  if (pause) {
    return { kind: 'pause', ms: Number(pause[1]) }
  }

  throw new SyntaxError(`Malformed emit token "${token}"`)
}

export function formatEmitStep(step: EmitStep): string {
  if (step.kind === 'pause') return `s${step.ms}`
  return `${step.kind === 'mouse' ? 'm' : 'k'}${step.direction === 'press' ? '+' : '-'}${step.code}`
}

/**
 * `emit` command replaying the given tokens
 */
export function formatMacro(tokens: readonly string[]): string {
  return `${EMIT_PREFIX}${tokens.join(',')}`
}

function parseEmit(source: string, list: string): Command {
  try {
    return { type: 'emit', steps: splitList(list).map(parseEmitToken) }
  } catch (error) {
    return { type: 'invalid', source, reason: error instanceof Error ? error.message : String(error) }
  }
}

function parseSetLeds(source: string, list: string): Command {
  const leds: Array<{ name: string; mask: number }> = []
  for (const name of splitList(list)) {
    if (!Object.hasOwn(LED_MASKS, name)) {
      return { type: 'invalid', source, reason: `Unknown LED "${name}"` }
    }
    leds.push({ name, mask: LED_MASKS[name] })
  }
  return { type: 'set-leds', leds }
}

export function parseCommandString(source: string): Command {
  if (source.startsWith(SWITCH_PROFILE_PREFIX)) {
    return { type: 'switch-profile', profile: source.slice(SWITCH_PROFILE_PREFIX.length) }
  }
  if (source.startsWith(SET_LEDS_PREFIX)) {
    return parseSetLeds(source, source.slice(SET_LEDS_PREFIX.length))
  }
  if (source.startsWith(EMIT_PREFIX)) {
    return parseEmit(source, source.slice(EMIT_PREFIX.length))
  }
  if (source === RECORD_COMMAND) {
    return { type: 'record' }
  }
  return { type: 'shell', commandLine: source }
}

export function parseCommand(value: CommandValue): Command {
  if (typeof value === 'string') {
    return parseCommandString(value)
  }
  return { type: 'sequence', commands: value.map(parseCommand) }
}
