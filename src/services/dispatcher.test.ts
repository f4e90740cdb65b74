import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest'
import { EventEmitter } from 'events'
import type { SpawnOptions } from 'child_process'
import { configFromDocument, type ConfigDocument } from '../config/bindings.js'
import type { CommandResult } from '../protocol/client.js'
import { FakeInput, LogLevel, createTestLogger, type LogEntry } from '../test-utils.js'
import { ActionDispatcher } from './dispatcher.js'
import { ClientState } from './state.js'

class FakeChild extends EventEmitter {
  unrefCount = 0

  unref(): void {
    this.unrefCount++
  }
}

const document: ConfigDocument = {
  Default: {
    G1: 'xterm -e top',
    G2: ['set-leds M1', 'switch-profile Games'],
    G3: { pressed: 'emit k+50' },
    G4: 'switch-profile Missing',
    G5: 'set-leds M2,M3',
    MR: 'record',
  },
  Games: {
    G1: 'steam',
  },
}

describe('ActionDispatcher', () => {
  let input: FakeInput
  let daemon: {
    setLeds: Mock<(mask: number) => Promise<CommandResult>>
    reconnect: Mock<() => Promise<boolean>>
  }
  let recorder: { start: Mock<() => boolean> }
  let spawned: Array<{ command: string; args: readonly string[]; options: SpawnOptions; child: FakeChild }>
  let entries: LogEntry[]
  let messages: (level: number) => string[]
  let dispatcher: ActionDispatcher
  let state: ClientState

  beforeEach(() => {
    input = new FakeInput()
    daemon = {
      setLeds: vi.fn(async (_mask: number): Promise<CommandResult> => ({ status: 'sent' })),
      reconnect: vi.fn(async () => true),
    }
    recorder = { start: vi.fn(() => true) }
    spawned = []
    const testLogger = createTestLogger()
    entries = testLogger.entries
    messages = testLogger.messages
    dispatcher = new ActionDispatcher({
      daemon,
      injector: input,
      recorder,
      spawnProcess: (command, args, options) => {
        const child = new FakeChild()
        spawned.push({ command, args, options, child })
        return child
      },
      logger: testLogger.logger,
    })
    state = ClientState.fromConfig(configFromDocument(document))
  })

  describe('binding resolution', () => {
    it('runs a single binding on release only', async () => {
      await dispatcher.handleKey(state, 'G1', true)
      expect(spawned).toHaveLength(0)

      await dispatcher.handleKey(state, 'G1', false)
      expect(spawned).toHaveLength(1)
      expect(spawned[0]).toMatchObject({
        command: 'xterm',
        args: ['-e', 'top'],
        options: { detached: true, stdio: 'ignore' },
      })
      expect(spawned[0].child.unrefCount).toBe(1)
    })

    it('runs a sequence binding on release only', async () => {
      await dispatcher.handleKey(state, 'G2', true)
      expect(daemon.setLeds).not.toHaveBeenCalled()
      expect(state.activeProfile).toBe('Default')

      await dispatcher.handleKey(state, 'G2', false)
      expect(daemon.setLeds).toHaveBeenCalledWith(1)
      expect(state.activeProfile).toBe('Games')
    })

    it('runs the phase-specific entry of a press/release pair', async () => {
      await dispatcher.handleKey(state, 'G3', true)
      expect(input.injected).toEqual(['k+50'])
      expect(input.syncCount).toBe(1)

      await dispatcher.handleKey(state, 'G3', false)
      expect(input.injected).toEqual(['k+50'])
      expect(input.syncCount).toBe(1)
    })

    it('does nothing for unbound keys', async () => {
      await dispatcher.handleKey(state, 'L5', true)
      await dispatcher.handleKey(state, 'L5', false)

      expect(spawned).toHaveLength(0)
      expect(input.injected).toEqual([])
      expect(messages(LogLevel.warn)).toEqual([])
    })
  })

  describe('switch-profile', () => {
    it('keeps the current profile and warns when the target is unknown', async () => {
      await dispatcher.handleKey(state, 'G4', false)

      expect(state.activeProfile).toBe('Default')
      expect(entries.filter((e) => e.level === LogLevel.warn)).toMatchObject([
        { msg: 'Profile not found', profile: 'Missing' },
      ])
    })

    it('uses the new profile for later lookups', async () => {
      await dispatcher.execute(state, { type: 'switch-profile', profile: 'Games' })
      await dispatcher.handleKey(state, 'G1', false)

      expect(spawned.map((s) => s.command)).toEqual(['steam'])
    })
  })

  describe('set-leds', () => {
    it('sends one LED command per token', async () => {
      await dispatcher.handleKey(state, 'G5', false)

      expect(daemon.setLeds.mock.calls).toEqual([[2], [4]])
      expect(daemon.reconnect).not.toHaveBeenCalled()
    })

    it('reconnects when the daemon is gone and carries on', async () => {
      daemon.setLeds.mockResolvedValueOnce({ status: 'disconnected' })

      await dispatcher.handleKey(state, 'G5', false)

      expect(daemon.reconnect).toHaveBeenCalledTimes(1)
      expect(daemon.setLeds.mock.calls).toEqual([[2], [4]])
    })

    it('stops when the reconnect is interrupted by shutdown', async () => {
      daemon.setLeds.mockResolvedValueOnce({ status: 'disconnected' })
      daemon.reconnect.mockResolvedValueOnce(false)

      await dispatcher.handleKey(state, 'G5', false)

      expect(daemon.setLeds.mock.calls).toEqual([[2]])
    })
  })

  describe('emit', () => {
    it('injects every step in order, then syncs', async () => {
      await dispatcher.execute(state, {
        type: 'emit',
        steps: [
          { kind: 'key', direction: 'press', code: 37 },
          { kind: 'pause', ms: 1 },
          { kind: 'mouse', direction: 'press', code: 1 },
          { kind: 'mouse', direction: 'release', code: 1 },
          { kind: 'key', direction: 'release', code: 37 },
        ],
      })

      expect(input.injected).toEqual(['k+37', 'm+1', 'm-1', 'k-37'])
      expect(input.syncCount).toBe(1)
    })
  })

  describe('record', () => {
    it('starts the recorder', async () => {
      await dispatcher.handleKey(state, 'MR', false)
      expect(recorder.start).toHaveBeenCalledTimes(1)
    })
  })

  describe('sequences', () => {
    it('keeps running the remaining commands when one fails', async () => {
      vi.spyOn(input, 'inject').mockRejectedValueOnce(new Error('display gone'))

      await dispatcher.execute(state, {
        type: 'sequence',
        commands: [
          { type: 'emit', steps: [{ kind: 'key', direction: 'press', code: 9 }] },
          { type: 'shell', commandLine: 'xterm' },
        ],
      })

      expect(messages(LogLevel.error)).toEqual(['Command failed'])
      expect(spawned.map((s) => s.command)).toEqual(['xterm'])
    })

    it('runs nested lists depth-first', async () => {
      await dispatcher.execute(state, {
        type: 'sequence',
        commands: [
          { type: 'shell', commandLine: 'first' },
          { type: 'sequence', commands: [{ type: 'shell', commandLine: 'second' }] },
          { type: 'shell', commandLine: 'third' },
        ],
      })

      expect(spawned.map((s) => s.command)).toEqual(['first', 'second', 'third'])
    })
  })

  describe('errors', () => {
    it('warns about invalid commands without running them', async () => {
      await dispatcher.execute(state, { type: 'invalid', source: 'emit x1', reason: 'Malformed emit token "x1"' })

      expect(messages(LogLevel.warn)).toEqual(['Ignoring invalid command: Malformed emit token "x1"'])
    })

    it('logs spawn failures reported by the child process', async () => {
      await dispatcher.execute(state, { type: 'shell', commandLine: 'no-such-program' })
      spawned[0].child.emit('error', new Error('spawn no-such-program ENOENT'))

      expect(entries.filter((e) => e.level === LogLevel.error)).toMatchObject([
        { msg: 'Failed to spawn process', commandLine: 'no-such-program' },
      ])
    })

    it('does not spawn command lines it cannot split', async () => {
      await dispatcher.execute(state, { type: 'shell', commandLine: 'echo "open' })

      expect(spawned).toHaveLength(0)
      expect(messages(LogLevel.warn)).toEqual(['Cannot parse command: Unterminated double quote in: echo "open'])
    })
  })
})
