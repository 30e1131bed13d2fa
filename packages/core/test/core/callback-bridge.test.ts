import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { BridgeTarget } from '../../src/core/callback-bridge'
import { contextRegistry, socketFunction, timerFunction } from '../../src/core/callback-bridge'
import { WatchSetDesyncError } from '../../src/core/errors'
import type { TimerHandle } from '../../src/interfaces/event-loop'
import { PollInterest, SelectEvent, SOCKET_TIMEOUT } from '../../src/interfaces/multi-binding'
import type { Logger } from '../../src/logging/logger'
import { ManualEventLoop } from '../utils/manual-event-loop'
import { CaptureLogger } from '../utils/capture-logging-host'

class StubTarget implements BridgeTarget {
  readonly loop = new ManualEventLoop()
  readonly sockets = new Set<number>()
  readonly retiredSockets = new Set<number>()
  readonly timers = new Set<TimerHandle>()
  calls: Array<[number, number]> = []

  processData(sockfd: number, evBitmask: number): void {
    this.calls.push([sockfd, evBitmask])
  }
}

const MULTI = { kind: 'multi' }

describe('callback bridge', () => {
  let target: StubTarget
  let token: number
  let previousLogger: Logger
  let log: CaptureLogger

  beforeEach(() => {
    target = new StubTarget()
    token = contextRegistry.register(target)
    previousLogger = contextRegistry.logger
    log = new CaptureLogger()
    contextRegistry.logger = log
  })

  afterEach(() => {
    contextRegistry.release(token)
    contextRegistry.logger = previousLogger
  })

  describe('contextRegistry', () => {
    it('hands out distinct tokens and looks targets up by them', () => {
      const other = new StubTarget()
      const otherToken = contextRegistry.register(other)
      try {
        expect(otherToken).not.toBe(token)
        expect(contextRegistry.lookup(token)).toBe(target)
        expect(contextRegistry.lookup(otherToken)).toBe(other)
      } finally {
        contextRegistry.release(otherToken)
      }
      expect(contextRegistry.lookup(otherToken)).toBeUndefined()
    })
  })

  describe('timerFunction', () => {
    it('schedules a deferred drive with the timeout sentinel', () => {
      timerFunction(MULTI, 500, token)
      expect(target.timers.size).toBe(1)

      target.loop.advance(499)
      expect(target.calls).toEqual([])

      target.loop.advance(1)
      expect(target.calls).toEqual([[SOCKET_TIMEOUT, SelectEvent.NONE]])
      expect(target.timers.size).toBe(0)
    })

    it('keeps every schedule when called repeatedly before firing', () => {
      timerFunction(MULTI, 500, token)
      timerFunction(MULTI, 500, token)
      expect(target.timers.size).toBe(2)

      target.loop.advance(500)
      expect(target.calls).toEqual([
        [SOCKET_TIMEOUT, SelectEvent.NONE],
        [SOCKET_TIMEOUT, SelectEvent.NONE],
      ])
      expect(target.timers.size).toBe(0)
    })

    it('-1 cancels every scheduled timer without driving the engine', () => {
      timerFunction(MULTI, 100, token)
      timerFunction(MULTI, 200, token)
      const scheduled = [...target.timers]

      timerFunction(MULTI, -1, token)

      expect(target.timers.size).toBe(0)
      expect(scheduled.every((t) => t.cancelled)).toBe(true)
      target.loop.advance(1000)
      expect(target.calls).toEqual([])
    })

    it('ignores callbacks for a released token', () => {
      contextRegistry.release(token)
      timerFunction(MULTI, 100, token)
      expect(target.timers.size).toBe(0)
      expect(log.entries.map((e) => e.message)).toEqual([
        `timerFunction: no adapter for context ${token}, ignoring`,
      ])
    })
  })

  describe('socketFunction', () => {
    it('registers a reader for IN that drives the engine with a read event', () => {
      socketFunction(null, 7, PollInterest.IN, token, null)

      expect([...target.sockets]).toEqual([7])
      expect(target.loop.readers.has(7)).toBe(true)
      expect(target.loop.writers.has(7)).toBe(false)

      target.loop.fireReadable(7)
      expect(target.calls).toEqual([[7, SelectEvent.IN]])
    })

    it('registers a writer for OUT that drives the engine with a write event', () => {
      socketFunction(null, 8, PollInterest.OUT, token, null)

      expect(target.loop.writers.has(8)).toBe(true)
      expect(target.loop.readers.has(8)).toBe(false)

      target.loop.fireWritable(8)
      expect(target.calls).toEqual([[8, SelectEvent.OUT]])
    })

    it('registers both directions for INOUT', () => {
      socketFunction(null, 9, PollInterest.INOUT, token, null)
      expect(target.loop.readers.has(9)).toBe(true)
      expect(target.loop.writers.has(9)).toBe(true)
      expect([...target.sockets]).toEqual([9])
    })

    it('replaces both watches when interest changes on a watched descriptor', () => {
      socketFunction(null, 7, PollInterest.INOUT, token, null)
      socketFunction(null, 7, PollInterest.IN, token, null)

      expect(target.loop.readers.has(7)).toBe(true)
      expect(target.loop.writers.has(7)).toBe(false)
      expect([...target.sockets]).toEqual([7])
    })

    it('REMOVE drops both reader and writer', () => {
      socketFunction(null, 7, PollInterest.INOUT, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)

      expect(target.sockets.size).toBe(0)
      expect(target.loop.readers.size).toBe(0)
      expect(target.loop.writers.size).toBe(0)
    })

    it('repeating REMOVE for a descriptor that was watched is a no-op', () => {
      socketFunction(null, 7, PollInterest.IN, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)

      expect(() => socketFunction(null, 7, PollInterest.REMOVE, token, null)).not.toThrow()
      expect(target.sockets.size).toBe(0)
      expect(target.loop.readers.size).toBe(0)
    })

    it('REMOVE for a descriptor that was never watched is a contract fault', () => {
      expect(() => socketFunction(null, 11, PollInterest.REMOVE, token, null)).toThrow(
        WatchSetDesyncError,
      )
      expect(() => socketFunction(null, 11, PollInterest.REMOVE, token, null)).toThrow(
        'File descriptor 11 not found.',
      )
    })

    it('NONE changes nothing', () => {
      socketFunction(null, 7, PollInterest.IN, token, null)
      socketFunction(null, 7, PollInterest.NONE, token, null)
      expect([...target.sockets]).toEqual([7])
      expect(target.loop.readers.has(7)).toBe(true)
    })

    it('remembers retired descriptors across any number of repeated removals', () => {
      socketFunction(null, 7, PollInterest.IN, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)

      expect([...target.retiredSockets]).toEqual([7])
      expect(target.sockets.size).toBe(0)
    })

    it('accepts a REMOVE for a retired number the engine has reused without watching', () => {
      socketFunction(null, 7, PollInterest.INOUT, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)

      // Number 7 now belongs to a new connection the engine never asked to watch.
      expect(() => socketFunction(null, 7, PollInterest.REMOVE, token, null)).not.toThrow()
      expect(target.loop.readers.size).toBe(0)
      expect(target.loop.writers.size).toBe(0)
    })

    it('a watched descriptor can be re-added after removal', () => {
      socketFunction(null, 7, PollInterest.IN, token, null)
      socketFunction(null, 7, PollInterest.REMOVE, token, null)
      socketFunction(null, 7, PollInterest.OUT, token, null)

      expect([...target.sockets]).toEqual([7])
      expect(target.retiredSockets.has(7)).toBe(false)
      expect(target.loop.writers.has(7)).toBe(true)
    })
  })
})
