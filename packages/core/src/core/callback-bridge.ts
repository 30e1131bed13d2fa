/**
 * Callback Bridge
 *
 * The two entry points the native engine calls: timer-deadline-changed and
 * socket-interest-changed. The engine only carries an integer context back
 * to us, so adapters register here and get a token; each callback looks its
 * adapter up by that token and turns the request into loop watches or
 * deferred callbacks.
 *
 * Both entry points run synchronously inside engine calls and never suspend.
 */

import type { ReadinessCapableLoop, TimerHandle } from '../interfaces/event-loop'
import type { MultiHandle, NativeHandle } from '../interfaces/multi-binding'
import { PollInterest, SelectEvent, SOCKET_TIMEOUT } from '../interfaces/multi-binding'
import type { Logger } from '../logging/logger'
import { defaultLogger } from '../logging/logger'
import { WatchSetDesyncError } from './errors'

/** What the bridge needs from the adapter that owns a token. */
export interface BridgeTarget {
  readonly loop: ReadinessCapableLoop
  /** Descriptors with a reader and/or writer registered on the loop. */
  readonly sockets: Set<number>
  /**
   * Descriptors that were watched and have since been removed, so a repeated
   * REMOVE is accepted. An entry leaves only when the number is watched again
   * or the adapter closes. Its size is bounded by the distinct descriptor
   * numbers the engine has used. A REMOVE for a reused number that has not
   * been watched in its new life is accepted too, so a desync on a recycled
   * number goes unreported.
   */
  readonly retiredSockets: Set<number>
  /** Deadline timers scheduled and not yet fired or cancelled. */
  readonly timers: Set<TimerHandle>
  processData(sockfd: number, evBitmask: number): void
}

class ContextRegistry {
  private targets = new Map<number, BridgeTarget>()
  private nextToken = 1

  /** Used when a callback arrives for a token that is no longer registered. */
  logger: Logger = defaultLogger()

  register(target: BridgeTarget): number {
    const token = this.nextToken++
    this.targets.set(token, target)
    return token
  }

  lookup(token: number): BridgeTarget | undefined {
    return this.targets.get(token)
  }

  release(token: number): void {
    this.targets.delete(token)
  }
}

/** Singleton token registry shared by every adapter in the process. */
export const contextRegistry = new ContextRegistry()

function resolveTarget(token: number, callback: string): BridgeTarget | undefined {
  const target = contextRegistry.lookup(token)
  if (!target) {
    contextRegistry.logger.warn(`${callback}: no adapter for context ${token}, ignoring`)
  }
  return target
}

/**
 * Engine timer callback. -1 cancels every pending deadline timer; any other
 * value schedules one more. Stale timers are harmless: the drive loop
 * tolerates runs with nothing to do.
 */
export function timerFunction(_multi: MultiHandle, timeoutMs: number, token: number): void {
  const target = resolveTarget(token, 'timerFunction')
  if (!target) return

  if (timeoutMs === -1) {
    for (const timer of target.timers) {
      timer.cancel()
    }
    target.timers.clear()
    return
  }

  const timer = target.loop.callLater(timeoutMs, () => {
    target.timers.delete(timer)
    target.processData(SOCKET_TIMEOUT, SelectEvent.NONE)
  })
  target.timers.add(timer)
}

/**
 * Engine socket callback. Any change of interest first drops both watches
 * for the descriptor, then re-adds whichever directions are still wanted.
 * Removing an already-removed descriptor again is a no-op.
 *
 * @throws WatchSetDesyncError when asked to remove a descriptor that was never watched
 */
export function socketFunction(
  _easy: NativeHandle | null,
  sockfd: number,
  what: number,
  token: number,
  _socketp: unknown,
): void {
  const target = resolveTarget(token, 'socketFunction')
  if (!target) return

  const { loop, sockets, retiredSockets } = target

  if (what & (PollInterest.IN | PollInterest.OUT | PollInterest.REMOVE)) {
    if (sockets.has(sockfd)) {
      loop.removeReader(sockfd)
      loop.removeWriter(sockfd)
      sockets.delete(sockfd)
      retiredSockets.add(sockfd)
    } else if (what & PollInterest.REMOVE && !retiredSockets.has(sockfd)) {
      throw new WatchSetDesyncError(sockfd)
    }
  }

  if (what & PollInterest.IN) {
    loop.addReader(sockfd, () => target.processData(sockfd, SelectEvent.IN))
    sockets.add(sockfd)
    retiredSockets.delete(sockfd)
  }
  if (what & PollInterest.OUT) {
    loop.addWriter(sockfd, () => target.processData(sockfd, SelectEvent.OUT))
    sockets.add(sockfd)
    retiredSockets.delete(sockfd)
  }
}
