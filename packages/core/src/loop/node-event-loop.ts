import type { BasicEventLoop, TimerHandle } from '../interfaces/event-loop'
import { CompletionHandle } from '../core/completion-handle'
import { LoopClosedError } from '../core/errors'

class NodeTimer implements TimerHandle {
  private timeoutId: ReturnType<typeof setTimeout> | null
  private _cancelled = false

  constructor(
    delayMs: number,
    callback: () => void,
    private readonly onSettled: (timer: NodeTimer) => void,
  ) {
    this.timeoutId = setTimeout(() => {
      this.timeoutId = null
      this.onSettled(this)
      callback()
    }, delayMs)
  }

  get cancelled(): boolean {
    return this._cancelled
  }

  cancel(): void {
    if (this._cancelled) return
    this._cancelled = true
    if (this.timeoutId) {
      clearTimeout(this.timeoutId)
      this.timeoutId = null
    }
    this.onSettled(this)
  }
}

/**
 * Event loop over Node's timers.
 *
 * Node gives no access to raw descriptor readiness, so this loop reports
 * descriptorWatch = false and socket-driven transfers need a readiness shim.
 */
export class NodeEventLoop implements BasicEventLoop {
  readonly descriptorWatch = false as const
  private timers: Set<NodeTimer> = new Set()
  private closed = false

  callLater(delayMs: number, callback: () => void): TimerHandle {
    if (this.closed) {
      throw new LoopClosedError()
    }
    const timer = new NodeTimer(Math.max(0, delayMs), callback, (t) => this.timers.delete(t))
    this.timers.add(timer)
    return timer
  }

  createCompletion<T>(): CompletionHandle<T> {
    return new CompletionHandle<T>()
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const timer of [...this.timers]) {
      timer.cancel()
    }
    this.timers.clear()
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Number of timers scheduled and not yet fired or cancelled. */
  get pendingTimers(): number {
    return this.timers.size
  }
}
