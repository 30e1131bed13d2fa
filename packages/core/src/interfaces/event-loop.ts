import type { CompletionHandle } from '../core/completion-handle'

export interface TimerHandle {
  cancel(): void
  readonly cancelled: boolean
}

interface EventLoopBase {
  /** Run callback once after delayMs. */
  callLater(delayMs: number, callback: () => void): TimerHandle

  createCompletion<T>(): CompletionHandle<T>

  close(): void
}

/**
 * A loop that can only schedule deferred callbacks. Transfers on such a loop
 * need a readiness shim to learn when sockets become readable or writable.
 */
export interface BasicEventLoop extends EventLoopBase {
  readonly descriptorWatch: false
}

/**
 * A loop that can watch raw socket descriptors. At most one reader and one
 * writer callback exist per descriptor; adding again replaces the previous one.
 */
export interface ReadinessCapableLoop extends EventLoopBase {
  readonly descriptorWatch: true

  addReader(fd: number, callback: () => void): void

  /** Returns whether a reader was registered. */
  removeReader(fd: number): boolean

  addWriter(fd: number, callback: () => void): void

  /** Returns whether a writer was registered. */
  removeWriter(fd: number): boolean
}

export type EventLoop = BasicEventLoop | ReadinessCapableLoop
