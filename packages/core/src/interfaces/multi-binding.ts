/**
 * Native Multi Binding
 *
 * Declares the surface a native multi-transfer engine binding must provide.
 * The binding owns the actual socket and TLS I/O; the adapter only tells it
 * when descriptors are ready or deadlines have passed, and reads back which
 * transfers finished.
 *
 * Every call is synchronous. Callbacks registered through multiSetCallbacks are
 * invoked re-entrantly from inside multiSocketAction, multiAddHandle,
 * multiRemoveHandle and multiCleanup.
 */

/** Opaque engine multi-handle. */
export type MultiHandle = object

/** Opaque engine handle for a single transfer. */
export type NativeHandle = object

// ============================================================
// Constants
// ============================================================

/** Interest bitmask passed to the socket callback. */
export const PollInterest = {
  NONE: 0,
  IN: 1,
  OUT: 2,
  INOUT: 3,
  REMOVE: 4,
} as const

/** Event bitmask passed to multiSocketAction. */
export const SelectEvent = {
  NONE: 0,
  IN: 0x01,
  OUT: 0x02,
  ERR: 0x04,
} as const

/** Descriptor sentinel meaning "no socket, a deadline passed". */
export const SOCKET_TIMEOUT = -1
export const SOCKET_BAD = -1

export const MessageKind = {
  DONE: 1,
} as const

/** Transfer status code for success. */
export const STATUS_OK = 0

/** Numeric multi-handle options passed straight through to the engine. */
export const MultiOption = {
  PIPELINING: 3,
  MAXCONNECTS: 6,
  MAX_HOST_CONNECTIONS: 7,
  MAX_TOTAL_CONNECTIONS: 13,
} as const

export type MultiOptionCode = (typeof MultiOption)[keyof typeof MultiOption]

// ============================================================
// Callbacks (engine -> adapter)
// ============================================================

/**
 * Invoked when the engine's next deadline changes.
 * timeoutMs is -1 when no deadline remains.
 */
export type TimerCallback = (multi: MultiHandle, timeoutMs: number, context: number) => void

/**
 * Invoked when the engine's interest in a descriptor changes.
 * what is a PollInterest bitmask.
 */
export type SocketCallback = (
  easy: NativeHandle | null,
  sockfd: number,
  what: number,
  context: number,
  socketp: unknown,
) => void

export interface MultiCallbacks {
  timer: TimerCallback
  socket: SocketCallback
  /** Passed back unchanged as the context argument of both callbacks. */
  context: number
}

export interface MultiMessage {
  msg: number
  easyHandle: NativeHandle
  /** Status code; only meaningful when msg is MessageKind.DONE. */
  result: number
}

export interface SocketActionResult {
  code: number
  runningHandles: number
}

// ============================================================
// Binding (adapter -> engine)
// ============================================================

export interface MultiBinding {
  multiInit(): MultiHandle

  /** Releases the multi-handle. Transfers must already be removed. */
  multiCleanup(multi: MultiHandle): number

  multiAddHandle(multi: MultiHandle, easy: NativeHandle): number

  multiRemoveHandle(multi: MultiHandle, easy: NativeHandle): number

  /** Installs the timer and socket callbacks and their shared context. */
  multiSetCallbacks(multi: MultiHandle, callbacks: MultiCallbacks): number

  multiSetopt(multi: MultiHandle, option: MultiOptionCode, value: number): number

  /**
   * Lets the engine perform I/O for a ready descriptor, or handle expired
   * deadlines when sockfd is SOCKET_TIMEOUT.
   */
  multiSocketAction(multi: MultiHandle, sockfd: number, evBitmask: number): SocketActionResult

  /** Pops one message from the engine's completion queue, or null when empty. */
  multiInfoRead(multi: MultiHandle): MultiMessage | null

  /** Human-readable description of a status code. */
  strerror(code: number): string
}

/**
 * A caller-configured transfer. Option setup and trust-store lookup live in
 * the binding; the adapter only asks for them to be finalised.
 */
export interface Transfer {
  readonly handle: NativeHandle

  /** Point the transfer at defaultPath unless it already has a CA bundle. */
  ensureCaBundle(defaultPath: string): void

  /** Richer description of a failure, e.g. from the transfer's error buffer. */
  describeError?(code: number, operation: string): string
}
