// Core
export { AsyncMulti } from './core/async-multi'
export type { AsyncMultiOptions, TransferResult, TransferCompletion } from './core/async-multi'
export { CompletionHandle } from './core/completion-handle'
export type { CompletionState } from './core/completion-handle'
export { CompletionRegistry } from './core/completion-registry'
export {
  TransferError,
  TransferCancelledError,
  WatchSetDesyncError,
  DuplicateTransferError,
  AdapterClosedError,
  MultiError,
  ReadinessUnavailableError,
  LoopClosedError,
} from './core/errors'

// Interfaces
export type {
  EventLoop,
  BasicEventLoop,
  ReadinessCapableLoop,
  TimerHandle,
} from './interfaces/event-loop'
export type {
  MultiBinding,
  MultiHandle,
  NativeHandle,
  MultiMessage,
  MultiCallbacks,
  MultiOptionCode,
  SocketActionResult,
  SocketCallback,
  TimerCallback,
  Transfer,
} from './interfaces/multi-binding'
export {
  PollInterest,
  SelectEvent,
  SOCKET_TIMEOUT,
  SOCKET_BAD,
  MessageKind,
  MultiOption,
  STATUS_OK,
} from './interfaces/multi-binding'

// Loops
export { NodeEventLoop } from './loop/node-event-loop'
export { resolveReadinessLoop, hasReadinessShim } from './loop/readiness-shim'
export type { ReadinessShimFactory } from './loop/readiness-shim'

// Settings
export type { Settings, SettingKey } from './settings/schema'
export {
  settingsSchema,
  resolveSettings,
  validateValue,
  getDefaultValue,
  getDefaults,
  DEFAULT_CA_BUNDLE,
} from './settings/schema'

// Logging
export type { Logger, LogEntry, LogLevel, LoggingConfig, ILoggingHost } from './logging/logger'
export { ConsoleLoggingHost, LoopComponent, defaultLogger } from './logging/logger'

// Presets
export { createNodeMulti } from './presets/node'
export type { NodeMultiConfig, NodeMulti } from './presets/node'
