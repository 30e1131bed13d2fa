import type { EventLoop, ReadinessCapableLoop, TimerHandle } from '../interfaces/event-loop'
import type {
  MultiBinding,
  MultiHandle,
  MultiOptionCode,
  NativeHandle,
  Transfer,
} from '../interfaces/multi-binding'
import {
  MessageKind,
  SelectEvent,
  SOCKET_TIMEOUT,
  STATUS_OK,
} from '../interfaces/multi-binding'
import type { ILoggingHost } from '../logging/logger'
import { ConsoleLoggingHost, LoopComponent } from '../logging/logger'
import type { ReadinessShimFactory } from '../loop/readiness-shim'
import { resolveReadinessLoop } from '../loop/readiness-shim'
import { NodeEventLoop } from '../loop/node-event-loop'
import type { Settings } from '../settings/schema'
import { effectiveCaBundle, resolveSettings } from '../settings/schema'
import type { BridgeTarget } from './callback-bridge'
import { contextRegistry, socketFunction, timerFunction } from './callback-bridge'
import type { CompletionHandle } from './completion-handle'
import { CompletionRegistry } from './completion-registry'
import { AdapterClosedError, DuplicateTransferError, MultiError, TransferError } from './errors'

/**
 * Outcome of a transfer: the transfer itself when it completed, null when
 * the adapter closed before it could finish.
 */
export type TransferResult = Transfer | null

export type TransferCompletion = CompletionHandle<TransferResult>

export interface AsyncMultiOptions extends Partial<Settings> {
  /** Loop to run on. Defaults to a fresh NodeEventLoop. */
  loop?: EventLoop
  /** Builds descriptor watch support for loops that lack it. */
  readinessShim?: ReadinessShimFactory
  loggingHost?: ILoggingHost
}

/**
 * Drives a native multi-transfer engine from a single cooperative event loop.
 *
 * The engine tells us which descriptors and deadlines it cares about through
 * the callback bridge; the loop calls processData back when one is ready; and
 * processData advances the engine and settles whichever transfers finished.
 *
 * Events:
 * - 'transfer-done' (transfer)
 * - 'transfer-error' (transfer, error)
 * - 'closed' ()
 */
export class AsyncMulti extends LoopComponent {
  static logName = 'async-multi'

  readonly loop: ReadinessCapableLoop

  /** Watch Set: descriptors with a reader and/or writer on the loop. */
  private readonly sockets: Set<number> = new Set()
  private readonly retiredSockets: Set<number> = new Set()
  /** Timer Set: engine deadlines scheduled and not yet fired or cancelled. */
  private readonly timers: Set<TimerHandle> = new Set()

  /** Loop created here rather than passed in; closed along with the adapter. */
  private readonly ownedLoop: EventLoop | null
  private multi: MultiHandle | null
  private readonly settings: Settings
  private readonly registry: CompletionRegistry<TransferResult>
  private readonly token: number
  private checker: TimerHandle | null = null

  constructor(
    private readonly binding: MultiBinding,
    options: AsyncMultiOptions = {},
  ) {
    const settings = resolveSettings(options)
    super(options.loggingHost ?? new ConsoleLoggingHost({ level: settings.logLevel }))
    this.settings = settings

    const baseLoop = options.loop ?? new NodeEventLoop()
    this.ownedLoop = options.loop ? null : baseLoop
    this.loop = resolveReadinessLoop(baseLoop, options.readinessShim, this.logger)
    this.multi = binding.multiInit()
    this.registry = new CompletionRegistry((transfer) => this.detach(transfer))
    this.token = contextRegistry.register(this.bridgeTarget())
    this.instanceKey = String(this.token)
    this.setup()
    this.scheduleForceTimeout()
  }

  /** The view of this adapter the engine callbacks work on. */
  private bridgeTarget(): BridgeTarget {
    return {
      loop: this.loop,
      sockets: this.sockets,
      retiredSockets: this.retiredSockets,
      timers: this.timers,
      processData: (sockfd, evBitmask) => this.processData(sockfd, evBitmask),
    }
  }

  private setup(): void {
    const multi = this.requireMulti('install callbacks')
    const code = this.binding.multiSetCallbacks(multi, {
      timer: timerFunction,
      socket: socketFunction,
      context: this.token,
    })
    if (code !== STATUS_OK) {
      throw new MultiError(code, 'multiSetCallbacks', this.binding.strerror(code))
    }
  }

  get closed(): boolean {
    return this.multi === null
  }

  /** Snapshot of the Watch Set. */
  get watchedDescriptors(): ReadonlySet<number> {
    return new Set(this.sockets)
  }

  get pendingTimers(): number {
    return this.timers.size
  }

  get pendingTransfers(): number {
    return this.registry.size
  }

  /**
   * Hand a configured transfer to the engine. The returned handle settles
   * once the engine reports the transfer finished; nothing needs polling.
   */
  addHandle(transfer: Transfer): TransferCompletion {
    const multi = this.requireMulti('add a transfer')
    if (this.registry.has(transfer)) {
      throw new DuplicateTransferError()
    }
    transfer.ensureCaBundle(effectiveCaBundle(this.settings))

    const code = this.binding.multiAddHandle(multi, transfer.handle)
    if (code !== STATUS_OK) {
      throw new MultiError(code, 'multiAddHandle', this.binding.strerror(code))
    }

    const handle = this.loop.createCompletion<TransferResult>()
    this.registry.register(transfer, handle)
    this.logger.debug(`Added transfer, ${this.registry.size} pending`)
    return handle
  }

  /** Cancel a transfer. Its awaiting caller sees TransferCancelledError. */
  removeHandle(transfer: Transfer): void {
    if (this.registry.resolveCancelled(transfer)) {
      this.logger.debug('Cancelled transfer')
    }
  }

  /**
   * Let the engine act on a descriptor event, or on expired deadlines when
   * sockfd is SOCKET_TIMEOUT.
   * @returns number of transfers still running
   */
  socketAction(sockfd: number, evBitmask: number): number {
    const multi = this.requireMulti('run socket action')
    return this.binding.multiSocketAction(multi, sockfd, evBitmask).runningHandles
  }

  /** Set a numeric multi-handle option. */
  setopt(option: MultiOptionCode, value: number): number {
    const multi = this.requireMulti('set an option')
    return this.binding.multiSetopt(multi, option, value)
  }

  /**
   * Drive loop: advance the engine for one event, then settle every transfer
   * the engine reports as finished. Runs to completion without suspending.
   */
  processData(sockfd: number, evBitmask: number): void {
    const multi = this.multi
    if (multi === null) {
      this.logger.warn('Multi handle already closed, ignoring processData')
      return
    }

    this.binding.multiSocketAction(multi, sockfd, evBitmask)

    let message = this.binding.multiInfoRead(multi)
    while (message !== null) {
      if (message.msg === MessageKind.DONE) {
        try {
          this.settle(message.easyHandle, message.result)
        } catch (err) {
          this.logger.error('Failed to settle finished transfer', err)
        }
      } else {
        this.logger.warn(`Unexpected message kind ${message.msg} from engine, skipping`)
      }

      // A settle may have closed us from a listener.
      if (this.multi === null) return
      message = this.binding.multiInfoRead(multi)
    }
  }

  /**
   * Stop driving transfers. Pending transfers are detached and settled with
   * null rather than an error; loop watches and timers are removed, and a loop
   * the adapter created itself is closed. Safe to call more than once.
   *
   * Teardown completes even when detaching a transfer throws; the first such
   * error is rethrown afterwards.
   */
  close(): void {
    const multi = this.multi
    if (multi === null) return

    this.checker?.cancel()
    this.checker = null

    try {
      this.registry.drainAll(null)
    } finally {
      this.teardown(multi)
    }
  }

  private teardown(multi: MultiHandle): void {
    this.binding.multiCleanup(multi)
    this.multi = null
    contextRegistry.release(this.token)

    for (const sockfd of this.sockets) {
      this.loop.removeReader(sockfd)
      this.loop.removeWriter(sockfd)
    }
    this.sockets.clear()
    this.retiredSockets.clear()

    for (const timer of this.timers) {
      timer.cancel()
    }
    this.timers.clear()

    // Also closes any shim built around it.
    this.ownedLoop?.close()

    this.logger.info('Closed')
    this.emit('closed')
  }

  private settle(easyHandle: NativeHandle, result: number): void {
    const transfer = this.registry.lookup(easyHandle)
    if (!transfer) {
      this.logger.debug('Completion for unknown transfer, ignoring')
      return
    }

    if (result === STATUS_OK) {
      this.registry.resolveOk(easyHandle, transfer)
      this.emit('transfer-done', transfer)
      return
    }

    const description = transfer.describeError?.(result, 'perform') ?? this.binding.strerror(result)
    const error = new TransferError(result, 'perform', description)
    this.registry.resolveError(easyHandle, error)
    this.emit('transfer-error', transfer, error)
  }

  private detach(transfer: Transfer): void {
    if (this.multi === null) return
    this.binding.multiRemoveHandle(this.multi, transfer.handle)
  }

  /**
   * Periodic nudge so the engine notices transfers that no socket or timer
   * event would otherwise wake (DNS-only phases, connect timeouts).
   */
  private scheduleForceTimeout(): void {
    this.checker = this.loop.callLater(this.settings.forceTimeoutIntervalMs, () => {
      this.checker = null
      if (this.closed) return
      this.processData(SOCKET_TIMEOUT, SelectEvent.NONE)
      if (!this.closed) this.scheduleForceTimeout()
    })
  }

  private requireMulti(operation: string): MultiHandle {
    if (this.multi === null) {
      throw new AdapterClosedError(operation)
    }
    return this.multi
  }
}
