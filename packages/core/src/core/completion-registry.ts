/**
 * Completion Registry
 *
 * Tracks in-flight transfers: transfer -> completion handle, and native
 * handle -> transfer so engine messages can be routed back. Every resolve
 * path removes both entries, detaches the transfer from the engine, then
 * settles the handle. The handle is settled even when detaching throws; the
 * error still propagates.
 */

import type { NativeHandle, Transfer } from '../interfaces/multi-binding'
import type { CompletionHandle } from './completion-handle'
import { DuplicateTransferError } from './errors'

/** Detaches a transfer from the native engine. */
export type DetachFn = (transfer: Transfer) => void

type SettleFn<T> = (handle: CompletionHandle<T>) => boolean

export class CompletionRegistry<T> {
  /** Map of transfer to the handle its caller awaits */
  private handles: Map<Transfer, CompletionHandle<T>> = new Map()

  /** Map of native handle to transfer, for engine messages */
  private transfers: Map<NativeHandle, Transfer> = new Map()

  constructor(private readonly detach: DetachFn) {}

  /**
   * Track a new transfer.
   *
   * @throws DuplicateTransferError if the transfer is already tracked
   */
  register(transfer: Transfer, handle: CompletionHandle<T>): void {
    if (this.handles.has(transfer)) {
      throw new DuplicateTransferError()
    }
    this.handles.set(transfer, handle)
    this.transfers.set(transfer.handle, transfer)
  }

  lookup(nativeHandle: NativeHandle): Transfer | undefined {
    return this.transfers.get(nativeHandle)
  }

  has(transfer: Transfer): boolean {
    return this.handles.has(transfer)
  }

  get size(): number {
    return this.handles.size
  }

  /**
   * Settle a finished transfer with a value.
   * @returns true if a pending handle was settled
   */
  resolveOk(nativeHandle: NativeHandle, value: T): boolean {
    return this.popByNative(nativeHandle, (handle) => handle.resolve(value))
  }

  resolveError(nativeHandle: NativeHandle, error: Error): boolean {
    return this.popByNative(nativeHandle, (handle) => handle.reject(error))
  }

  resolveCancelled(transfer: Transfer): boolean {
    return this.pop(transfer, (handle) => handle.cancel())
  }

  /**
   * Detach every remaining transfer and settle its handle with value.
   * Handles that are already terminal are left as they are. Every transfer
   * is drained even if a detach throws; the first such error is rethrown.
   */
  drainAll(value: T): void {
    const failures: unknown[] = []
    for (const transfer of [...this.handles.keys()]) {
      try {
        this.pop(transfer, (handle) => handle.resolve(value))
      } catch (err) {
        failures.push(err)
      }
    }
    if (failures.length > 0) throw failures[0]
  }

  private popByNative(nativeHandle: NativeHandle, settle: SettleFn<T>): boolean {
    const transfer = this.transfers.get(nativeHandle)
    return transfer ? this.pop(transfer, settle) : false
  }

  private pop(transfer: Transfer, settle: SettleFn<T>): boolean {
    const handle = this.handles.get(transfer)
    if (!handle) return false

    this.handles.delete(transfer)
    this.transfers.delete(transfer.handle)
    let settled = false
    try {
      this.detach(transfer)
    } finally {
      settled = settle(handle)
    }
    return settled
  }
}
