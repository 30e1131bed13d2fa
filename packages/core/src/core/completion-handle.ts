import { TransferCancelledError } from './errors'

export type CompletionState = 'pending' | 'fulfilled' | 'rejected' | 'cancelled'

type Settlement<T> =
  | { state: 'pending' }
  | { state: 'fulfilled'; value: T }
  | { state: 'rejected'; error: Error }
  | { state: 'cancelled'; error: TransferCancelledError }

/**
 * Single-assignment completion value for one transfer.
 *
 * The first of resolve/reject/cancel wins; later calls return false and
 * change nothing. Awaitable directly. The backing promise is only created
 * once someone calls then(), so a rejection nobody awaits is never reported
 * as unhandled.
 */
export class CompletionHandle<T> implements PromiseLike<T> {
  private settlement: Settlement<T> = { state: 'pending' }
  private promise: Promise<T> | null = null
  private settlePromise: ((settlement: Settlement<T>) => void) | null = null

  get state(): CompletionState {
    return this.settlement.state
  }

  get done(): boolean {
    return this.settlement.state !== 'pending'
  }

  resolve(value: T): boolean {
    return this.settle({ state: 'fulfilled', value })
  }

  reject(error: Error): boolean {
    return this.settle({ state: 'rejected', error })
  }

  cancel(reason?: string): boolean {
    return this.settle({ state: 'cancelled', error: new TransferCancelledError(reason) })
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null,
  ): Promise<R1 | R2> {
    return this.toPromise().then(onfulfilled, onrejected)
  }

  private toPromise(): Promise<T> {
    if (!this.promise) {
      this.promise = new Promise<T>((resolve, reject) => {
        const apply = (settlement: Settlement<T>): void => {
          if (settlement.state === 'fulfilled') resolve(settlement.value)
          else if (settlement.state !== 'pending') reject(settlement.error)
        }
        if (this.settlement.state === 'pending') {
          this.settlePromise = apply
        } else {
          apply(this.settlement)
        }
      })
    }
    return this.promise
  }

  private settle(settlement: Settlement<T>): boolean {
    if (this.settlement.state !== 'pending') return false
    this.settlement = settlement
    const settlePromise = this.settlePromise
    this.settlePromise = null
    settlePromise?.(settlement)
    return true
  }
}
