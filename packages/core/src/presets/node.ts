import { AsyncMulti } from '../core/async-multi'
import type { AsyncMultiOptions } from '../core/async-multi'
import type { MultiBinding } from '../interfaces/multi-binding'
import type { LogEntry } from '../logging/logger'
import { ConsoleLoggingHost } from '../logging/logger'
import type { ReadinessShimFactory } from '../loop/readiness-shim'
import { NodeEventLoop } from '../loop/node-event-loop'
import { resolveSettings } from '../settings/schema'

export interface NodeMultiConfig extends Omit<AsyncMultiOptions, 'loop' | 'readinessShim'> {
  /** Node cannot watch raw descriptors, so a shim is always needed here. */
  readinessShim: ReadinessShimFactory
  onLog?: (entry: LogEntry) => void
}

export interface NodeMulti {
  multi: AsyncMulti
  loop: NodeEventLoop
}

/**
 * Build an adapter on a fresh NodeEventLoop. Closing the returned loop also
 * closes the shim built around it; close the adapter first.
 */
export function createNodeMulti(binding: MultiBinding, config: NodeMultiConfig): NodeMulti {
  const { onLog, ...options } = config
  const loop = new NodeEventLoop()
  const loggingHost =
    options.loggingHost ??
    new ConsoleLoggingHost({ level: resolveSettings(options).logLevel }, undefined, onLog)

  const multi = new AsyncMulti(binding, {
    ...options,
    loop,
    loggingHost,
  })

  return { multi, loop }
}
