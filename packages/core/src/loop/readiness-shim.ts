/**
 * Readiness Shim integration
 *
 * Some loops cannot watch raw socket descriptors. For those, a shim runs an
 * auxiliary watcher and forwards readiness back onto the original loop. The
 * watcher itself is supplied by the host through a ReadinessShimFactory;
 * this module only decides when to use one and ties its lifetime to the loop.
 */

import type { BasicEventLoop, EventLoop, ReadinessCapableLoop } from '../interfaces/event-loop'
import type { Logger } from '../logging/logger'
import { defaultLogger } from '../logging/logger'
import { ReadinessUnavailableError } from '../core/errors'

export type ReadinessShimFactory = (loop: BasicEventLoop) => ReadinessCapableLoop

export const SHIM_WARNING =
  'Event loop does not support descriptor watches; registering an auxiliary readiness watcher. ' +
  'Use a loop with native descriptor watch support to avoid this.'

/** One shim per base loop, dropped when the base loop closes. */
const shims: Map<BasicEventLoop, ReadinessCapableLoop> = new Map()

/**
 * Return a loop that can watch descriptors: the loop itself when it already
 * can, otherwise the (cached) shim built around it.
 */
export function resolveReadinessLoop(
  loop: EventLoop,
  factory?: ReadinessShimFactory,
  logger: Logger = defaultLogger(),
): ReadinessCapableLoop {
  if (loop.descriptorWatch) return loop

  const existing = shims.get(loop)
  if (existing) return existing

  if (!factory) {
    throw new ReadinessUnavailableError()
  }

  logger.warn(SHIM_WARNING)

  const shim = factory(loop)
  shims.set(loop, shim)

  // Closing the base loop tears the shim down too. The original close is
  // restored first because the shim's own close may close the base loop.
  const baseClose = loop.close
  loop.close = () => {
    loop.close = baseClose
    shims.delete(loop)
    shim.close()
    baseClose.call(loop)
  }

  return shim
}

/** Whether a shim is currently registered for this loop. */
export function hasReadinessShim(loop: BasicEventLoop): boolean {
  return shims.has(loop)
}
