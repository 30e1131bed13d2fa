/**
 * A transfer finished with a non-success status code from the engine.
 * Delivered only through that transfer's completion handle.
 */
export class TransferError extends Error {
  constructor(
    public readonly code: number,
    public readonly operation: string,
    description: string,
  ) {
    super(`Failed to ${operation}, code ${code}: ${description}`)
    this.name = 'TransferError'
  }
}

export class TransferCancelledError extends Error {
  constructor(message = 'Transfer was cancelled') {
    super(message)
    this.name = 'TransferCancelledError'
  }
}

/**
 * The engine asked to drop interest in a descriptor the adapter never watched.
 * The watch set and the engine disagree, which is a bug rather than a transfer failure.
 */
export class WatchSetDesyncError extends Error {
  constructor(public readonly descriptor: number) {
    super(`File descriptor ${descriptor} not found.`)
    this.name = 'WatchSetDesyncError'
  }
}

export class DuplicateTransferError extends Error {
  constructor() {
    super('Transfer is already registered with this adapter')
    this.name = 'DuplicateTransferError'
  }
}

export class AdapterClosedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: adapter is closed`)
    this.name = 'AdapterClosedError'
  }
}

/** A multi-handle call returned a non-zero code. */
export class MultiError extends Error {
  constructor(
    public readonly code: number,
    public readonly operation: string,
    description: string,
  ) {
    super(`${operation} failed with code ${code}: ${description}`)
    this.name = 'MultiError'
  }
}

export class ReadinessUnavailableError extends Error {
  constructor() {
    super(
      'Event loop does not support descriptor watches and no readiness shim was provided',
    )
    this.name = 'ReadinessUnavailableError'
  }
}

export class LoopClosedError extends Error {
  constructor() {
    super('Event loop is closed')
    this.name = 'LoopClosedError'
  }
}
