/**
 * Future Error Classes
 *
 * Contract violations are thrown synchronously at the call site.
 * BrokenPromiseError is delivered through the result channel instead.
 */

/**
 * Which write-once slot of a shared state was written twice.
 */
export type SharedSlot = `result` | `continuation`

/**
 * Which side of a shared state released its handle.
 */
export type SharedSide = `consumer` | `producer`

/**
 * Error thrown when reading a result that has not been committed yet.
 */
export class NotReadyError extends Error {
  constructor(message = `Result has not been set yet`) {
    super(message)
    this.name = `NotReadyError`
  }
}

/**
 * Error thrown when the result or the continuation is set a second time.
 */
export class DoubleSetError extends Error {
  /**
   * The slot that was already written.
   */
  readonly slot: SharedSlot

  constructor(slot: SharedSlot, message?: string) {
    super(message ?? `The ${slot} has already been set`)
    this.name = `DoubleSetError`
    this.slot = slot
  }
}

/**
 * Error thrown when the same side detaches from a shared state twice.
 */
export class AlreadyDetachedError extends Error {
  readonly side: SharedSide

  constructor(side: SharedSide, message?: string) {
    super(message ?? `The ${side} side has already detached`)
    this.name = `AlreadyDetachedError`
    this.side = side
  }
}

/**
 * Delivered to the consumer when the producer is disposed without ever
 * committing a result.
 */
export class BrokenPromiseError extends Error {
  constructor(message = `Producer was disposed without setting a result`) {
    super(message)
    this.name = `BrokenPromiseError`
  }
}

/**
 * Error thrown when a disposed handle is used.
 */
export class NoStateError extends Error {
  constructor(message = `Handle has no shared state (already disposed)`) {
    super(message)
    this.name = `NoStateError`
  }
}

/**
 * Error thrown when the consumer handle of a Deferred is requested twice.
 */
export class FutureAlreadyRetrievedError extends Error {
  constructor(message = `Future has already been retrieved from this Deferred`) {
    super(message)
    this.name = `FutureAlreadyRetrievedError`
  }
}
