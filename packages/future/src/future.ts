/**
 * Future and Deferred - the consumer and producer handles over a
 * SharedState.
 *
 * Each SharedState has exactly one of each. Disposing a handle detaches
 * its side; once both sides are disposed the state is torn down.
 */

import { FutureAlreadyRetrievedError, NoStateError } from "./error"
import { SharedState } from "./shared-state"
import { getOrThrow, toError, tryCatch, tryError, tryValue } from "./try"
import type { Continuation } from "./shared-state"
import type { Scheduler } from "./scheduler"
import type { Try } from "./try"

/**
 * Consumer handle: reads the result or registers the single continuation.
 *
 * @example
 * ```typescript
 * const deferred = new Deferred<number>()
 * const future = deferred.future
 *
 * future.onResult((t) => console.log(t))
 * deferred.setValue(42)
 * ```
 */
export class Future<T> {
  #state: SharedState<T> | undefined

  /**
   * @internal Use `new Deferred<T>().future` or a constructor function.
   */
  constructor(state: SharedState<T>) {
    this.#state = state
  }

  #requireState(): SharedState<T> {
    if (!this.#state) {
      throw new NoStateError()
    }
    return this.#state
  }

  isReady(): boolean {
    return this.#requireState().hasResult()
  }

  /**
   * Get the committed outcome without waiting.
   *
   * @throws {NotReadyError} if no result has been committed
   */
  getTry(): Try<T> {
    return this.#requireState().readResult()
  }

  /**
   * Get the committed value, throwing the committed error if it failed.
   *
   * @throws {NotReadyError} if no result has been committed
   */
  value(): T {
    return getOrThrow(this.getTry())
  }

  /**
   * Register the continuation. It runs exactly once, inline or on the
   * installed scheduler.
   *
   * @throws {DoubleSetError} if a continuation is already registered
   */
  onResult(fn: Continuation<T>): void {
    this.#requireState().setContinuation(fn)
  }

  /**
   * Deliver the result through `scheduler` instead of inline.
   * Install it before the continuation can fire.
   */
  via(scheduler: Scheduler): this {
    this.#requireState().setScheduler(scheduler)
    return this
  }

  activate(): this {
    this.#requireState().activate()
    return this
  }

  deactivate(): this {
    this.#requireState().deactivate()
    return this
  }

  isActive(): boolean {
    return this.#requireState().isActive()
  }

  /**
   * Whether this handle has been disposed.
   */
  get disposed(): boolean {
    return this.#state === undefined
  }

  /**
   * Release the consumer side. An unconsumed result is discarded.
   * Safe to call more than once.
   */
  dispose(): void {
    const state = this.#state
    if (!state) return
    this.#state = undefined
    state.detachConsumerSide()
  }

  /**
   * Bridge to a native Promise. Consumes and disposes this handle.
   */
  toPromise(): Promise<T> {
    const state = this.#requireState()
    let settle!: Continuation<T>
    const promise = new Promise<T>((resolve, reject) => {
      settle = (t) => {
        if (t.kind === `error`) {
          reject(t.error)
        } else {
          resolve(t.value)
        }
      }
    })
    // Installed outside the executor so DoubleSetError throws here.
    state.setContinuation(settle)
    this.dispose()
    return promise
  }
}

/**
 * Producer handle: commits the outcome exactly once.
 *
 * Disposing a Deferred that never committed delivers a
 * BrokenPromiseError to the consumer.
 */
export class Deferred<T> {
  #state: SharedState<T> | undefined
  #future: Future<T> | undefined

  constructor() {
    const state = new SharedState<T>()
    this.#state = state
    this.#future = new Future(state)
  }

  #requireState(): SharedState<T> {
    if (!this.#state) {
      throw new NoStateError()
    }
    return this.#state
  }

  /**
   * The consumer handle. Can be retrieved once.
   *
   * @throws {FutureAlreadyRetrievedError} on the second access
   */
  get future(): Future<T> {
    const future = this.#future
    if (!future) {
      throw new FutureAlreadyRetrievedError()
    }
    this.#future = undefined
    return future
  }

  /**
   * @throws {DoubleSetError} if already fulfilled
   */
  setTry(result: Try<T>): void {
    this.#requireState().setResult(result)
  }

  setValue(value: T): void {
    this.setTry(tryValue(value))
  }

  setError(error: Error): void {
    this.setTry(tryError(error))
  }

  /**
   * Commit the outcome of calling `fn`, capturing a thrown error.
   */
  setWith(fn: () => T): void {
    this.setTry(tryCatch(fn))
  }

  isFulfilled(): boolean {
    return this.#requireState().hasResult()
  }

  get disposed(): boolean {
    return this.#state === undefined
  }

  /**
   * Release the producer side. Safe to call more than once.
   */
  dispose(): void {
    const state = this.#state
    if (!state) return
    this.#state = undefined
    state.detachProducerSide()
  }
}

function settled<T>(result: Try<T>): Future<T> {
  const deferred = new Deferred<T>()
  const future = deferred.future
  deferred.setTry(result)
  deferred.dispose()
  return future
}

/**
 * A future that is already fulfilled with `value`.
 */
export function makeFuture<T>(value: T): Future<T> {
  return settled(tryValue(value))
}

/**
 * A future that already carries `error`.
 */
export function makeFailedFuture<T = never>(error: Error): Future<T> {
  return settled(tryError<T>(error))
}

/**
 * Adapt a native promise. The producer side detaches once the promise
 * settles.
 */
export function fromPromise<T>(promise: PromiseLike<T>): Future<T> {
  const deferred = new Deferred<T>()
  const future = deferred.future
  Promise.resolve(promise)
    .then(
      (value) => {
        try {
          deferred.setValue(value)
        } finally {
          deferred.dispose()
        }
      },
      (err: unknown) => {
        try {
          deferred.setError(toError(err))
        } finally {
          deferred.dispose()
        }
      }
    )
    .catch((err: unknown) => {
      // Only an inline continuation can throw here.
      console.error(`[fromPromise] Continuation threw:`, err)
    })
  return future
}
