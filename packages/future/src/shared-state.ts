/**
 * SharedState - the object bridging one producer and one consumer of a
 * single asynchronous value.
 *
 * It holds the eventual result, the consumer's continuation and the
 * bookkeeping that decides when the continuation fires and when the
 * state is torn down. Nothing owns it: each side detaches independently
 * and the state is torn down once both have.
 *
 * Every operation performs its state transition in one synchronous block.
 * User code (the continuation) only ever runs after that block has ended,
 * so a continuation may call back into the same state.
 */

import {
  AlreadyDetachedError,
  BrokenPromiseError,
  DoubleSetError,
  NotReadyError,
} from "./error"
import { tryError } from "./try"
import type { Scheduler } from "./scheduler"
import type { Try } from "./try"

/**
 * Consumes the committed result exactly once.
 */
export type Continuation<T> = (result: Try<T>) => void

function discard(): void {}

export class SharedState<T> {
  #result: Try<T> | undefined
  #continuation: Continuation<T> | undefined
  #fired = false
  #consumerDetached = false
  #producerDetached = false
  #active = true
  #scheduler: Scheduler | undefined
  #destroyed = false

  /**
   * Get the committed result.
   *
   * @throws {NotReadyError} if no result has been committed
   */
  readResult(): Try<T> {
    if (this.#result === undefined) {
      throw new NotReadyError()
    }
    return this.#result
  }

  hasResult(): boolean {
    return this.#result !== undefined
  }

  /**
   * Install the consumer's continuation.
   *
   * @throws {DoubleSetError} if a continuation is already installed
   */
  setContinuation(fn: Continuation<T>): void {
    if (this.#continuation !== undefined) {
      throw new DoubleSetError(`continuation`)
    }
    this.#continuation = fn
    this.#maybeFire()
  }

  /**
   * Commit the producer's outcome.
   *
   * @throws {DoubleSetError} if a result is already committed
   */
  setResult(result: Try<T>): void {
    if (this.#result !== undefined) {
      throw new DoubleSetError(`result`)
    }
    this.#result = result
    this.#maybeFire()
  }

  /**
   * Called when the consumer handle is discarded. A result that nobody
   * listens to is still retired, so the state can be torn down.
   */
  detachConsumerSide(): void {
    if (this.#consumerDetached) {
      throw new AlreadyDetachedError(`consumer`)
    }
    // A throwing continuation still leaves this side detached.
    try {
      if (this.#continuation === undefined) {
        this.setContinuation(discard)
      }
      this.activate()
    } finally {
      this.#consumerDetached = true
      this.#maybeDestroy()
    }
  }

  /**
   * Called when the producer handle is discarded. A consumer still waiting
   * receives a BrokenPromiseError.
   */
  detachProducerSide(): void {
    if (this.#producerDetached) {
      throw new AlreadyDetachedError(`producer`)
    }
    try {
      if (this.#result === undefined) {
        this.setResult(tryError(new BrokenPromiseError()))
      }
    } finally {
      this.#producerDetached = true
      this.#maybeDestroy()
    }
  }

  /**
   * Suspend delivery. A committed result is kept, not discarded.
   * No-op once the consumer side has detached.
   */
  deactivate(): void {
    if (this.#consumerDetached) return
    this.#active = false
  }

  /**
   * Resume delivery, firing immediately if result and continuation are
   * both present.
   */
  activate(): void {
    this.#active = true
    this.#maybeFire()
  }

  isActive(): boolean {
    return this.#active
  }

  /**
   * Route future firings through `scheduler`. Has no effect on a
   * continuation that already fired.
   */
  setScheduler(scheduler: Scheduler): void {
    this.#scheduler = scheduler
  }

  /**
   * Whether the continuation has run or been handed to a scheduler.
   */
  hasFired(): boolean {
    return this.#fired
  }

  /**
   * Number of sides (0, 1 or 2) that have detached.
   */
  get detachCount(): number {
    return Number(this.#consumerDetached) + Number(this.#producerDetached)
  }

  isDestroyed(): boolean {
    return this.#destroyed
  }

  #maybeFire(): void {
    const result = this.#result
    const continuation = this.#continuation
    if (
      this.#fired ||
      result === undefined ||
      continuation === undefined ||
      !this.#active
    ) {
      return
    }

    this.#fired = true
    const scheduler = this.#scheduler
    if (scheduler) {
      scheduler.add(() => continuation(result))
      return
    }

    continuation(result)
  }

  #maybeDestroy(): void {
    // Both detaches force a result and an active continuation, so the
    // continuation has fired (or been scheduled) by now.
    if (this.detachCount < 2) return

    this.#destroyed = true
    this.#continuation = undefined
    this.#scheduler = undefined
    this.#result = undefined
  }
}
