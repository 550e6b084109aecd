/**
 * Join contexts: the shared bookkeeping behind each join combinator.
 *
 * A context is shared by the N continuations registered on its inputs.
 * Each continuation updates the context in one synchronous step, so the
 * pre-increment `++count === total` picks exactly one "last finisher"
 * whatever the completion order.
 */

import { Deferred, NoStateError } from "@handoff/future"
import { EmptyRaceError } from "./error"
import type { Future, Try } from "@handoff/future"

/**
 * Options shared by every join combinator.
 */
export interface JoinOptions {
  /**
   * Called once, after every input has reported and the context has let
   * go of its output. Never called when the join rejects its inputs up
   * front.
   */
  onRelease?: () => void
}

/**
 * Outcome of a race: which input finished first and how.
 */
export interface RaceResult<T> {
  index: number
  result: Try<T>
}

/**
 * Outcomes of a fixed list of futures, slot for slot.
 */
export type TryTuple<T extends Array<unknown>> = {
  [K in keyof T]: Try<T[K]>
}

/**
 * A fixed, heterogeneous list of futures.
 */
export type FutureTuple<T extends Array<unknown>> = {
  [K in keyof T]: Future<T[K]>
}

/**
 * Install `onTry` on `future`, then release the consumer handle.
 */
function consume<T>(future: Future<T>, onTry: (result: Try<T>) => void): void {
  try {
    future.onResult(onTry)
  } finally {
    future.dispose()
  }
}

function disposedInputError(): NoStateError {
  return new NoStateError(`Cannot join a future that was already disposed`)
}

/**
 * Joins a fixed-arity, heterogeneous list into one tuple of outcomes.
 */
export class TupleJoinContext<T extends Array<unknown>> {
  readonly #deferred = new Deferred<TryTuple<T>>()
  readonly #results: Array<Try<unknown>> = []
  readonly #total: number
  readonly #options: JoinOptions
  #count = 0

  constructor(total: number, options: JoinOptions = {}) {
    this.#total = total
    this.#options = options
  }

  get future(): Future<TryTuple<T>> {
    return this.#deferred.future
  }

  /**
   * Register one continuation per input, each tagged with its slot.
   *
   * @throws {NoStateError} if any input is already disposed; no input is
   * touched in that case
   */
  start(futures: FutureTuple<T>): void {
    if (futures.some((future) => future.disposed)) {
      throw disposedInputError()
    }
    if (this.#total === 0) {
      this.#finish()
      return
    }
    futures.forEach((future, index) => {
      consume(future, (result) => {
        this.#results[index] = result
        if (++this.#count === this.#total) {
          this.#finish()
        }
      })
    })
  }

  #finish(): void {
    try {
      // Every slot 0..total-1 is filled, matching T position by position.
      this.#deferred.setValue(this.#results as TryTuple<T>)
    } finally {
      this.#deferred.dispose()
      this.#options.onRelease?.()
    }
  }
}

/**
 * Joins a runtime-sized, homogeneous list. Outcomes keep input order.
 */
export class ArrayJoinContext<T> {
  readonly #deferred = new Deferred<Array<Try<T>>>()
  readonly #results: Array<Try<T>>
  readonly #options: JoinOptions
  #count = 0

  constructor(total: number, options: JoinOptions = {}) {
    this.#results = new Array<Try<T>>(total)
    this.#options = options
  }

  get future(): Future<Array<Try<T>>> {
    return this.#deferred.future
  }

  start(futures: ReadonlyArray<Future<T>>): void {
    if (futures.some((future) => future.disposed)) {
      throw disposedInputError()
    }
    const total = this.#results.length
    if (total === 0) {
      this.#finish()
      return
    }
    futures.forEach((future, index) => {
      consume(future, (result) => {
        this.#results[index] = result
        if (++this.#count === total) {
          this.#finish()
        }
      })
    })
  }

  #finish(): void {
    try {
      this.#deferred.setValue(this.#results)
    } finally {
      this.#deferred.dispose()
      this.#options.onRelease?.()
    }
  }
}

/**
 * Delivers the first finisher while waiting for all N inputs.
 *
 * `#done` decides who delivers (first to finish); `#refCount` decides who
 * releases (last to finish).
 */
export class RaceJoinContext<T> {
  readonly #deferred = new Deferred<RaceResult<T>>()
  readonly #options: JoinOptions
  #done = false
  #refCount: number

  constructor(total: number, options: JoinOptions = {}) {
    this.#refCount = total
    this.#options = options
  }

  get future(): Future<RaceResult<T>> {
    return this.#deferred.future
  }

  /**
   * Number of inputs that have not reported yet.
   */
  get refCount(): number {
    return this.#refCount
  }

  start(futures: ReadonlyArray<Future<T>>): void {
    if (futures.some((future) => future.disposed)) {
      throw disposedInputError()
    }
    if (this.#refCount === 0) {
      try {
        this.#deferred.setError(new EmptyRaceError())
      } finally {
        this.#release()
      }
      return
    }
    futures.forEach((future, index) => {
      consume(future, (result) => {
        try {
          if (!this.#done) {
            this.#done = true
            this.#deferred.setValue({ index, result })
          }
        } finally {
          this.#decref()
        }
      })
    })
  }

  #decref(): void {
    if (--this.#refCount === 0) {
      this.#release()
    }
  }

  #release(): void {
    this.#deferred.dispose()
    this.#options.onRelease?.()
  }
}

/**
 * Terminal join: hands all outcomes to a plain callback instead of a
 * future.
 */
export class SinkJoinContext<T> {
  readonly #sink: (results: Array<Try<T>>) => void
  readonly #results: Array<Try<T>>
  readonly #options: JoinOptions
  #count = 0

  constructor(
    total: number,
    sink: (results: Array<Try<T>>) => void,
    options: JoinOptions = {}
  ) {
    this.#sink = sink
    this.#results = new Array<Try<T>>(total)
    this.#options = options
  }

  start(futures: ReadonlyArray<Future<T>>): void {
    if (futures.some((future) => future.disposed)) {
      throw disposedInputError()
    }
    const total = this.#results.length
    if (total === 0) {
      this.#finish()
      return
    }
    futures.forEach((future, index) => {
      consume(future, (result) => {
        this.#results[index] = result
        if (++this.#count === total) {
          this.#finish()
        }
      })
    })
  }

  #finish(): void {
    try {
      this.#sink(this.#results)
    } finally {
      this.#options.onRelease?.()
    }
  }
}
