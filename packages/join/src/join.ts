/**
 * Join combinators over Futures.
 *
 * Each combinator consumes its input futures: it registers the single
 * continuation on every input and disposes the input handles. Partial
 * failure never aborts a join; every slot holds a value or an error.
 * An input that was already disposed makes the call throw NoStateError
 * before any input is consumed.
 */

import {
  ArrayJoinContext,
  RaceJoinContext,
  SinkJoinContext,
  TupleJoinContext,
} from "./contexts"
import type { Future, Try } from "@handoff/future"
import type {
  FutureTuple,
  JoinOptions,
  RaceResult,
  TryTuple,
} from "./contexts"

/**
 * Join a fixed list of futures of possibly different types.
 *
 * @example
 * ```typescript
 * const joined = joinAll(userFuture, countFuture)
 * joined.onResult((t) => {
 *   const [user, count] = getOrThrow(t)
 * })
 * ```
 */
export function joinAll<T extends Array<unknown>>(
  ...futures: FutureTuple<T>
): Future<TryTuple<T>> {
  return joinAllWith<T>({}, ...futures)
}

/**
 * `joinAll` with options.
 */
export function joinAllWith<T extends Array<unknown>>(
  options: JoinOptions,
  ...futures: FutureTuple<T>
): Future<TryTuple<T>> {
  const ctx = new TupleJoinContext<T>(futures.length, options)
  const future = ctx.future
  ctx.start(futures)
  return future
}

/**
 * Join a runtime-sized list of futures of one type. Outcome `i` belongs to
 * input `i`, whatever the completion order.
 */
export function joinArray<T>(
  futures: Iterable<Future<T>>,
  options?: JoinOptions
): Future<Array<Try<T>>> {
  const inputs = Array.from(futures)
  const ctx = new ArrayJoinContext<T>(inputs.length, options)
  const future = ctx.future
  ctx.start(inputs)
  return future
}

/**
 * Resolve with the index and outcome of the first input to complete.
 *
 * The race waits for every input before releasing, so `onRelease` runs
 * after the last one. Racing zero futures yields an EmptyRaceError.
 */
export function joinRace<T>(
  futures: Iterable<Future<T>>,
  options?: JoinOptions
): Future<RaceResult<T>> {
  const inputs = Array.from(futures)
  const ctx = new RaceJoinContext<T>(inputs.length, options)
  const future = ctx.future
  ctx.start(inputs)
  return future
}

/**
 * Call `sink` once with every outcome, in input order. Nothing is
 * returned to chain on.
 */
export function joinInto<T>(
  futures: Iterable<Future<T>>,
  sink: (results: Array<Try<T>>) => void,
  options?: JoinOptions
): void {
  const inputs = Array.from(futures)
  const ctx = new SinkJoinContext<T>(inputs.length, sink, options)
  ctx.start(inputs)
}
