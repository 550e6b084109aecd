/**
 * @handoff/future
 *
 * Write-once futures over a shared state with a single continuation.
 *
 * A Deferred (producer) commits one value or error; its Future (consumer)
 * registers one continuation that runs exactly once, inline or through a
 * Scheduler.
 *
 * @packageDocumentation
 */

// Handles
export {
  Deferred,
  Future,
  fromPromise,
  makeFailedFuture,
  makeFuture,
} from "./future"

// Shared state
export { SharedState } from "./shared-state"
export type { Continuation } from "./shared-state"

// Result container
export {
  getOrThrow,
  hasError,
  hasValue,
  toError,
  tryCatch,
  tryError,
  tryValue,
} from "./try"
export type { ErrorTry, Try, ValueTry } from "./try"

// Schedulers
export { ManualScheduler, MicrotaskScheduler, QueueScheduler } from "./scheduler"
export type { QueueSchedulerOptions, Scheduler, Work } from "./scheduler"

// Errors
export {
  AlreadyDetachedError,
  BrokenPromiseError,
  DoubleSetError,
  FutureAlreadyRetrievedError,
  NoStateError,
  NotReadyError,
} from "./error"
export type { SharedSide, SharedSlot } from "./error"
