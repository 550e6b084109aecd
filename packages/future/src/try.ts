/**
 * Try - the outcome of an asynchronous operation: a value or an error.
 *
 * An absent outcome is modelled by the absence of a Try, never by a third
 * variant, so holders use `Try<T> | undefined` for an empty slot.
 */

/**
 * A successful outcome.
 */
export interface ValueTry<T> {
  readonly kind: `value`
  readonly value: T
}

/**
 * A failed outcome.
 */
export interface ErrorTry {
  readonly kind: `error`
  readonly error: Error
}

export type Try<T> = ValueTry<T> | ErrorTry

/**
 * Wrap a value.
 */
export function tryValue<T>(value: T): Try<T> {
  const t: ValueTry<T> = { kind: `value`, value }
  return Object.freeze(t)
}

/**
 * Wrap an error.
 */
export function tryError<T = never>(error: Error): Try<T> {
  const t: ErrorTry = { kind: `error`, error }
  return Object.freeze(t)
}

/**
 * Normalize a thrown value into an Error. Non-Error throwables are kept
 * as the `cause`.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown
  return new Error(`Non-error value thrown: ${String(thrown)}`, {
    cause: thrown,
  })
}

/**
 * Run `fn` and capture its return value or thrown error.
 *
 * @example
 * ```typescript
 * const parsed = tryCatch(() => JSON.parse(text) as Config)
 * if (hasError(parsed)) console.error(parsed.error)
 * ```
 */
export function tryCatch<T>(fn: () => T): Try<T> {
  try {
    return tryValue(fn())
  } catch (e) {
    return tryError(toError(e))
  }
}

export function hasValue<T>(t: Try<T>): t is ValueTry<T> {
  return t.kind === `value`
}

export function hasError<T>(t: Try<T>): t is ErrorTry {
  return t.kind === `error`
}

/**
 * Unwrap the value, throwing the carried error for a failed outcome.
 */
export function getOrThrow<T>(t: Try<T>): T {
  if (t.kind === `error`) {
    throw t.error
  }
  return t.value
}
