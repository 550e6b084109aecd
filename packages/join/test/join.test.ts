/**
 * Tests for the join combinators.
 */

import { describe, expect, it, vi } from "vitest"
import {
  BrokenPromiseError,
  Deferred,
  ManualScheduler,
  NoStateError,
  getOrThrow,
  makeFailedFuture,
  makeFuture,
  tryError,
  tryValue,
} from "@handoff/future"
import {
  EmptyRaceError,
  RaceJoinContext,
  joinAll,
  joinAllWith,
  joinArray,
  joinInto,
  joinRace,
} from "../src/index"
import { delayed, delayedError } from "./support/test-helpers"
import type { Try } from "@handoff/future"

// ============================================================================
// joinAll()
// ============================================================================

describe(`joinAll()`, () => {
  it(`should put each outcome in its own slot whatever the completion order`, () => {
    const first = new Deferred<number>()
    const second = new Deferred<string>()
    const third = new Deferred<boolean>()

    const joined = joinAll(first.future, second.future, third.future)

    third.setValue(true)
    first.setValue(1)
    expect(joined.isReady()).toBe(false)

    second.setValue(`two`)
    expect(joined.isReady()).toBe(true)

    const [a, b, c] = joined.value()
    expect(a).toEqual(tryValue(1))
    expect(b).toEqual(tryValue(`two`))
    expect(c).toEqual(tryValue(true))
  })

  it(`should keep going past a failed input`, () => {
    const error = new Error(`slot failed`)
    const joined = joinAll(makeFuture(1), makeFailedFuture<string>(error))

    expect(joined.value()).toEqual([tryValue(1), tryError(error)])
  })

  it(`should complete immediately with no inputs`, () => {
    const joined = joinAll()

    expect(joined.isReady()).toBe(true)
    expect(joined.value()).toEqual([])
  })

  it(`should join interleaved asynchronous completions`, async () => {
    const joined = joinAll(delayed(`slow`, 20), delayed(7, 5), delayed(null, 10))

    const [slow, fast, middle] = await joined.toPromise()
    expect(getOrThrow(slow)).toBe(`slow`)
    expect(getOrThrow(fast)).toBe(7)
    expect(getOrThrow(middle)).toBeNull()
  })

  it(`should carry a broken promise in its slot`, () => {
    const producer = new Deferred<number>()
    const joined = joinAll(producer.future, makeFuture(`ok`))

    producer.dispose()

    const [broken] = joined.value()
    expect(broken.kind).toBe(`error`)
    if (broken.kind === `error`) {
      expect(broken.error).toBeInstanceOf(BrokenPromiseError)
    }
  })

  it(`should consume its inputs`, () => {
    const input = new Deferred<number>().future
    joinAll(input)

    expect(input.disposed).toBe(true)
  })

  it(`should reject a disposed input without consuming the others`, () => {
    const live = new Deferred<number>().future
    const disposed = new Deferred<string>().future
    disposed.dispose()

    expect(() => joinAll(live, disposed)).toThrow(NoStateError)
    expect(live.disposed).toBe(false)
  })

  it(`should release once, after the last input`, () => {
    const onRelease = vi.fn()
    const first = new Deferred<number>()
    const second = new Deferred<number>()

    joinAllWith({ onRelease }, first.future, second.future)

    first.setValue(1)
    expect(onRelease).not.toHaveBeenCalled()

    second.setValue(2)
    expect(onRelease).toHaveBeenCalledTimes(1)
  })
})

// ============================================================================
// joinArray()
// ============================================================================

describe(`joinArray()`, () => {
  it(`should keep input order, not completion order`, () => {
    const producers = [
      new Deferred<number>(),
      new Deferred<number>(),
      new Deferred<number>(),
    ]
    const joined = joinArray(producers.map((p) => p.future))

    producers[2]?.setValue(30)
    producers[0]?.setValue(10)
    producers[1]?.setError(new Error(`middle failed`))

    const results = joined.value()
    expect(results).toHaveLength(3)
    expect(results[0]).toEqual(tryValue(10))
    expect(results[1]?.kind).toBe(`error`)
    expect(results[2]).toEqual(tryValue(30))
  })

  it(`should complete immediately with no inputs`, () => {
    expect(joinArray<number>([]).value()).toEqual([])
  })

  it(`should reject a disposed input before registering anything`, () => {
    const onRelease = vi.fn()
    const live = new Deferred<number>()
    const liveFuture = live.future
    const disposed = new Deferred<number>().future
    disposed.dispose()

    expect(() => joinArray([liveFuture, disposed], { onRelease })).toThrow(
      `Cannot join a future that was already disposed`
    )
    expect(liveFuture.disposed).toBe(false)

    liveFuture.onResult(() => {})
    live.setValue(1)
    expect(onRelease).not.toHaveBeenCalled()
  })

  it(`should accept any iterable`, async () => {
    function* inputs() {
      yield delayed(`b`, 10)
      yield delayed(`a`, 1)
    }

    const results = await joinArray(inputs()).toPromise()
    expect(results.map(getOrThrow)).toEqual([`b`, `a`])
  })

  it(`should deliver through a scheduler on the output`, () => {
    const scheduler = new ManualScheduler()
    const received: Array<Array<Try<number>>> = []

    joinArray([makeFuture(1), makeFuture(2)])
      .via(scheduler)
      .onResult((t) => received.push(getOrThrow(t)))

    expect(received).toEqual([])
    scheduler.runAll()
    expect(received).toEqual([[tryValue(1), tryValue(2)]])
  })
})

// ============================================================================
// joinRace()
// ============================================================================

describe(`joinRace()`, () => {
  it(`should resolve with the first input to complete`, () => {
    const producers = [new Deferred<string>(), new Deferred<string>()]
    const raced = joinRace(producers.map((p) => p.future))

    producers[1]?.setValue(`second wins`)
    producers[0]?.setValue(`too late`)

    expect(raced.value()).toEqual({
      index: 1,
      result: tryValue(`second wins`),
    })
  })

  it(`should resolve with a failure if that comes first`, async () => {
    const error = new Error(`fast failure`)
    const raced = joinRace([delayed(1, 30), delayedError<number>(error, 1)])

    const { index, result } = await raced.toPromise()
    expect(index).toBe(1)
    expect(result).toEqual(tryError(error))
  })

  it(`should pick exactly one of two inputs firing together`, () => {
    const scheduler = new ManualScheduler()
    const zero = new Deferred<string>()
    const one = new Deferred<string>()
    const raced = joinRace([
      zero.future.via(scheduler),
      one.future.via(scheduler),
    ])

    one.setValue(`one`)
    zero.setValue(`zero`)
    expect(scheduler.pending).toBe(2)

    scheduler.runAll()
    expect(raced.value()).toEqual({ index: 1, result: tryValue(`one`) })
  })

  it(`should not release until every input has fired`, () => {
    const onRelease = vi.fn()
    const producers = [
      new Deferred<number>(),
      new Deferred<number>(),
      new Deferred<number>(),
    ]
    const raced = joinRace(
      producers.map((p) => p.future),
      { onRelease }
    )

    producers[0]?.setValue(0)
    expect(raced.isReady()).toBe(true)
    expect(onRelease).not.toHaveBeenCalled()

    producers[1]?.setValue(1)
    expect(onRelease).not.toHaveBeenCalled()

    producers[2]?.dispose()
    expect(onRelease).toHaveBeenCalledTimes(1)
    expect(raced.value().index).toBe(0)
  })

  it(`should count down its reference count once per input`, () => {
    const producers = [new Deferred<number>(), new Deferred<number>()]
    const ctx = new RaceJoinContext<number>(2)
    const raced = ctx.future
    ctx.start(producers.map((p) => p.future))

    expect(ctx.refCount).toBe(2)
    producers[1]?.setValue(1)
    expect(ctx.refCount).toBe(1)
    producers[0]?.setValue(0)
    expect(ctx.refCount).toBe(0)
    expect(raced.value().index).toBe(1)
  })

  it(`should carry EmptyRaceError with no inputs`, () => {
    const onRelease = vi.fn()
    const raced = joinRace<number>([], { onRelease })

    expect(() => raced.value()).toThrow(EmptyRaceError)
    expect(onRelease).toHaveBeenCalledTimes(1)
  })
})

// ============================================================================
// joinInto()
// ============================================================================

describe(`joinInto()`, () => {
  it(`should call the sink once with every outcome in input order`, () => {
    const sink = vi.fn()
    const producers = [new Deferred<string>(), new Deferred<string>()]

    joinInto(
      producers.map((p) => p.future),
      sink
    )

    producers[1]?.setValue(`b`)
    expect(sink).not.toHaveBeenCalled()

    producers[0]?.setValue(`a`)
    expect(sink).toHaveBeenCalledTimes(1)
    expect(sink).toHaveBeenCalledWith([tryValue(`a`), tryValue(`b`)])
  })

  it(`should call the sink immediately with no inputs`, () => {
    const sink = vi.fn()
    const onRelease = vi.fn()

    joinInto<number>([], sink, { onRelease })

    expect(sink).toHaveBeenCalledWith([])
    expect(onRelease).toHaveBeenCalledTimes(1)
  })

  it(`should release even when the sink throws`, () => {
    const onRelease = vi.fn()

    expect(() =>
      joinInto(
        [makeFuture(1)],
        () => {
          throw new Error(`sink failed`)
        },
        { onRelease }
      )
    ).toThrow(`sink failed`)
    expect(onRelease).toHaveBeenCalledTimes(1)
  })
})
