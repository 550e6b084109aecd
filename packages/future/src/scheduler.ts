/**
 * Schedulers accept zero-argument work items and run them later.
 *
 * A shared state hands its continuation to a scheduler instead of running
 * it inline when one is installed. The submitter is never told when or
 * whether the work completed.
 */

import fastq from "fastq"
import { toError } from "./try"
import type { queueAsPromised } from "fastq"

/**
 * A unit of deferred work.
 */
export type Work = () => void

/**
 * Accepts work for later, asynchronous execution.
 */
export interface Scheduler {
  add(work: Work): void
}

/**
 * Options for creating a QueueScheduler.
 */
export interface QueueSchedulerOptions {
  /**
   * Maximum number of work items running at once.
   * Defaults to 1 (strict FIFO).
   */
  concurrency?: number

  /**
   * Called with any error thrown by a work item.
   * Defaults to logging through console.error.
   */
  onError?: (error: Error) => void
}

function logWorkError(error: Error): void {
  console.error(`[QueueScheduler] Error running scheduled work:`, error)
}

/**
 * Scheduler backed by a fastq work queue.
 *
 * @example
 * ```typescript
 * const scheduler = new QueueScheduler({ concurrency: 4 })
 * future.via(scheduler).onResult((t) => console.log(t))
 * await scheduler.drained()
 * ```
 */
export class QueueScheduler implements Scheduler {
  readonly #queue: queueAsPromised<Work>
  readonly #onError: (error: Error) => void

  constructor(opts: QueueSchedulerOptions = {}) {
    const concurrency = opts.concurrency ?? 1
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `QueueScheduler concurrency must be a positive integer, got ${concurrency}`
      )
    }
    this.#onError = opts.onError ?? logWorkError
    this.#queue = fastq.promise(runWork, concurrency)
  }

  add(work: Work): void {
    this.#queue.push(work).catch((err: unknown) => {
      this.#onError(toError(err))
    })
  }

  /**
   * Resolves once every queued work item has run.
   */
  drained(): Promise<void> {
    return this.#queue.drained()
  }

  idle(): boolean {
    return this.#queue.idle()
  }

  /**
   * Number of work items waiting to start.
   */
  length(): number {
    return this.#queue.length()
  }
}

async function runWork(work: Work): Promise<void> {
  // fastq calls the worker synchronously from push(); yield so work never
  // runs on the submitter's stack.
  await Promise.resolve()
  work()
}

/**
 * Scheduler that runs each work item in its own microtask.
 */
export class MicrotaskScheduler implements Scheduler {
  add(work: Work): void {
    queueMicrotask(work)
  }
}

/**
 * Scheduler that buffers work until it is run explicitly.
 *
 * Useful for deterministic tests and for embedding in a custom loop.
 */
export class ManualScheduler implements Scheduler {
  readonly #queue: Array<Work> = []

  add(work: Work): void {
    this.#queue.push(work)
  }

  /**
   * Number of buffered work items.
   */
  get pending(): number {
    return this.#queue.length
  }

  /**
   * Run the oldest buffered work item.
   *
   * @returns false if nothing was buffered
   */
  runNext(): boolean {
    const work = this.#queue.shift()
    if (!work) return false
    work()
    return true
  }

  /**
   * Run buffered work, including work added while running, until empty.
   *
   * @returns the number of work items run
   */
  runAll(): number {
    let ran = 0
    while (this.runNext()) {
      ran++
    }
    return ran
  }
}
