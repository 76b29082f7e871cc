/**
 * Completion backend for browsers.
 *
 * Each submission owns a deferred outcome; the waiter registers a
 * continuation on it, which runs on the microtask queue.
 */

import type { CompletionBackend, CompletionOutcome } from './types'
import { toError } from './types'

interface Deferred {
  promise: Promise<CompletionOutcome>
  resolve: (outcome: CompletionOutcome) => void
  settled: boolean
}

function createDeferred(): Deferred {
  let resolve: (outcome: CompletionOutcome) => void = () => {}
  const promise = new Promise<CompletionOutcome>((r) => {
    resolve = r
  })
  return { promise, resolve, settled: false }
}

export class MicrotaskCompletionBackend implements CompletionBackend {
  readonly platform = 'browser'

  private submissions = new Map<number, Deferred>()

  watch(id: number, done: Promise<void>): void {
    this.submissions.set(id, createDeferred())
    done.then(
      () => this.settle(id, { ok: true }),
      (reason: unknown) => this.settle(id, { ok: false, error: toError(reason) })
    )
  }

  async wait(id: number): Promise<void> {
    const deferred = this.submissions.get(id)
    if (!deferred) {
      throw new Error(`Unknown submission ${id}`)
    }

    const outcome = await deferred.promise
    this.submissions.delete(id)
    if (!outcome.ok) {
      throw outcome.error
    }
  }

  abandon(id: number, error: Error): void {
    this.settle(id, { ok: false, error })
  }

  discard(id: number): void {
    this.settle(id, { ok: false, error: new Error(`Submission ${id} was discarded`) })
    this.submissions.delete(id)
  }

  get size(): number {
    return this.submissions.size
  }

  private settle(id: number, outcome: CompletionOutcome): void {
    const deferred = this.submissions.get(id)
    if (!deferred || deferred.settled) {
      return
    }
    deferred.settled = true
    deferred.resolve(outcome)
  }
}
