/**
 * Completion backends deliver the outcome of a queue submission to the one
 * caller waiting on it.
 *
 * The device session composes a completion promise per submission (queue
 * done, error scope popped, readback mapped) and hands it to the backend.
 * The backend is the only platform-specific piece of the session.
 */

export type CompletionPlatform = 'native' | 'browser'

/**
 * Settled result of a submission.
 */
export type CompletionOutcome = { ok: true } | { ok: false; error: Error }

export interface CompletionBackend {
  readonly platform: CompletionPlatform

  /** Submissions watched and not yet collected */
  readonly size: number

  /**
   * Start observing a submission. `done` must settle exactly once.
   */
  watch(id: number, done: Promise<void>): void

  /**
   * Suspend until the submission settles. Rejects with its error.
   */
  wait(id: number): Promise<void>

  /**
   * Settle an unsettled submission with a failure (device loss, teardown).
   * Later settlement by its `done` promise is ignored.
   */
  abandon(id: number, error: Error): void

  /**
   * Forget a submission nobody will wait on. Its outcome is dropped.
   */
  discard(id: number): void
}

export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason))
}
