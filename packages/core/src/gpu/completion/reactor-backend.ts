/**
 * Completion backend for native hosts.
 *
 * Each submission settles onto a channel of a `node:events` emitter; the
 * waiter suspends on `events.once` for that channel. Outcomes that arrive
 * before anyone waits are retained until collected.
 */

import { EventEmitter, once } from 'node:events'
import type { CompletionBackend, CompletionOutcome } from './types'
import { toError } from './types'

export class ReactorCompletionBackend implements CompletionBackend {
  readonly platform = 'native'

  private reactor = new EventEmitter()
  /** Submissions being observed and not yet settled */
  private inFlight = new Set<number>()
  /** Outcomes nobody has collected yet */
  private retained = new Map<number, CompletionOutcome>()

  watch(id: number, done: Promise<void>): void {
    this.inFlight.add(id)
    done.then(
      () => this.settle(id, { ok: true }),
      (reason: unknown) => this.settle(id, { ok: false, error: toError(reason) })
    )
  }

  async wait(id: number): Promise<void> {
    let outcome = this.retained.get(id)
    if (outcome) {
      this.retained.delete(id)
    } else {
      if (!this.inFlight.has(id)) {
        throw new Error(`Unknown submission ${id}`)
      }
      const [delivered] = await once(this.reactor, channel(id))
      outcome = this.collect(id, delivered)
    }

    if (!outcome.ok) {
      throw outcome.error
    }
  }

  abandon(id: number, error: Error): void {
    this.settle(id, { ok: false, error })
  }

  discard(id: number): void {
    this.settle(id, { ok: false, error: new Error(`Submission ${id} was discarded`) })
    this.retained.delete(id)
  }

  get size(): number {
    return this.inFlight.size + this.retained.size
  }

  private settle(id: number, outcome: CompletionOutcome): void {
    if (!this.inFlight.delete(id)) {
      return
    }
    if (this.reactor.listenerCount(channel(id)) > 0) {
      this.reactor.emit(channel(id), outcome)
    } else {
      this.retained.set(id, outcome)
    }
  }

  private collect(id: number, delivered: unknown): CompletionOutcome {
    if (isOutcome(delivered)) {
      return delivered
    }
    return { ok: false, error: new Error(`Malformed completion for submission ${id}`) }
  }
}

function channel(id: number): string {
  return `settled:${id}`
}

function isOutcome(value: unknown): value is CompletionOutcome {
  return typeof value === 'object' && value !== null && 'ok' in value
}
