/**
 * Unit tests for the completion backends.
 *
 * Both backends follow the same contract, so each case runs against both.
 */

import { describe, it, expect } from 'vitest'
import { MicrotaskCompletionBackend } from './microtask-backend'
import { ReactorCompletionBackend } from './reactor-backend'
import type { CompletionBackend } from './types'

function deferred(): {
  promise: Promise<void>
  resolve: () => void
  reject: (error: Error) => void
} {
  let resolve: () => void = () => {}
  let reject: (error: Error) => void = () => {}
  const promise = new Promise<void>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}

function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0))
}

const backends: Array<[string, () => CompletionBackend]> = [
  ['ReactorCompletionBackend', () => new ReactorCompletionBackend()],
  ['MicrotaskCompletionBackend', () => new MicrotaskCompletionBackend()],
]

describe.each(backends)('%s', (_name, createBackend) => {
  it('resolves a wait started before completion', async () => {
    const backend = createBackend()
    const done = deferred()
    backend.watch(1, done.promise)

    const waiting = backend.wait(1)
    done.resolve()

    await expect(waiting).resolves.toBeUndefined()
  })

  it('keeps an outcome that arrives before anyone waits', async () => {
    const backend = createBackend()
    backend.watch(1, Promise.resolve())
    await flush()

    await expect(backend.wait(1)).resolves.toBeUndefined()
  })

  it('delivers failures to the waiter', async () => {
    const backend = createBackend()
    const done = deferred()
    backend.watch(7, done.promise)

    const waiting = backend.wait(7)
    done.reject(new Error('queue failed'))

    await expect(waiting).rejects.toThrow('queue failed')
  })

  it('wraps non-error rejections', async () => {
    const backend = createBackend()
    backend.watch(2, Promise.reject('plain reason'))
    await flush()

    await expect(backend.wait(2)).rejects.toThrow('plain reason')
  })

  it('keeps submissions apart', async () => {
    const backend = createBackend()
    const first = deferred()
    const second = deferred()
    backend.watch(1, first.promise)
    backend.watch(2, second.promise)

    const waitingSecond = backend.wait(2)
    second.resolve()
    await expect(waitingSecond).resolves.toBeUndefined()

    const waitingFirst = backend.wait(1)
    first.reject(new Error('first failed'))
    await expect(waitingFirst).rejects.toThrow('first failed')
  })

  it('abandon settles a pending submission and ignores later completion', async () => {
    const backend = createBackend()
    const done = deferred()
    backend.watch(3, done.promise)

    const waiting = backend.wait(3)
    backend.abandon(3, new Error('device lost'))
    done.resolve()

    await expect(waiting).rejects.toThrow('device lost')
  })

  it('retains an abandoned outcome for a later wait', async () => {
    const backend = createBackend()
    backend.watch(4, deferred().promise)
    backend.abandon(4, new Error('session destroyed'))

    await expect(backend.wait(4)).rejects.toThrow('session destroyed')
  })

  it('does not deliver an outcome twice', async () => {
    const backend = createBackend()
    backend.watch(5, Promise.resolve())
    await backend.wait(5)

    await expect(backend.wait(5)).rejects.toThrow('Unknown submission 5')
  })

  it('forgets a discarded submission', async () => {
    const backend = createBackend()
    backend.watch(6, Promise.resolve())
    backend.watch(7, deferred().promise)
    await flush()
    expect(backend.size).toBe(2)

    backend.discard(6)
    backend.discard(7)

    expect(backend.size).toBe(0)
    await expect(backend.wait(6)).rejects.toThrow('Unknown submission 6')
  })

  it('counts a collected submission as gone', async () => {
    const backend = createBackend()
    backend.watch(8, Promise.resolve())
    await backend.wait(8)

    expect(backend.size).toBe(0)
  })

  it('rejects waits on submissions it never watched', async () => {
    await expect(createBackend().wait(99)).rejects.toThrow('Unknown submission 99')
  })
})

describe('platforms', () => {
  it('names the native and browser backends', () => {
    expect(new ReactorCompletionBackend().platform).toBe('native')
    expect(new MicrotaskCompletionBackend().platform).toBe('browser')
  })
})
