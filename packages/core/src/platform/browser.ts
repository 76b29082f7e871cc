/**
 * Browser platform wiring: completion through microtask continuations.
 */

import { MicrotaskCompletionBackend } from '../gpu/completion/microtask-backend'
import type { CompletionBackend } from '../gpu/completion'
import { isWebGPUAvailable } from '../gpu/capabilities'

export function createCompletionBackend(): CompletionBackend {
  return new MicrotaskCompletionBackend()
}

export function defaultGPU(): GPU | undefined {
  return isWebGPUAvailable() ? navigator.gpu : undefined
}
