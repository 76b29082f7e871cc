/**
 * Native platform wiring: completion through the `node:events` reactor.
 */

import { ReactorCompletionBackend } from '../gpu/completion/reactor-backend'
import type { CompletionBackend } from '../gpu/completion'
import { isWebGPUAvailable } from '../gpu/capabilities'

export function createCompletionBackend(): CompletionBackend {
  return new ReactorCompletionBackend()
}

/**
 * Native hosts usually hand their WebGPU binding in explicitly; a global
 * entry point is used when the host installed one.
 */
export function defaultGPU(): GPU | undefined {
  return isWebGPUAvailable() ? navigator.gpu : undefined
}
