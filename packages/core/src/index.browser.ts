/**
 * layerblend core: GPU blend execution engine (browser entry).
 */

import type { Compositor } from './compositor'
import { openCompositor, type CreateCompositorOptions } from './engine'
import { createCompletionBackend, defaultGPU } from './platform/browser'

export * from './engine'
export { MicrotaskCompletionBackend } from './gpu/completion/microtask-backend'
export { createCompletionBackend }

/**
 * Acquire a device from `navigator.gpu` and create a compositor on it.
 */
export async function createCompositor(
  options: CreateCompositorOptions = {}
): Promise<Compositor> {
  const { gpu = defaultGPU(), ...rest } = options
  return openCompositor(createCompletionBackend(), gpu, rest)
}
