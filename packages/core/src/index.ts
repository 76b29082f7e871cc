/**
 * layerblend core: GPU blend execution engine (native entry).
 *
 * @example
 * ```typescript
 * import { createCompositor, solidPixelBuffer } from '@layerblend/core'
 *
 * const compositor = await createCompositor({ gpu })
 * const red = solidPixelBuffer(2, 2, [255, 0, 0, 255], 'rgba8unorm-srgb')
 * const white = solidPixelBuffer(2, 2, [255, 255, 255, 128], 'rgba8unorm-srgb')
 * const result = await compositor.composite([
 *   { buffer: red, mode: 'source-over', space: 'srgb' },
 *   { buffer: white, mode: 'source-over', space: 'srgb' },
 * ])
 * ```
 */

import type { Compositor } from './compositor'
import { openCompositor, type CreateCompositorOptions } from './engine'
import { createCompletionBackend, defaultGPU } from './platform/node'

export * from './engine'
export { ReactorCompletionBackend } from './gpu/completion/reactor-backend'
export { createCompletionBackend }

/**
 * Acquire a device and create a compositor on it.
 */
export async function createCompositor(
  options: CreateCompositorOptions = {}
): Promise<Compositor> {
  const { gpu = defaultGPU(), ...rest } = options
  return openCompositor(createCompletionBackend(), gpu, rest)
}
