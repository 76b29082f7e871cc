/**
 * Platform-neutral engine surface and the compositor factory shared by the
 * platform entry points.
 */

import type { CompletionBackend } from './gpu/completion'
import { DeviceSession } from './gpu/device-session'
import type { ResourceArenaOptions } from './gpu/resource-arena'
import type { ShaderLibrary } from './gpu/shaders'
import type { GPUInitOptions } from './gpu/types'
import { Compositor, type CompositorConfig } from './compositor'

export * from './color'
export * from './gpu'
export * from './compositor'

export interface CreateCompositorOptions extends GPUInitOptions, CompositorConfig {
  /** WebGPU entry point (default: the platform's global one) */
  gpu?: GPU
  /** Shader library (default: the embedded blend shaders) */
  library?: ShaderLibrary
  /** Resource arena configuration */
  arena?: ResourceArenaOptions
}

/**
 * Open a device session on `backend` and wrap it in a compositor.
 */
export async function openCompositor(
  backend: CompletionBackend,
  gpu: GPU | undefined,
  options: Omit<CreateCompositorOptions, 'gpu'> = {}
): Promise<Compositor> {
  const {
    preferHighPerformance,
    allowFallbackAdapter,
    library,
    arena,
    ...config
  } = options

  const session = await DeviceSession.create({
    gpu,
    backend,
    library,
    arena,
    preferHighPerformance,
    allowFallbackAdapter,
  })
  return new Compositor(session, config)
}
