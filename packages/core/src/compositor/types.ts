/**
 * Compositor types: blend descriptors, layer inputs and configuration.
 */

import type { BlendMode, ColorSpace, PixelBuffer, PixelFormat } from '../color'
import type { Handle } from '../gpu/resource-arena'
import { GPUError } from '../gpu/types'
import { normalizeRectangle, type Rectangle } from './rectangle'

/**
 * One step of a blend stack: composite `source` onto the running result
 * that ends up in `destination`.
 */
export interface BlendDescriptor {
  readonly source: Handle
  /** Readback slot receiving the composited result */
  readonly destination: Handle
  readonly mode: BlendMode
  /** Color space the formula is evaluated in */
  readonly space: ColorSpace
  /** Layer opacity in [0, 1] */
  readonly opacity: number
  /** Canvas region the source covers; null covers the whole canvas */
  readonly placement: Rectangle | null
}

/**
 * Create a frozen blend descriptor.
 *
 * @throws GPUError VALIDATION_ERROR if opacity is outside [0, 1]
 */
export function createBlendDescriptor(
  descriptor: Omit<BlendDescriptor, 'opacity' | 'placement'> & {
    opacity?: number
    placement?: Rectangle | null
  }
): BlendDescriptor {
  const opacity = descriptor.opacity ?? 1
  if (!(opacity >= 0 && opacity <= 1)) {
    throw new GPUError(`Opacity must be in [0, 1], got ${opacity}`, 'VALIDATION_ERROR')
  }
  return Object.freeze({
    source: descriptor.source,
    destination: descriptor.destination,
    mode: descriptor.mode,
    space: descriptor.space,
    opacity,
    placement: descriptor.placement ? Object.freeze(normalizeRectangle(descriptor.placement)) : null,
  })
}

/**
 * Source data to upload into a slot before the stack runs.
 */
export interface PlanInput {
  handle: Handle
  data: ArrayBufferView | ArrayBuffer
}

/**
 * One layer of a composite request. Layers are folded bottom to top.
 */
export interface LayerInput {
  buffer: PixelBuffer
  mode: BlendMode
  space: ColorSpace
  opacity?: number
  /**
   * Canvas region the layer covers, sized like its buffer
   * (default: the whole canvas). The base layer defines the canvas, so a
   * placement on it must cover all of it.
   */
  placement?: Rectangle
}

export interface CompositeOptions {
  /** Output storage format (default: the base layer's format) */
  outputFormat?: PixelFormat
  /** Cancels delivery; submitted work is still drained */
  signal?: AbortSignal
}

/**
 * Compositor configuration.
 */
export interface CompositorConfig {
  /** How often an OUT_OF_MEMORY failure is retried after trimming the pool */
  outOfMemoryRetries?: number
  /** Allowed per-channel GPU/CPU difference, in 8-bit steps */
  channelTolerance?: number
  /** Enable performance logging */
  logPerformance?: boolean
}

/**
 * Default configuration.
 */
export const DEFAULT_COMPOSITOR_CONFIG: Required<CompositorConfig> = {
  outOfMemoryRetries: 0,
  channelTolerance: 1,
  logPerformance: false,
}

/**
 * Result of comparing two pixel buffers.
 */
export interface BufferComparison {
  /** Largest per-channel difference, in 8-bit steps */
  maxDifference: number
  /** Channels whose difference exceeds the tolerance */
  mismatchedChannels: number
  withinTolerance: boolean
}
