/// <reference types="@webgpu/types" />
/**
 * GPU buffer utilities shared by the arena, the planner and the session.
 */

import { bytesPerPixel, type PixelFormat } from '../color'

/**
 * WebGPU requires buffer sizes and copy ranges to be multiples of 4 bytes.
 */
export const COPY_BUFFER_ALIGNMENT = 4

/**
 * Size of the per-dispatch parameter block: canvas width and height,
 * opacity, padding, then the source region (x, y, width, height).
 */
export const DISPATCH_PARAMS_SIZE = 32

/**
 * Align a byte count up to the next multiple of 4.
 */
export function alignTo4(value: number): number {
  return Math.ceil(value / COPY_BUFFER_ALIGNMENT) * COPY_BUFFER_ALIGNMENT
}

/**
 * Usage classes a resource slot can be allocated with.
 * - storage: shader read/write plus copies (layers, intermediates)
 * - uniform: dispatch parameters
 * - readback: copy destination the host maps for reading
 */
export type SlotUsage = 'storage' | 'uniform' | 'readback'

/**
 * Buffer usage flags per slot usage class.
 * Uses lazy evaluation to avoid accessing GPUBufferUsage at module load time,
 * which would fail in environments without WebGPU globals (e.g., Node.js tests).
 */
export const SlotBufferUsage = {
  get storage(): GPUBufferUsageFlags {
    return (
      GPUBufferUsage.STORAGE | GPUBufferUsage.COPY_SRC | GPUBufferUsage.COPY_DST
    )
  },
  get uniform(): GPUBufferUsageFlags {
    return GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST
  },
  get readback(): GPUBufferUsageFlags {
    return GPUBufferUsage.MAP_READ | GPUBufferUsage.COPY_DST
  },
} as const

/**
 * Byte size of an image of the given format.
 */
export function imageByteSize(
  format: PixelFormat,
  width: number,
  height: number
): number {
  return alignTo4(width * height * bytesPerPixel(format))
}

/**
 * Byte size of a linear rgba32float working image.
 */
export function workingByteSize(width: number, height: number): number {
  return imageByteSize('rgba32float', width, height)
}

/**
 * Calculate workgroup dispatch dimensions.
 *
 * @param width - Image width
 * @param height - Image height
 * @param workgroupSize - Size of workgroup (default 16x16)
 * @returns Dispatch dimensions [x, y, z]
 */
export function calculateDispatchSize(
  width: number,
  height: number,
  workgroupSize: number = 16
): [number, number, number] {
  return [
    Math.ceil(width / workgroupSize),
    Math.ceil(height / workgroupSize),
    1,
  ]
}

/**
 * Canvas area a dispatch reads its source into.
 */
export interface DispatchRegion {
  x: number
  y: number
  width: number
  height: number
}

/**
 * Pack the dispatch parameter block.
 *
 * @param region - Where the source lands on the canvas (default: all of it)
 */
export function packDispatchParams(
  width: number,
  height: number,
  opacity: number,
  region: DispatchRegion = { x: 0, y: 0, width, height }
): ArrayBuffer {
  const block = new ArrayBuffer(DISPATCH_PARAMS_SIZE)
  const words = new Uint32Array(block)
  const floats = new Float32Array(block)
  words[0] = width
  words[1] = height
  floats[2] = opacity
  words[4] = region.x
  words[5] = region.y
  words[6] = region.width
  words[7] = region.height
  return block
}
