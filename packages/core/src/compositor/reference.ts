/**
 * CPU reference compositor.
 *
 * Runs the same fold as the GPU plan in double precision. Used to validate
 * GPU output and as a fallback where no device is available.
 */

import {
  blendPixel,
  decodePixels,
  encodePixels,
  loadBasePixel,
  type PixelBuffer,
  type Rgba,
} from '../color'
import { GPUError } from '../gpu/types'
import {
  containsRectangle,
  formatRectangle,
  normalizeRectangle,
  rectangleHeight,
  rectangleOf,
  rectangleWidth,
  sameRectangle,
} from './rectangle'
import { parseCompositeOptions, parseLayers } from './schemas'
import type { BufferComparison, CompositeOptions, LayerInput } from './types'

/**
 * Composite layers on the CPU.
 *
 * @throws GPUError VALIDATION_ERROR on malformed layers
 * @throws GPUError INCOMPATIBLE_FORMATS when a layer does not fit its
 *   placement or the placement leaves the canvas
 */
export function compositeDirect(
  layers: readonly LayerInput[],
  options: Omit<CompositeOptions, 'signal'> = {}
): PixelBuffer {
  const parsed = parseLayers(layers)
  const { outputFormat } = parseCompositeOptions(options)

  const [base, ...rest] = parsed
  if (!base) {
    throw new GPUError('At least one layer is required', 'VALIDATION_ERROR')
  }
  const { width, height } = base.buffer
  const canvas = rectangleOf(width, height)
  if (base.placement && !sameRectangle(normalizeRectangle(base.placement), canvas)) {
    throw new GPUError(
      `Base layer must cover the ${width}x${height} canvas, got ${formatRectangle(base.placement)}`,
      'INCOMPATIBLE_FORMATS'
    )
  }
  const placements = rest.map((layer) => {
    const placement = layer.placement ? normalizeRectangle(layer.placement) : canvas
    if (!containsRectangle(canvas, placement)) {
      throw new GPUError(
        `Layer placement ${formatRectangle(placement)} is outside the ${width}x${height} canvas`,
        'INCOMPATIBLE_FORMATS'
      )
    }
    const expectedWidth = rectangleWidth(placement)
    const expectedHeight = rectangleHeight(placement)
    if (layer.buffer.width !== expectedWidth || layer.buffer.height !== expectedHeight) {
      throw new GPUError(
        `Layer is ${layer.buffer.width}x${layer.buffer.height}, expected ${expectedWidth}x${expectedHeight}`,
        'INCOMPATIBLE_FORMATS'
      )
    }
    return placement
  })

  // Double precision accumulator, linear light
  const accumulator = Array.from(decodePixels(base.buffer))
  const baseOpacity = base.opacity ?? 1
  for (let i = 0; i < accumulator.length; i += 4) {
    writePixel(accumulator, i, loadBasePixel(readPixel(accumulator, i), baseOpacity))
  }

  rest.forEach((layer, index) => {
    const placement = placements[index] ?? canvas
    const source = decodePixels(layer.buffer)
    const sourceWidth = layer.buffer.width
    const opacity = layer.opacity ?? 1
    for (let y = placement.y; y < placement.maxY; y++) {
      for (let x = placement.x; x < placement.maxX; x++) {
        const i = (y * width + x) * 4
        const s = ((y - placement.y) * sourceWidth + (x - placement.x)) * 4
        writePixel(
          accumulator,
          i,
          blendPixel(readPixel(accumulator, i), readPixel(source, s), layer.mode, layer.space, opacity)
        )
      }
    }
  })

  return encodePixels(accumulator, width, height, outputFormat ?? base.buffer.format)
}

/**
 * Compare two pixel buffers channel by channel.
 *
 * Differences are measured in 8-bit steps; float channels are scaled by 255.
 *
 * @throws GPUError INCOMPATIBLE_FORMATS when size or format differ
 */
export function compareBuffers(
  a: PixelBuffer,
  b: PixelBuffer,
  tolerance: number = 1
): BufferComparison {
  if (a.width !== b.width || a.height !== b.height || a.format !== b.format) {
    throw new GPUError(
      `Cannot compare ${a.width}x${a.height} ${a.format} with ${b.width}x${b.height} ${b.format}`,
      'INCOMPATIBLE_FORMATS'
    )
  }

  const scale = a.format === 'rgba32float' ? 255 : 1
  let maxDifference = 0
  let mismatchedChannels = 0
  for (let i = 0; i < a.data.length; i++) {
    const difference = Math.abs((a.data[i] ?? 0) - (b.data[i] ?? 0)) * scale
    if (difference > maxDifference) maxDifference = difference
    if (difference > tolerance) mismatchedChannels++
  }

  return {
    maxDifference,
    mismatchedChannels,
    withinTolerance: mismatchedChannels === 0,
  }
}

function readPixel(data: ArrayLike<number>, offset: number): Rgba {
  return [data[offset] ?? 0, data[offset + 1] ?? 0, data[offset + 2] ?? 0, data[offset + 3] ?? 0]
}

function writePixel(data: number[], offset: number, pixel: Rgba): void {
  data[offset] = pixel[0]
  data[offset + 1] = pixel[1]
  data[offset + 2] = pixel[2]
  data[offset + 3] = pixel[3]
}
