/**
 * Color model types shared by the CPU reference path and the GPU pipelines.
 */

/**
 * Storage encodings understood by the engine.
 * - rgba8unorm-srgb: 8 bits per channel, sRGB transfer on RGB, linear alpha
 * - rgba8unorm: 8 bits per channel, linear
 * - rgba32float: 32-bit float per channel, linear
 */
export type PixelFormat = 'rgba8unorm-srgb' | 'rgba8unorm' | 'rgba32float'

/**
 * Color space in which a blend formula is evaluated.
 * - srgb: gamma-encoded values
 * - linear: linear light
 */
export type ColorSpace = 'srgb' | 'linear'

/**
 * Closed set of supported blend modes.
 */
export type BlendMode =
  | 'source-over'
  | 'multiply'
  | 'screen'
  | 'overlay'
  | 'hard-light'
  | 'darken'
  | 'lighten'
  | 'difference'
  | 'exclusion'

export const PIXEL_FORMATS = [
  'rgba8unorm-srgb',
  'rgba8unorm',
  'rgba32float',
] as const satisfies readonly PixelFormat[]

export const COLOR_SPACES = ['srgb', 'linear'] as const satisfies readonly ColorSpace[]

export const BLEND_MODES = [
  'source-over',
  'multiply',
  'screen',
  'overlay',
  'hard-light',
  'darken',
  'lighten',
  'difference',
  'exclusion',
] as const satisfies readonly BlendMode[]

/**
 * One RGBA value in working form: floats, straight alpha.
 */
export type Rgba = readonly [r: number, g: number, b: number, a: number]

/**
 * Raster buffer handed in and out of the engine.
 *
 * 8-bit formats carry a Uint8Array of width * height * 4 bytes,
 * rgba32float carries a Float32Array of width * height * 4 floats.
 */
export type PixelBuffer =
  | {
      width: number
      height: number
      format: 'rgba8unorm-srgb' | 'rgba8unorm'
      data: Uint8Array
    }
  | {
      width: number
      height: number
      format: 'rgba32float'
      data: Float32Array
    }

export function isBlendMode(value: string): value is BlendMode {
  return BLEND_MODES.some((mode) => mode === value)
}

export function isPixelFormat(value: string): value is PixelFormat {
  return PIXEL_FORMATS.some((format) => format === value)
}

export function isColorSpace(value: string): value is ColorSpace {
  return COLOR_SPACES.some((space) => space === value)
}

/**
 * Color space a storage format's RGB channels are encoded in.
 */
export function storageSpaceOf(format: PixelFormat): ColorSpace {
  return format === 'rgba8unorm-srgb' ? 'srgb' : 'linear'
}

/**
 * Bytes per pixel for a storage format.
 */
export function bytesPerPixel(format: PixelFormat): number {
  return format === 'rgba32float' ? 16 : 4
}
