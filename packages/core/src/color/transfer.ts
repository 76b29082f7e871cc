/**
 * Transfer functions between storage encodings and linear light.
 *
 * All functions are pure and total: inputs outside [0, 1] (and NaN) are
 * clamped before conversion. The same piecewise sRGB curve is implemented in
 * the WGSL blend shader; keep both in sync.
 */

import type { ColorSpace, PixelFormat } from './types'
import { storageSpaceOf } from './types'

/** Breakpoint of the sRGB decoding curve (encoded domain) */
const SRGB_DECODE_KNEE = 0.04045
/** Breakpoint of the sRGB encoding curve (linear domain) */
const SRGB_ENCODE_KNEE = 0.0031308

export function clamp01(value: number): number {
  // NaN fails both comparisons and lands on 0
  return value > 0 ? (value < 1 ? value : 1) : 0
}

/**
 * Convert an encoded channel value in [0, 1] to linear light.
 */
export function toLinear(encoded: number, space: ColorSpace): number {
  const c = clamp01(encoded)
  if (space === 'linear') {
    return c
  }
  return c <= SRGB_DECODE_KNEE ? c / 12.92 : Math.pow((c + 0.055) / 1.055, 2.4)
}

/**
 * Convert a linear channel value in [0, 1] to the given encoding.
 */
export function fromLinear(linear: number, space: ColorSpace): number {
  const l = clamp01(linear)
  if (space === 'linear') {
    return l
  }
  return l <= SRGB_ENCODE_KNEE ? l * 12.92 : 1.055 * Math.pow(l, 1 / 2.4) - 0.055
}

/**
 * Round to nearest, ties to even.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

/**
 * Quantize a normalized value to an unsigned integer of `bits` bits.
 */
export function quantize(value: number, bits: number = 8): number {
  const max = 2 ** bits - 1
  return roundHalfEven(clamp01(value) * max)
}

/**
 * Decode one 8-bit color channel of `format` to linear light.
 */
export function decodeChannel(byte: number, format: PixelFormat): number {
  return toLinear(byte / 255, storageSpaceOf(format))
}

/**
 * Encode one linear color channel to an 8-bit value of `format`.
 */
export function encodeChannel(linear: number, format: PixelFormat): number {
  return quantize(fromLinear(linear, storageSpaceOf(format)))
}

/**
 * Move a linear RGB channel into the space a blend is evaluated in.
 */
export function linearToWorking(linear: number, space: ColorSpace): number {
  return space === 'srgb' ? fromLinear(linear, 'srgb') : clamp01(linear)
}

/**
 * Move a working-space RGB channel back to linear light.
 */
export function workingToLinear(value: number, space: ColorSpace): number {
  return space === 'srgb' ? toLinear(value, 'srgb') : clamp01(value)
}
