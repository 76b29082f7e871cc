/**
 * Pixel buffer helpers: construction, decoding to linear floats and
 * encoding back to a storage format.
 */

import type { PixelBuffer, PixelFormat, Rgba } from './types'
import { clamp01, decodeChannel, encodeChannel, quantize } from './transfer'

/**
 * Create a zero-filled pixel buffer.
 */
export function createPixelBuffer(
  width: number,
  height: number,
  format: PixelFormat
): PixelBuffer {
  const length = width * height * 4
  if (format === 'rgba32float') {
    return { width, height, format, data: new Float32Array(length) }
  }
  return { width, height, format, data: new Uint8Array(length) }
}

/**
 * Create a pixel buffer filled with one texel.
 *
 * @param texel - Channel values as stored: bytes for 8-bit formats,
 *   floats for rgba32float
 */
export function solidPixelBuffer(
  width: number,
  height: number,
  texel: Rgba,
  format: PixelFormat
): PixelBuffer {
  const buffer = createPixelBuffer(width, height, format)
  const pixelCount = width * height
  for (let i = 0; i < pixelCount; i++) {
    buffer.data[i * 4] = texel[0]
    buffer.data[i * 4 + 1] = texel[1]
    buffer.data[i * 4 + 2] = texel[2]
    buffer.data[i * 4 + 3] = texel[3]
  }
  return buffer
}

/**
 * Read one stored texel.
 */
export function readTexel(buffer: PixelBuffer, x: number, y: number): Rgba {
  const offset = (y * buffer.width + x) * 4
  const d = buffer.data
  return [d[offset] ?? 0, d[offset + 1] ?? 0, d[offset + 2] ?? 0, d[offset + 3] ?? 0]
}

/**
 * Decode a pixel buffer into linear light floats (RGBA, straight alpha).
 */
export function decodePixels(buffer: PixelBuffer): Float32Array {
  const out = new Float32Array(buffer.width * buffer.height * 4)

  if (buffer.format === 'rgba32float') {
    for (let i = 0; i < out.length; i++) {
      out[i] = clamp01(buffer.data[i] ?? 0)
    }
    return out
  }

  for (let i = 0; i < out.length; i += 4) {
    out[i] = decodeChannel(buffer.data[i] ?? 0, buffer.format)
    out[i + 1] = decodeChannel(buffer.data[i + 1] ?? 0, buffer.format)
    out[i + 2] = decodeChannel(buffer.data[i + 2] ?? 0, buffer.format)
    out[i + 3] = (buffer.data[i + 3] ?? 0) / 255
  }
  return out
}

/**
 * Encode linear light floats into a pixel buffer of the given format.
 *
 * Fixed-point formats round to nearest, ties to even.
 */
export function encodePixels(
  linear: ArrayLike<number>,
  width: number,
  height: number,
  format: PixelFormat
): PixelBuffer {
  const buffer = createPixelBuffer(width, height, format)
  const length = width * height * 4

  if (buffer.format === 'rgba32float') {
    for (let i = 0; i < length; i++) {
      buffer.data[i] = clamp01(linear[i] ?? 0)
    }
    return buffer
  }

  for (let i = 0; i < length; i += 4) {
    buffer.data[i] = encodeChannel(linear[i] ?? 0, format)
    buffer.data[i + 1] = encodeChannel(linear[i + 1] ?? 0, format)
    buffer.data[i + 2] = encodeChannel(linear[i + 2] ?? 0, format)
    buffer.data[i + 3] = quantize(linear[i + 3] ?? 0)
  }
  return buffer
}

/**
 * Re-encode a pixel buffer in another storage format.
 */
export function convertPixelBuffer(
  buffer: PixelBuffer,
  format: PixelFormat
): PixelBuffer {
  if (buffer.format === format) {
    // Same encoding: copy so the caller never aliases the input
    return structuredClone(buffer)
  }
  return encodePixels(decodePixels(buffer), buffer.width, buffer.height, format)
}
