/**
 * Unit tests for pixel buffer helpers.
 */

import { describe, it, expect } from 'vitest'
import {
  convertPixelBuffer,
  createPixelBuffer,
  decodePixels,
  encodePixels,
  readTexel,
  solidPixelBuffer,
} from './pixels'

describe('createPixelBuffer', () => {
  it('allocates bytes for 8-bit formats', () => {
    const buffer = createPixelBuffer(3, 2, 'rgba8unorm')
    expect(buffer.data).toBeInstanceOf(Uint8Array)
    expect(buffer.data).toHaveLength(24)
  })

  it('allocates floats for rgba32float', () => {
    const buffer = createPixelBuffer(3, 2, 'rgba32float')
    expect(buffer.data).toBeInstanceOf(Float32Array)
    expect(buffer.data).toHaveLength(24)
  })
})

describe('solidPixelBuffer', () => {
  it('repeats the texel for every pixel', () => {
    const buffer = solidPixelBuffer(2, 1, [1, 2, 3, 4], 'rgba8unorm')
    expect(Array.from(buffer.data)).toEqual([1, 2, 3, 4, 1, 2, 3, 4])
  })

  it('stores float texels as given', () => {
    const buffer = solidPixelBuffer(1, 1, [0.5, 0.25, 0, 1], 'rgba32float')
    expect(Array.from(buffer.data)).toEqual([0.5, 0.25, 0, 1])
  })
})

describe('readTexel', () => {
  it('reads row-major texels', () => {
    const buffer = createPixelBuffer(2, 2, 'rgba8unorm')
    buffer.data.set([9, 8, 7, 6], 12)
    expect(readTexel(buffer, 1, 1)).toEqual([9, 8, 7, 6])
  })
})

describe('decodePixels', () => {
  it('normalizes linear 8-bit data', () => {
    const buffer = solidPixelBuffer(1, 1, [255, 0, 51, 255], 'rgba8unorm')
    const decoded = decodePixels(buffer)

    expect(decoded[0]).toBe(1)
    expect(decoded[1]).toBe(0)
    expect(decoded[2]).toBeCloseTo(0.2, 6)
    expect(decoded[3]).toBe(1)
  })

  it('applies the sRGB curve to color but not alpha', () => {
    const decoded = decodePixels(solidPixelBuffer(1, 1, [128, 128, 128, 128], 'rgba8unorm-srgb'))

    expect(decoded[0]).toBeCloseTo(0.21586, 5)
    expect(decoded[3]).toBeCloseTo(128 / 255, 6)
  })

  it('clamps float data', () => {
    const decoded = decodePixels(solidPixelBuffer(1, 1, [1.5, -0.5, 0.5, 1], 'rgba32float'))
    expect(Array.from(decoded)).toEqual([1, 0, 0.5, 1])
  })
})

describe('encodePixels', () => {
  it('quantizes with ties to even', () => {
    const buffer = encodePixels([1, 0.5, 0, 0.5], 1, 1, 'rgba8unorm')
    expect(Array.from(buffer.data)).toEqual([255, 128, 0, 128])
  })

  it('encodes color through the sRGB curve and alpha linearly', () => {
    const buffer = encodePixels([0.5, 0.5, 0.5, 0.5], 1, 1, 'rgba8unorm-srgb')
    expect(Array.from(buffer.data)).toEqual([188, 188, 188, 128])
  })
})

describe('convertPixelBuffer', () => {
  it('re-encodes sRGB bytes as linear bytes', () => {
    const source = solidPixelBuffer(1, 1, [255, 128, 0, 200], 'rgba8unorm-srgb')
    const converted = convertPixelBuffer(source, 'rgba8unorm')

    expect(converted.format).toBe('rgba8unorm')
    expect(Array.from(converted.data)).toEqual([255, 55, 0, 200])
  })

  it('converts to float', () => {
    const converted = convertPixelBuffer(solidPixelBuffer(1, 1, [255, 0, 0, 255], 'rgba8unorm-srgb'), 'rgba32float')
    expect(Array.from(converted.data)).toEqual([1, 0, 0, 1])
  })

  it('copies when the format is unchanged', () => {
    const source = solidPixelBuffer(1, 1, [1, 2, 3, 4], 'rgba8unorm')
    const converted = convertPixelBuffer(source, 'rgba8unorm')

    expect(Array.from(converted.data)).toEqual([1, 2, 3, 4])
    expect(converted.data).not.toBe(source.data)
  })

  it('keeps float storage when copying float buffers', () => {
    const source = createPixelBuffer(1, 1, 'rgba32float')
    source.data.set([0.25, 0.5, 0.75, 1])
    const converted = convertPixelBuffer(source, 'rgba32float')

    expect(converted.data).toBeInstanceOf(Float32Array)
    expect(Array.from(converted.data)).toEqual([0.25, 0.5, 0.75, 1])
    expect(converted.data).not.toBe(source.data)
  })
})
