/**
 * Unit tests for GPU buffer utilities.
 */

import { describe, it, expect } from 'vitest'
import { mockGPUBufferUsage, stubWebGPUGlobals } from './__tests__/fake-gpu'
import {
  alignTo4,
  calculateDispatchSize,
  DISPATCH_PARAMS_SIZE,
  imageByteSize,
  packDispatchParams,
  SlotBufferUsage,
  workingByteSize,
} from './buffer-utils'

stubWebGPUGlobals()

describe('alignTo4', () => {
  it('rounds up to a multiple of 4', () => {
    expect(alignTo4(1)).toBe(4)
    expect(alignTo4(4)).toBe(4)
    expect(alignTo4(13)).toBe(16)
  })
})

describe('imageByteSize', () => {
  it('uses 4 bytes per pixel for 8-bit formats', () => {
    expect(imageByteSize('rgba8unorm', 3, 5)).toBe(60)
    expect(imageByteSize('rgba8unorm-srgb', 3, 5)).toBe(60)
  })

  it('uses 16 bytes per pixel for rgba32float', () => {
    expect(imageByteSize('rgba32float', 3, 5)).toBe(240)
    expect(workingByteSize(3, 5)).toBe(240)
  })
})

describe('SlotBufferUsage', () => {
  it('returns flags per usage class', () => {
    expect(SlotBufferUsage.storage).toBe(
      mockGPUBufferUsage.STORAGE | mockGPUBufferUsage.COPY_SRC | mockGPUBufferUsage.COPY_DST
    )
    expect(SlotBufferUsage.uniform).toBe(mockGPUBufferUsage.UNIFORM | mockGPUBufferUsage.COPY_DST)
    expect(SlotBufferUsage.readback).toBe(mockGPUBufferUsage.MAP_READ | mockGPUBufferUsage.COPY_DST)
  })
})

describe('calculateDispatchSize', () => {
  it('calculates correct dispatch size for exact multiples', () => {
    expect(calculateDispatchSize(256, 256)).toEqual([16, 16, 1])
  })

  it('rounds up for partial workgroups', () => {
    expect(calculateDispatchSize(17, 1)).toEqual([2, 1, 1])
  })

  it('supports a custom workgroup size', () => {
    expect(calculateDispatchSize(100, 100, 8)).toEqual([13, 13, 1])
  })
})

describe('packDispatchParams', () => {
  it('packs width, height and opacity into a 32 byte block', () => {
    const block = packDispatchParams(640, 480, 0.5)

    expect(block.byteLength).toBe(32)
    expect(block.byteLength).toBe(DISPATCH_PARAMS_SIZE)
    expect(Array.from(new Uint32Array(block, 0, 2))).toEqual([640, 480])
    expect(new Float32Array(block)[2]).toBe(0.5)
    expect(new Uint32Array(block)[3]).toBe(0)
  })

  it('defaults the source region to the whole canvas', () => {
    const block = packDispatchParams(640, 480, 1)

    expect(Array.from(new Uint32Array(block, 16, 4))).toEqual([0, 0, 640, 480])
  })

  it('packs an explicit source region', () => {
    const block = packDispatchParams(8, 6, 1, { x: 2, y: 3, width: 4, height: 1 })

    expect(Array.from(new Uint32Array(block, 16, 4))).toEqual([2, 3, 4, 1])
  })
})
