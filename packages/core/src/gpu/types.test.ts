/**
 * Unit tests for GPU types.
 *
 * Tests constants, the GPUError class and the error helpers.
 */

import { describe, it, expect } from 'vitest'
import {
  DEFAULT_GPU_INIT_OPTIONS,
  GPUError,
  hasErrorCode,
  isRecoverableError,
  type GPUErrorCode,
} from './types'

// ============================================================================
// Defaults
// ============================================================================

describe('DEFAULT_GPU_INIT_OPTIONS', () => {
  it('prefers high performance and refuses fallback adapters', () => {
    expect(DEFAULT_GPU_INIT_OPTIONS).toEqual({
      preferHighPerformance: true,
      allowFallbackAdapter: false,
    })
  })
})

// ============================================================================
// GPUError
// ============================================================================

describe('GPUError', () => {
  it('creates error with message and code', () => {
    const error = new GPUError('Test error message', 'STALE_HANDLE')

    expect(error.message).toBe('Test error message')
    expect(error.code).toBe('STALE_HANDLE')
    expect(error.name).toBe('GPUError')
  })

  it('includes cause when provided', () => {
    const cause = new Error('Original error')
    const error = new GPUError('Wrapper error', 'INTERNAL_ERROR', cause)

    expect(error.cause).toBe(cause)
  })

  it('is instance of Error', () => {
    const error = new GPUError('Test', 'NOT_SUPPORTED')

    expect(error).toBeInstanceOf(Error)
    expect(error).toBeInstanceOf(GPUError)
  })
})

describe('isRecoverableError', () => {
  const cases: Array<[GPUErrorCode, boolean]> = [
    ['INCOMPATIBLE_FORMATS', true],
    ['UNSUPPORTED_MODE', true],
    ['OUT_OF_MEMORY', true],
    ['STALE_HANDLE', false],
    ['DEVICE_LOST', false],
    ['VALIDATION_ERROR', false],
    ['INTERNAL_ERROR', false],
  ]

  it.each(cases)('%s -> %s', (code, recoverable) => {
    expect(isRecoverableError(new GPUError('Test', code))).toBe(recoverable)
  })

  it('is false for other errors', () => {
    expect(isRecoverableError(new RangeError('Out of memory'))).toBe(false)
  })
})

describe('hasErrorCode', () => {
  it('matches the code of a GPUError', () => {
    const error = new GPUError('Test', 'DEVICE_LOST')

    expect(hasErrorCode(error, 'DEVICE_LOST')).toBe(true)
    expect(hasErrorCode(error, 'OUT_OF_MEMORY')).toBe(false)
  })

  it('ignores values that are not GPUErrors', () => {
    expect(hasErrorCode({ code: 'DEVICE_LOST' }, 'DEVICE_LOST')).toBe(false)
  })
})
