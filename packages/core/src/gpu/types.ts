/**
 * GPU types for the WebGPU-based blend engine.
 *
 * This module defines device capabilities, session options and the error
 * taxonomy shared by the arena, the pipeline cache, the device session and
 * the planner.
 */

/**
 * GPU device capabilities and limits.
 */
export interface GPUCapabilities {
  /** Whether a WebGPU device was acquired */
  available: boolean
  /** Whether using a software/fallback adapter (slower) */
  isFallbackAdapter: boolean
  /** GPU adapter info (vendor, architecture) */
  adapterInfo?: {
    vendor: string
    architecture: string
    device: string
    description: string
  }
  /** Device limits */
  limits: {
    /** Maximum size of a single buffer in bytes */
    maxBufferSize: number
    /** Maximum storage buffer binding size in bytes */
    maxStorageBufferBindingSize: number
    /** Maximum compute workgroup size per dimension */
    maxComputeWorkgroupSize: number
    /** Maximum compute workgroups per dimension */
    maxComputeWorkgroupsPerDimension: number
  }
}

/**
 * Error codes for engine operations.
 *
 * - STALE_HANDLE: a handle was used after release or after device loss
 * - INCOMPATIBLE_FORMATS / UNSUPPORTED_MODE: request rejected while planning
 * - OUT_OF_MEMORY: allocation or submission ran out of device memory
 * - DEVICE_LOST: the device is gone, the session is torn down
 * - VALIDATION_ERROR: programmer error, never retried
 */
export type GPUErrorCode =
  | 'NOT_SUPPORTED'
  | 'ADAPTER_NOT_FOUND'
  | 'DEVICE_CREATION_FAILED'
  | 'STALE_HANDLE'
  | 'INCOMPATIBLE_FORMATS'
  | 'UNSUPPORTED_MODE'
  | 'DEVICE_LOST'
  | 'OUT_OF_MEMORY'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR'

/**
 * Error thrown by GPU operations.
 */
export class GPUError extends Error {
  override readonly name = 'GPUError'

  constructor(
    message: string,
    public readonly code: GPUErrorCode,
    override readonly cause?: Error
  ) {
    super(message, { cause })
  }
}

const RECOVERABLE_CODES: ReadonlySet<GPUErrorCode> = new Set([
  'INCOMPATIBLE_FORMATS',
  'UNSUPPORTED_MODE',
  'OUT_OF_MEMORY',
])

/**
 * Whether the caller may reformulate or retry after this error.
 */
export function isRecoverableError(error: unknown): boolean {
  return error instanceof GPUError && RECOVERABLE_CODES.has(error.code)
}

/**
 * Whether the error carries the given code.
 */
export function hasErrorCode(error: unknown, code: GPUErrorCode): boolean {
  return error instanceof GPUError && error.code === code
}

/**
 * Options for acquiring a device.
 */
export interface GPUInitOptions {
  /** Prefer high-performance GPU over power-saving */
  preferHighPerformance?: boolean
  /** Accept software/fallback adapters */
  allowFallbackAdapter?: boolean
}

/**
 * Default initialization options.
 */
export const DEFAULT_GPU_INIT_OPTIONS: Required<GPUInitOptions> = {
  preferHighPerformance: true,
  allowFallbackAdapter: false,
}
