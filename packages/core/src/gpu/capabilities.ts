/// <reference types="@webgpu/types" />
/**
 * WebGPU adapter and device acquisition.
 *
 * Requests an adapter from a `GPU` entry point (navigator.gpu in browsers,
 * the host's WebGPU binding on native), applies the fallback adapter policy,
 * creates the device and reports its limits.
 */

import {
  type GPUCapabilities,
  type GPUInitOptions,
  DEFAULT_GPU_INIT_OPTIONS,
  GPUError,
} from './types'

/**
 * Adapter info fields the engine reports.
 */
interface GPUAdapterInfoLike {
  vendor: string
  architecture: string
  device: string
  description: string
  isFallbackAdapter?: boolean
}

/**
 * The parts of GPUAdapter the engine relies on.
 * Implementations differ in where they expose the fallback flag and the
 * adapter info, so both locations are optional.
 */
interface AdapterLike {
  readonly info?: GPUAdapterInfoLike
  readonly isFallbackAdapter?: boolean
  requestAdapterInfo?: () => Promise<GPUAdapterInfoLike>
  requestDevice(descriptor?: GPUDeviceDescriptor): Promise<GPUDevice>
}

const UNKNOWN_ADAPTER_INFO: GPUAdapterInfoLike = {
  vendor: 'Unknown',
  architecture: 'Unknown',
  device: 'Unknown',
  description: 'Unknown',
}

/**
 * Build a GPUCapabilities object from device and adapter info.
 */
export function buildCapabilities(
  device: GPUDevice,
  adapterInfo: GPUAdapterInfoLike = UNKNOWN_ADAPTER_INFO,
  isFallbackAdapter: boolean = false
): GPUCapabilities {
  const limits = device.limits

  return {
    available: true,
    isFallbackAdapter,
    adapterInfo: {
      vendor: adapterInfo.vendor || 'Unknown',
      architecture: adapterInfo.architecture || 'Unknown',
      device: adapterInfo.device || 'Unknown',
      description: adapterInfo.description || 'Unknown',
    },
    limits: {
      maxBufferSize: Number(limits.maxBufferSize),
      maxStorageBufferBindingSize: Number(limits.maxStorageBufferBindingSize),
      maxComputeWorkgroupSize: Math.min(
        limits.maxComputeWorkgroupSizeX,
        limits.maxComputeWorkgroupSizeY,
        limits.maxComputeWorkgroupSizeZ
      ),
      maxComputeWorkgroupsPerDimension: limits.maxComputeWorkgroupsPerDimension,
    },
  }
}

/**
 * Get adapter info from an adapter (handles different API versions).
 */
async function getAdapterInfo(adapter: AdapterLike): Promise<GPUAdapterInfoLike> {
  if (adapter.info) {
    return adapter.info
  }
  return adapter.requestAdapterInfo
    ? await adapter.requestAdapterInfo()
    : UNKNOWN_ADAPTER_INFO
}

function isFallback(adapter: AdapterLike, info: GPUAdapterInfoLike): boolean {
  return info.isFallbackAdapter ?? adapter.isFallbackAdapter ?? false
}

/**
 * Result of acquiring a device.
 */
export interface AcquiredDevice {
  device: GPUDevice
  capabilities: GPUCapabilities
}

/**
 * Request an adapter and create a device.
 *
 * @throws GPUError NOT_SUPPORTED when no GPU entry point is given
 * @throws GPUError ADAPTER_NOT_FOUND when no acceptable adapter exists
 * @throws GPUError DEVICE_CREATION_FAILED when the adapter refuses a device
 */
export async function acquireDevice(
  gpu: GPU | undefined,
  options: GPUInitOptions = {}
): Promise<AcquiredDevice> {
  const opts = { ...DEFAULT_GPU_INIT_OPTIONS, ...options }

  if (!gpu) {
    throw new GPUError('WebGPU is not available', 'NOT_SUPPORTED')
  }

  const adapter: AdapterLike | null = await gpu.requestAdapter({
    powerPreference: opts.preferHighPerformance ? 'high-performance' : 'low-power',
  })
  if (!adapter) {
    throw new GPUError('No suitable GPU adapter found', 'ADAPTER_NOT_FOUND')
  }

  const adapterInfo = await getAdapterInfo(adapter)
  const fallback = isFallback(adapter, adapterInfo)
  if (fallback && !opts.allowFallbackAdapter) {
    throw new GPUError(
      'Only fallback (software) adapter available',
      'ADAPTER_NOT_FOUND'
    )
  }

  let device: GPUDevice
  try {
    device = await adapter.requestDevice({
      label: 'Blend Device',
      requiredFeatures: [],
      requiredLimits: {},
    })
  } catch (error) {
    throw new GPUError(
      'Device creation failed',
      'DEVICE_CREATION_FAILED',
      error instanceof Error ? error : undefined
    )
  }

  return {
    device,
    capabilities: buildCapabilities(device, adapterInfo, fallback),
  }
}

/**
 * Check whether a buffer of `byteSize` bytes can be bound as storage.
 */
export function fitsDeviceLimits(
  byteSize: number,
  capabilities: GPUCapabilities
): boolean {
  if (!capabilities.available) {
    return false
  }
  const { maxBufferSize, maxStorageBufferBindingSize } = capabilities.limits
  return byteSize <= maxBufferSize && byteSize <= maxStorageBufferBindingSize
}

/**
 * Check if WebGPU API is available in the current environment.
 *
 * This is a quick synchronous check that doesn't initialize anything.
 */
export function isWebGPUAvailable(): boolean {
  return typeof navigator !== 'undefined' && 'gpu' in navigator
}
