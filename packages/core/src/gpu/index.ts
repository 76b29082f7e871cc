/**
 * WebGPU side of the blend engine: device acquisition, the device session,
 * the resource arena, the pipeline cache and the blend shaders.
 *
 * @example
 * ```typescript
 * import { DeviceSession } from '@layerblend/core'
 *
 * // Open a session and allocate a slot
 * const session = await DeviceSession.create({ gpu: navigator.gpu, backend })
 * const handle = session.arena.allocate(
 *   { usage: 'storage', pixelFormat: 'rgba8unorm', width, height },
 *   width * height * 4
 * )
 * ```
 */

// Types
export {
  type GPUCapabilities,
  type GPUInitOptions,
  type GPUErrorCode,
  GPUError,
  isRecoverableError,
  hasErrorCode,
  DEFAULT_GPU_INIT_OPTIONS,
} from './types'

// Capability detection
export {
  type AcquiredDevice,
  acquireDevice,
  buildCapabilities,
  fitsDeviceLimits,
  isWebGPUAvailable,
} from './capabilities'

// Buffers
export {
  type SlotUsage,
  type DispatchRegion,
  COPY_BUFFER_ALIGNMENT,
  DISPATCH_PARAMS_SIZE,
  SlotBufferUsage,
  alignTo4,
  imageByteSize,
  workingByteSize,
  calculateDispatchSize,
  packDispatchParams,
} from './buffer-utils'

// Resource arena
export {
  type Handle,
  type SlotFormat,
  type SlotRef,
  type ResourceArenaOptions,
  type ResourceArenaStats,
  DEFAULT_ARENA_OPTIONS,
  ResourceArena,
  handleKey,
  sameHandle,
} from './resource-arena'

// Shaders and pipelines
export * from './shaders'
export {
  type PipelineHandle,
  type PipelineCacheStats,
  PipelineCache,
} from './pipeline-cache'

// Plans
export {
  type Plan,
  type PlanStage,
  type PlanStageKind,
  type DispatchBindings,
  type AllocationPurpose,
  stageReads,
  stageWrites,
  stageHandles,
} from './plan'

// Session
export * from './completion'
export {
  type DeviceSessionState,
  type DeviceSessionOptions,
  type CreateDeviceSessionOptions,
  type SessionToken,
  DeviceSession,
} from './device-session'
