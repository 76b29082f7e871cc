/// <reference types="@webgpu/types" />
/**
 * Device session: owns one GPUDevice with its queue, resource arena and
 * pipeline cache, submits plans and delivers their completion.
 *
 * Completion is delivered through a platform `CompletionBackend`; the
 * session itself is platform neutral. Each submission is wrapped in
 * validation and out-of-memory error scopes, and any downloads are mapped
 * and copied to their host targets before its token settles.
 *
 * Device loss is fatal: every pending token is rejected with DEVICE_LOST,
 * the arena and the cache are closed (allocations and builds fail with
 * DEVICE_LOST from then on) and the device is destroyed.
 */

import { acquireDevice, buildCapabilities } from './capabilities'
import type { CompletionBackend } from './completion'
import { PipelineCache } from './pipeline-cache'
import { stageHandles, type Plan, type PlanStage } from './plan'
import {
  ResourceArena,
  type ResourceArenaOptions,
  type SlotRef,
} from './resource-arena'
import type { ShaderLibrary } from './shaders'
import { type GPUCapabilities, type GPUInitOptions, GPUError } from './types'

export type DeviceSessionState = 'ready' | 'lost' | 'destroyed'

/**
 * Receipt for one submitted plan.
 */
export interface SessionToken {
  readonly id: number
}

export interface DeviceSessionOptions {
  /** Platform completion delivery */
  backend: CompletionBackend
  /** Shader library for the pipeline cache */
  library?: ShaderLibrary
  /** Arena configuration */
  arena?: ResourceArenaOptions
  /** Capabilities of the device (default: read from `device.limits`) */
  capabilities?: GPUCapabilities
}

export interface CreateDeviceSessionOptions
  extends DeviceSessionOptions,
    GPUInitOptions {
  /** WebGPU entry point */
  gpu: GPU | undefined
}

/** Outcome of popErrorScope (WebGPU's own error type, not the engine's) */
type ErrorScopeResult = ReturnType<GPUDevice['popErrorScope']>

type DispatchStage = Extract<PlanStage, { kind: 'dispatch' }>

interface Submission {
  refs: SlotRef[]
}

/** Readback resolved at encode time; its handle may be released meanwhile */
interface PendingDownload {
  buffer: GPUBuffer
  byteSize: number
  target: Float32Array
}

export class DeviceSession {
  readonly device: GPUDevice
  readonly arena: ResourceArena
  readonly pipelines: PipelineCache
  readonly capabilities: GPUCapabilities

  private backend: CompletionBackend
  private _state: DeviceSessionState = 'ready'
  private nextTokenId = 1
  /** Submitted and not yet settled */
  private pending = new Map<number, Submission>()
  /** Issued and not yet waited on */
  private unawaited = new Set<number>()
  private consumed = new WeakSet<Plan>()

  constructor(device: GPUDevice, options: DeviceSessionOptions) {
    this.device = device
    this.backend = options.backend
    this.capabilities = options.capabilities ?? buildCapabilities(device)
    this.arena = new ResourceArena(device, { label: 'Session', ...options.arena })
    this.pipelines = new PipelineCache(device, options.library)

    this.setupDeviceLossHandling()
    this.setupErrorHandling()
  }

  /**
   * Acquire a device and open a session on it.
   */
  static async create(options: CreateDeviceSessionOptions): Promise<DeviceSession> {
    const { gpu, preferHighPerformance, allowFallbackAdapter, ...sessionOptions } = options
    const { device, capabilities } = await acquireDevice(gpu, {
      preferHighPerformance,
      allowFallbackAdapter,
    })

    console.log(
      `[DeviceSession] Opened (${options.backend.platform}):`,
      capabilities.adapterInfo
    )

    return new DeviceSession(device, { ...sessionOptions, capabilities })
  }

  get state(): DeviceSessionState {
    return this._state
  }

  get platform(): CompletionBackend['platform'] {
    return this.backend.platform
  }

  /**
   * Number of submissions not yet settled.
   */
  get pendingCount(): number {
    return this.pending.size
  }

  /**
   * Submit a plan to the queue.
   *
   * @throws GPUError DEVICE_LOST if the device is gone
   * @throws GPUError VALIDATION_ERROR if the plan was already submitted
   * @throws GPUError STALE_HANDLE if the plan refers to a released slot
   */
  submit(plan: Plan): SessionToken {
    this.assertUsable()
    if (this.consumed.has(plan)) {
      throw new GPUError('Plan was already submitted', 'VALIDATION_ERROR')
    }

    const refs = this.acquireAll(plan.stages)
    this.consumed.add(plan)

    const id = this.nextTokenId++
    const submission: Submission = { refs }
    this.pending.set(id, submission)
    this.unawaited.add(id)

    const done = this.execute(plan.stages).finally(() => this.finish(id))
    this.backend.watch(id, done)

    return Object.freeze({ id })
  }

  /**
   * Suspend until a submission completes and its downloads are filled.
   *
   * @throws GPUError VALIDATION_ERROR if the token was already awaited
   */
  async wait(token: SessionToken): Promise<void> {
    if (this._state === 'destroyed') {
      throw new GPUError('Session destroyed', 'VALIDATION_ERROR')
    }
    if (!this.unawaited.delete(token.id)) {
      throw new GPUError(
        `Token ${token.id} was already awaited or never issued`,
        'VALIDATION_ERROR'
      )
    }
    await this.backend.wait(token.id)
  }

  /**
   * Tear the session down and destroy the device.
   * Pending submissions are rejected.
   */
  destroy(): void {
    if (this._state === 'destroyed') {
      return
    }
    this._state = 'destroyed'
    this.abandonPending(new GPUError('Session destroyed', 'DEVICE_LOST'))

    // Nobody can collect these any more
    for (const id of this.unawaited) {
      this.backend.discard(id)
    }
    this.unawaited.clear()

    const closed = new GPUError('Session destroyed', 'VALIDATION_ERROR')
    this.arena.close(closed)
    this.pipelines.close(closed)
    this.device.destroy()
  }

  /**
   * @throws GPUError DEVICE_LOST once the device is lost
   * @throws GPUError VALIDATION_ERROR once the session is destroyed
   */
  assertUsable(): void {
    if (this._state === 'lost') {
      throw new GPUError('Device lost', 'DEVICE_LOST')
    }
    if (this._state === 'destroyed') {
      throw new GPUError('Session destroyed', 'VALIDATION_ERROR')
    }
  }

  /**
   * Take a reference on every slot the plan touches.
   * Nothing stays referenced if one handle fails to resolve.
   */
  private acquireAll(stages: readonly PlanStage[]): SlotRef[] {
    const refs: SlotRef[] = []
    try {
      for (const stage of stages) {
        for (const handle of stageHandles(stage)) {
          refs.push(this.arena.acquire(handle))
        }
      }
    } catch (error) {
      for (const ref of refs) {
        this.arena.relinquish(ref)
      }
      throw error
    }
    return refs
  }

  /**
   * Encode and submit the stages, returning the completion of the queue
   * work including readback.
   */
  private execute(stages: readonly PlanStage[]): Promise<void> {
    this.device.pushErrorScope('out-of-memory')
    this.device.pushErrorScope('validation')

    let downloads: PendingDownload[] = []
    let failure: { error: unknown } | null = null
    try {
      downloads = this.encode(stages)
    } catch (error) {
      failure = { error }
    }

    // Scopes are popped in reverse push order
    const validation = this.device.popErrorScope()
    const outOfMemory = this.device.popErrorScope()

    if (failure) {
      const { error } = failure
      return Promise.all([validation, outOfMemory]).then(() => {
        throw this.classify(error)
      })
    }
    return this.complete(validation, outOfMemory, downloads).catch((error: unknown) => {
      throw this.classify(error)
    })
  }

  /**
   * Record the stages into one command buffer and submit it.
   * Barriers close the current compute pass.
   */
  private encode(stages: readonly PlanStage[]): PendingDownload[] {
    const queue = this.device.queue
    const encoder = this.device.createCommandEncoder({ label: 'Blend Plan Encoder' })
    let pass: GPUComputePassEncoder | null = null
    const downloads: PendingDownload[] = []

    const endPass = (): void => {
      pass?.end()
      pass = null
    }

    for (const stage of stages) {
      switch (stage.kind) {
        case 'allocate':
          break
        case 'upload':
          queue.writeBuffer(this.arena.resolve(stage.handle).buffer, 0, stage.data)
          break
        case 'barrier':
          endPass()
          break
        case 'dispatch': {
          if (!pass) {
            pass = encoder.beginComputePass({ label: 'Blend Pass' })
          }
          pass.setPipeline(stage.pipeline.pipeline)
          pass.setBindGroup(0, this.createBindGroup(stage))
          pass.dispatchWorkgroups(...stage.workgroups)
          break
        }
        case 'download': {
          endPass()
          const destination = this.arena.resolve(stage.destination).buffer
          encoder.copyBufferToBuffer(
            this.arena.resolve(stage.source).buffer,
            0,
            destination,
            0,
            stage.byteSize
          )
          downloads.push({ buffer: destination, byteSize: stage.byteSize, target: stage.target })
          break
        }
      }
    }
    endPass()

    queue.submit([encoder.finish()])
    return downloads
  }

  private async complete(
    validation: ErrorScopeResult,
    outOfMemory: ErrorScopeResult,
    downloads: PendingDownload[]
  ): Promise<void> {
    const [validationError, memoryError] = await Promise.all([validation, outOfMemory])
    await this.device.queue.onSubmittedWorkDone()

    if (this._state !== 'ready') {
      throw new GPUError('Device lost during submission', 'DEVICE_LOST')
    }
    if (memoryError) {
      throw new GPUError(`Out of memory: ${memoryError.message}`, 'OUT_OF_MEMORY')
    }
    if (validationError) {
      throw new GPUError(
        `Validation failed: ${validationError.message}`,
        'VALIDATION_ERROR'
      )
    }

    for (const { buffer, byteSize, target } of downloads) {
      await buffer.mapAsync(GPUMapMode.READ, 0, byteSize)
      target.set(new Float32Array(buffer.getMappedRange(0, byteSize)))
      buffer.unmap()
    }
  }

  private createBindGroup(stage: DispatchStage): GPUBindGroup {
    const { backdrop, source, result, params } = stage.bindings
    const entries: GPUBindGroupEntry[] = [
      { binding: 1, resource: { buffer: this.arena.resolve(source).buffer } },
      { binding: 2, resource: { buffer: this.arena.resolve(result).buffer } },
      { binding: 3, resource: { buffer: this.arena.resolve(params).buffer } },
    ]
    if (stage.pipeline.bindings === 'blend') {
      if (!backdrop) {
        throw new GPUError(`${stage.label} has no backdrop`, 'VALIDATION_ERROR')
      }
      entries.unshift({ binding: 0, resource: { buffer: this.arena.resolve(backdrop).buffer } })
    }

    return this.device.createBindGroup({
      label: `${stage.label} Bind Group`,
      layout: stage.pipeline.bindGroupLayout,
      entries,
    })
  }

  /**
   * Map a thrown value onto the error taxonomy.
   */
  private classify(error: unknown): GPUError {
    if (error instanceof GPUError) {
      return error
    }
    if (this._state === 'lost') {
      return new GPUError('Device lost', 'DEVICE_LOST', error instanceof Error ? error : undefined)
    }
    if (error instanceof RangeError) {
      return new GPUError('Out of memory', 'OUT_OF_MEMORY', error)
    }
    return new GPUError(
      'Submission failed',
      'INTERNAL_ERROR',
      error instanceof Error ? error : undefined
    )
  }

  private finish(id: number): void {
    const submission = this.pending.get(id)
    if (!submission) {
      return
    }
    this.pending.delete(id)
    for (const ref of submission.refs) {
      this.arena.relinquish(ref)
    }
  }

  private abandonPending(error: GPUError): void {
    for (const id of [...this.pending.keys()]) {
      this.finish(id)
      this.backend.abandon(id, error)
    }
  }

  /**
   * Set up device loss handling.
   */
  private setupDeviceLossHandling(): void {
    void this.device.lost.then((info) => {
      if (this._state === 'destroyed') {
        return
      }

      console.warn('[DeviceSession] Device lost:', info.reason, info.message)

      this._state = 'lost'
      const lost = new GPUError(`Device lost: ${info.reason} ${info.message}`.trim(), 'DEVICE_LOST')
      this.abandonPending(lost)
      this.arena.close(lost)
      this.pipelines.close(lost)
      this.device.destroy()
    })
  }

  /**
   * Set up error handling.
   */
  private setupErrorHandling(): void {
    this.device.onuncapturederror = (event) => {
      console.error('[DeviceSession] Uncaptured GPU error:', event.error.message)
    }
  }
}
