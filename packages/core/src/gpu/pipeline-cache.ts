/// <reference types="@webgpu/types" />
/**
 * Compiled pipeline cache.
 *
 * Pipelines are keyed by (mode, space, format) and built at most once per
 * cache lifetime. Concurrent requests for a key that is still building share
 * the in-flight build. A failed build is forgotten so a later request can
 * retry.
 */

import {
  DEFAULT_SHADER_LIBRARY,
  pipelineKeyString,
  type BindingLayoutKind,
  type PipelineKey,
  type ShaderLibrary,
} from './shaders'
import { GPUError } from './types'

/**
 * A compiled pipeline and the layout its bind groups must follow.
 */
export interface PipelineHandle {
  readonly key: Readonly<PipelineKey>
  readonly pipeline: GPUComputePipeline
  readonly bindGroupLayout: GPUBindGroupLayout
  readonly bindings: BindingLayoutKind
}

export interface PipelineCacheStats {
  /** Pipelines ready for use */
  ready: number
  /** Builds in flight */
  pending: number
  /** Builds started over the cache lifetime */
  builds: number
}

interface Waiter {
  resolve: (handle: PipelineHandle) => void
  reject: (error: unknown) => void
}

type CacheEntry =
  | { state: 'pending'; waiters: Waiter[] }
  | { state: 'ready'; handle: PipelineHandle }

export class PipelineCache {
  private device: GPUDevice
  private library: ShaderLibrary
  private entries = new Map<string, CacheEntry>()
  private modules = new Map<string, GPUShaderModule>()
  private layouts = new Map<BindingLayoutKind, GPUBindGroupLayout>()
  private builds = 0
  /** Bumped by clear() so builds started earlier are not inserted */
  private epoch = 0
  private closedWith: GPUError | null = null

  constructor(device: GPUDevice, library: ShaderLibrary = DEFAULT_SHADER_LIBRARY) {
    this.device = device
    this.library = library
  }

  /**
   * Whether the library provides an artifact for a key.
   */
  supports(key: PipelineKey): boolean {
    return this.library.resolve(key) !== undefined
  }

  /**
   * Whether a pipeline for the key is built and ready.
   */
  has(key: PipelineKey): boolean {
    return this.entries.get(pipelineKeyString(key))?.state === 'ready'
  }

  /**
   * Get the pipeline for a key, building it if needed.
   *
   * @throws GPUError UNSUPPORTED_MODE when the library has no artifact
   * @throws GPUError with the closing code once the cache is closed
   */
  getOrBuild(key: PipelineKey): Promise<PipelineHandle> {
    if (this.closedWith) {
      return Promise.reject(new GPUError(this.closedWith.message, this.closedWith.code))
    }
    const id = pipelineKeyString(key)
    const entry = this.entries.get(id)

    if (entry?.state === 'ready') {
      return Promise.resolve(entry.handle)
    }

    return new Promise<PipelineHandle>((resolve, reject) => {
      if (entry?.state === 'pending') {
        entry.waiters.push({ resolve, reject })
        return
      }

      const pending: CacheEntry = { state: 'pending', waiters: [{ resolve, reject }] }
      this.entries.set(id, pending)
      void this.build(id, key, pending)
    })
  }

  /**
   * Drop every pipeline, module and layout (device loss).
   */
  clear(): void {
    this.epoch++
    this.entries.clear()
    this.modules.clear()
    this.layouts.clear()
  }

  /**
   * Clear the cache and refuse further builds. Requests still waiting on a
   * build are rejected with `reason`.
   */
  close(reason: GPUError): void {
    const waiting: Waiter[] = []
    for (const entry of this.entries.values()) {
      if (entry.state === 'pending') {
        waiting.push(...entry.waiters)
      }
    }
    this.closedWith = reason
    this.clear()
    for (const waiter of waiting) {
      waiter.reject(new GPUError(reason.message, reason.code))
    }
  }

  getStats(): PipelineCacheStats {
    let ready = 0
    let pending = 0
    for (const entry of this.entries.values()) {
      if (entry.state === 'ready') ready++
      else pending++
    }
    return { ready, pending, builds: this.builds }
  }

  /**
   * Run one build and settle every waiter of the pending entry.
   * Never rejects: failures are delivered to the waiters.
   */
  private async build(
    id: string,
    key: PipelineKey,
    entry: Extract<CacheEntry, { state: 'pending' }>
  ): Promise<void> {
    const epoch = this.epoch
    try {
      const handle = await this.compile(key)
      if (this.closedWith) {
        // Waiters were rejected by close()
        return
      }
      if (epoch === this.epoch && this.entries.get(id) === entry) {
        this.entries.set(id, { state: 'ready', handle })
      }
      for (const waiter of entry.waiters) {
        waiter.resolve(handle)
      }
    } catch (error) {
      if (this.closedWith) {
        // Superseded by the rejection close() delivered
        return
      }
      if (this.entries.get(id) === entry) {
        this.entries.delete(id)
      }
      console.warn(`[PipelineCache] Build failed for ${id}:`, error)
      for (const waiter of entry.waiters) {
        waiter.reject(error)
      }
    }
  }

  private async compile(key: PipelineKey): Promise<PipelineHandle> {
    const artifact = this.library.resolve(key)
    if (!artifact) {
      throw new GPUError(
        `No pipeline available for ${pipelineKeyString(key)}`,
        'UNSUPPORTED_MODE'
      )
    }

    this.builds++
    const bindGroupLayout = this.getLayout(artifact.bindings)
    const pipelineLayout = this.device.createPipelineLayout({
      label: `${artifact.label} Pipeline Layout`,
      bindGroupLayouts: [bindGroupLayout],
    })

    let pipeline: GPUComputePipeline
    try {
      pipeline = await this.device.createComputePipelineAsync({
        label: `${artifact.label} Compute Pipeline`,
        layout: pipelineLayout,
        compute: {
          module: this.getModule(artifact.code),
          entryPoint: artifact.entryPoint,
          constants: artifact.constants,
        },
      })
    } catch (error) {
      throw new GPUError(
        `Pipeline creation failed for ${pipelineKeyString(key)}`,
        'VALIDATION_ERROR',
        error instanceof Error ? error : undefined
      )
    }

    return Object.freeze({
      key: Object.freeze({ ...key }),
      pipeline,
      bindGroupLayout,
      bindings: artifact.bindings,
    })
  }

  private getModule(code: string): GPUShaderModule {
    let module = this.modules.get(code)
    if (!module) {
      module = this.device.createShaderModule({ label: 'Blend Shader', code })
      this.modules.set(code, module)
    }
    return module
  }

  private getLayout(kind: BindingLayoutKind): GPUBindGroupLayout {
    let layout = this.layouts.get(kind)
    if (layout) {
      return layout
    }

    const entries: GPUBindGroupLayoutEntry[] = [
      {
        // Source layer
        binding: 1,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: 'read-only-storage' },
      },
      {
        // Result
        binding: 2,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: 'storage' },
      },
      {
        // Dispatch parameters
        binding: 3,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: 'uniform' },
      },
    ]
    if (kind === 'blend') {
      entries.unshift({
        // Backdrop
        binding: 0,
        visibility: GPUShaderStage.COMPUTE,
        buffer: { type: 'read-only-storage' },
      })
    }

    layout = this.device.createBindGroupLayout({
      label: `Blend Bind Group Layout (${kind})`,
      entries,
    })
    this.layouts.set(kind, layout)
    return layout
  }
}
