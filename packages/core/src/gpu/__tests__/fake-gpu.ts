/**
 * In-process WebGPU stand-in for tests.
 *
 * Buffers are plain ArrayBuffers and submitted command buffers run
 * synchronously on `queue.submit`. Blend dispatches execute the kernel on
 * the CPU through the color module, with results stored as f32 the way the
 * shader stores them. Queue completion, device loss, error scopes and
 * allocation failures can be controlled from the test.
 */

import { vi } from 'vitest'
import {
  BLEND_MODES,
  blendPixel,
  clamp01,
  decodeChannel,
  loadBasePixel,
  type ColorSpace,
  type Rgba,
} from '../../color'
import { BLEND_MODE_CODES, BLEND_WORKGROUP_SIZE, COLOR_SPACE_CODES, PIXEL_FORMAT_CODES } from '../shaders'

// ============================================================================
// WebGPU globals
// ============================================================================

export const mockGPUShaderStage = {
  VERTEX: 1,
  FRAGMENT: 2,
  COMPUTE: 4,
}

export const mockGPUBufferUsage = {
  MAP_READ: 0x0001,
  MAP_WRITE: 0x0002,
  COPY_SRC: 0x0004,
  COPY_DST: 0x0008,
  INDEX: 0x0010,
  VERTEX: 0x0020,
  UNIFORM: 0x0040,
  STORAGE: 0x0080,
  INDIRECT: 0x0100,
  QUERY_RESOLVE: 0x0200,
}

export const mockGPUMapMode = {
  READ: 0x0001,
  WRITE: 0x0002,
}

/**
 * Install the WebGPU flag namespaces the engine reads at run time.
 */
export function stubWebGPUGlobals(): void {
  vi.stubGlobal('GPUShaderStage', mockGPUShaderStage)
  vi.stubGlobal('GPUBufferUsage', mockGPUBufferUsage)
  vi.stubGlobal('GPUMapMode', mockGPUMapMode)
}

// ============================================================================
// Resources
// ============================================================================

export interface FakeBufferDescriptor {
  label?: string
  size: number
  usage: number
}

export class FakeBuffer {
  readonly label: string
  readonly size: number
  readonly usage: number
  readonly data: ArrayBuffer
  destroyed = false
  mapped = false

  constructor(descriptor: FakeBufferDescriptor) {
    this.label = descriptor.label ?? ''
    this.size = descriptor.size
    this.usage = descriptor.usage
    this.data = new ArrayBuffer(descriptor.size)
  }

  destroy(): void {
    this.destroyed = true
  }

  async mapAsync(_mode: number, _offset: number = 0, _size?: number): Promise<void> {
    if (this.destroyed) {
      throw new Error(`Buffer "${this.label}" is destroyed`)
    }
    this.mapped = true
  }

  getMappedRange(offset: number = 0, size: number = this.size - offset): ArrayBuffer {
    return this.data.slice(offset, offset + size)
  }

  unmap(): void {
    this.mapped = false
  }
}

export interface FakePipeline {
  label: string
  entryPoint: string
  constants: Record<string, number>
}

interface FakeBindGroupEntry {
  binding: number
  resource: { buffer: FakeBuffer }
}

export interface FakeBindGroup {
  label: string
  buffers: Map<number, FakeBuffer>
}

type FakeCommand =
  | {
      kind: 'dispatch'
      pipeline: FakePipeline
      bindGroup: FakeBindGroup
      workgroups: [number, number, number]
    }
  | {
      kind: 'copy'
      source: FakeBuffer
      destination: FakeBuffer
      size: number
    }

interface FakeCommandBuffer {
  commands: FakeCommand[]
}

class FakeComputePass {
  private pipeline: FakePipeline | null = null
  private bindGroup: FakeBindGroup | null = null
  ended = false

  constructor(private commands: FakeCommand[]) {}

  setPipeline(pipeline: FakePipeline): void {
    this.pipeline = pipeline
  }

  setBindGroup(_index: number, bindGroup: FakeBindGroup): void {
    this.bindGroup = bindGroup
  }

  dispatchWorkgroups(x: number, y: number = 1, z: number = 1): void {
    if (!this.pipeline || !this.bindGroup) {
      throw new Error('Dispatch without pipeline or bind group')
    }
    this.commands.push({
      kind: 'dispatch',
      pipeline: this.pipeline,
      bindGroup: this.bindGroup,
      workgroups: [x, y, z],
    })
  }

  end(): void {
    this.ended = true
  }
}

class FakeCommandEncoder {
  private commands: FakeCommand[] = []

  constructor(private device: FakeGPUDevice) {}

  beginComputePass(_descriptor?: { label?: string }): FakeComputePass {
    this.device.passCount++
    return new FakeComputePass(this.commands)
  }

  copyBufferToBuffer(
    source: FakeBuffer,
    _sourceOffset: number,
    destination: FakeBuffer,
    _destinationOffset: number,
    size: number
  ): void {
    this.commands.push({ kind: 'copy', source, destination, size })
  }

  finish(): FakeCommandBuffer {
    return { commands: this.commands }
  }
}

// ============================================================================
// Kernel
// ============================================================================

function modeForCode(code: number | undefined): (typeof BLEND_MODES)[number] {
  return BLEND_MODES.find((mode) => BLEND_MODE_CODES[mode] === code) ?? 'source-over'
}

function spaceForCode(code: number | undefined): ColorSpace {
  return code === COLOR_SPACE_CODES.linear ? 'linear' : 'srgb'
}

function loadSource(source: FakeBuffer, index: number, formatCode: number | undefined): Rgba {
  if (formatCode === PIXEL_FORMAT_CODES.rgba32float) {
    const texels = new Float32Array(source.data)
    const o = index * 4
    return [
      clamp01(texels[o] ?? 0),
      clamp01(texels[o + 1] ?? 0),
      clamp01(texels[o + 2] ?? 0),
      clamp01(texels[o + 3] ?? 0),
    ]
  }

  const bytes = new Uint8Array(source.data)
  const o = index * 4
  const format = formatCode === PIXEL_FORMAT_CODES['rgba8unorm-srgb'] ? 'rgba8unorm-srgb' : 'rgba8unorm'
  return [
    decodeChannel(bytes[o] ?? 0, format),
    decodeChannel(bytes[o + 1] ?? 0, format),
    decodeChannel(bytes[o + 2] ?? 0, format),
    (bytes[o + 3] ?? 0) / 255,
  ]
}

function requireBinding(group: FakeBindGroup, binding: number): FakeBuffer {
  const buffer = group.buffers.get(binding)
  if (!buffer) {
    throw new Error(`Bind group "${group.label}" has no binding ${binding}`)
  }
  return buffer
}

/**
 * Execute `main_blend` or `main_copy` for every invocation in range.
 */
function runDispatch(command: Extract<FakeCommand, { kind: 'dispatch' }>): void {
  const { pipeline, bindGroup, workgroups } = command
  const params = requireBinding(bindGroup, 3)
  const [width = 0, height = 0] = new Uint32Array(params.data, 0, 2)
  const opacity = new Float32Array(params.data, 8, 1)[0] ?? 0

  const source = requireBinding(bindGroup, 1)
  const result = new Float32Array(requireBinding(bindGroup, 2).data)
  const backdrop =
    pipeline.entryPoint === 'main_blend' ? new Float32Array(requireBinding(bindGroup, 0).data) : null

  const mode = modeForCode(pipeline.constants.BLEND_MODE)
  const space = spaceForCode(pipeline.constants.EVAL_SPACE)
  const formatCode = pipeline.constants.SOURCE_FORMAT

  // Blends read the source through the placement region; copies cover the canvas
  const [originX = 0, originY = 0, sourceWidth = width, sourceHeight = height] =
    backdrop ? new Uint32Array(params.data, 16, 4) : [0, 0, width, height]

  const maxX = Math.min(width, workgroups[0] * BLEND_WORKGROUP_SIZE)
  const maxY = Math.min(height, workgroups[1] * BLEND_WORKGROUP_SIZE)
  for (let y = 0; y < maxY; y++) {
    for (let x = 0; x < maxX; x++) {
      const index = y * width + x
      const o = index * 4
      if (!backdrop) {
        result.set(loadBasePixel(loadSource(source, index, formatCode), opacity), o)
        continue
      }
      const below: Rgba = [backdrop[o] ?? 0, backdrop[o + 1] ?? 0, backdrop[o + 2] ?? 0, backdrop[o + 3] ?? 0]
      const localX = x - originX
      const localY = y - originY
      if (localX < 0 || localY < 0 || localX >= sourceWidth || localY >= sourceHeight) {
        result.set(below, o)
        continue
      }
      const src = loadSource(source, localY * sourceWidth + localX, formatCode)
      result.set(blendPixel(below, src, mode, space, opacity), o)
    }
  }
}

// ============================================================================
// Queue and device
// ============================================================================

export class FakeQueue {
  submitted = 0
  private held = false
  private waiting: Array<() => void> = []

  writeBuffer(buffer: FakeBuffer, offset: number, data: ArrayBuffer): void {
    new Uint8Array(buffer.data, offset).set(new Uint8Array(data))
  }

  submit(commandBuffers: FakeCommandBuffer[]): void {
    this.submitted++
    for (const commandBuffer of commandBuffers) {
      for (const command of commandBuffer.commands) {
        if (command.kind === 'dispatch') {
          runDispatch(command)
        } else {
          new Uint8Array(command.destination.data).set(
            new Uint8Array(command.source.data, 0, command.size)
          )
        }
      }
    }
  }

  onSubmittedWorkDone(): Promise<void> {
    if (!this.held) {
      return Promise.resolve()
    }
    return new Promise((resolve) => this.waiting.push(resolve))
  }

  /** Keep submitted work pending until `release` */
  hold(): void {
    this.held = true
  }

  release(): void {
    this.held = false
    const waiting = this.waiting
    this.waiting = []
    for (const resolve of waiting) {
      resolve()
    }
  }
}

type ErrorFilter = 'validation' | 'out-of-memory' | 'internal'

interface DeviceLostInfo {
  reason: 'unknown' | 'destroyed'
  message: string
}

export class FakeGPUDevice {
  readonly label = 'Fake Device'
  readonly features = new Set<string>()
  readonly limits = {
    maxBufferSize: 256 * 1024 * 1024,
    maxStorageBufferBindingSize: 128 * 1024 * 1024,
    maxComputeWorkgroupSizeX: 256,
    maxComputeWorkgroupSizeY: 256,
    maxComputeWorkgroupSizeZ: 64,
    maxComputeWorkgroupsPerDimension: 65535,
  }
  readonly queue = new FakeQueue()
  readonly lost: Promise<DeviceLostInfo>
  onuncapturederror: ((event: { error: { message: string } }) => void) | null = null

  buffers: FakeBuffer[] = []
  pipelinesCreated = 0
  shaderModulesCreated = 0
  passCount = 0
  destroyed = false
  /** createBuffer throws a RangeError for sizes above this */
  maxAllocationSize: number | null = null
  /** createComputePipelineAsync rejects while set */
  failPipelineBuilds = false

  private resolveLost: (info: DeviceLostInfo) => void = () => {}
  private scopes: Array<{ filter: ErrorFilter; error: { message: string } | null }> = []
  private injected = new Map<ErrorFilter, string>()
  private buildGate: Promise<void> | null = null

  constructor() {
    this.lost = new Promise((resolve) => {
      this.resolveLost = resolve
    })
  }

  createBuffer(descriptor: FakeBufferDescriptor): FakeBuffer {
    if (this.maxAllocationSize !== null && descriptor.size > this.maxAllocationSize) {
      throw new RangeError(`Buffer size ${descriptor.size} exceeds limit`)
    }
    const buffer = new FakeBuffer(descriptor)
    this.buffers.push(buffer)
    return buffer
  }

  createShaderModule(descriptor: { label?: string; code: string }): { label: string; code: string } {
    this.shaderModulesCreated++
    return { label: descriptor.label ?? '', code: descriptor.code }
  }

  createBindGroupLayout(descriptor: { label?: string; entries: unknown[] }): {
    label: string
    entryCount: number
  } {
    return { label: descriptor.label ?? '', entryCount: descriptor.entries.length }
  }

  createPipelineLayout(descriptor: { label?: string }): { label: string } {
    return { label: descriptor.label ?? '' }
  }

  async createComputePipelineAsync(descriptor: {
    label?: string
    compute: { entryPoint?: string; constants?: Record<string, number> }
  }): Promise<FakePipeline> {
    this.pipelinesCreated++
    if (this.buildGate) {
      await this.buildGate
    }
    if (this.failPipelineBuilds) {
      throw new Error('Pipeline compilation failed')
    }
    return {
      label: descriptor.label ?? '',
      entryPoint: descriptor.compute.entryPoint ?? 'main',
      constants: { ...descriptor.compute.constants },
    }
  }

  createBindGroup(descriptor: { label?: string; entries: FakeBindGroupEntry[] }): FakeBindGroup {
    const buffers = new Map<number, FakeBuffer>()
    for (const entry of descriptor.entries) {
      buffers.set(entry.binding, entry.resource.buffer)
    }
    return { label: descriptor.label ?? '', buffers }
  }

  createCommandEncoder(_descriptor?: { label?: string }): FakeCommandEncoder {
    return new FakeCommandEncoder(this)
  }

  pushErrorScope(filter: ErrorFilter): void {
    const message = this.injected.get(filter)
    this.injected.delete(filter)
    this.scopes.push({ filter, error: message === undefined ? null : { message } })
  }

  popErrorScope(): Promise<{ message: string } | null> {
    const scope = this.scopes.pop()
    if (!scope) {
      return Promise.reject(new Error('OperationError: error scope stack is empty'))
    }
    return Promise.resolve(scope.error)
  }

  /** Make the next error scope of `filter` capture an error */
  injectError(filter: ErrorFilter, message: string): void {
    this.injected.set(filter, message)
  }

  /** Hold pipeline builds until the returned function is called */
  gatePipelineBuilds(): () => void {
    let open: () => void = () => {}
    this.buildGate = new Promise((resolve) => {
      open = resolve
    })
    return () => {
      this.buildGate = null
      open()
    }
  }

  /** Simulate an unexpected device loss */
  lose(message: string = 'Simulated device loss'): void {
    this.resolveLost({ reason: 'unknown', message })
  }

  destroy(): void {
    this.destroyed = true
    for (const buffer of this.buffers) {
      buffer.destroy()
    }
    this.resolveLost({ reason: 'destroyed', message: '' })
  }

  get errorScopeDepth(): number {
    return this.scopes.length
  }

  get liveBuffers(): FakeBuffer[] {
    return this.buffers.filter((buffer) => !buffer.destroyed)
  }
}

// ============================================================================
// Adapter and entry point
// ============================================================================

export interface FakeGPUOptions {
  /** requestAdapter resolves null */
  noAdapter?: boolean
  /** Adapter reports itself as a fallback adapter */
  fallback?: boolean
  /** requestDevice rejects */
  failDevice?: boolean
}

export function createFakeGPU(options: FakeGPUOptions = {}): {
  gpu: GPU
  device: FakeGPUDevice
} {
  const device = new FakeGPUDevice()
  const adapter = {
    features: new Set<string>(),
    limits: device.limits,
    info: {
      vendor: 'test-vendor',
      architecture: 'test-arch',
      device: 'test-device',
      description: 'In-process test adapter',
      isFallbackAdapter: options.fallback ?? false,
    },
    requestDevice: vi.fn(async () => {
      if (options.failDevice) {
        throw new Error('Device request refused')
      }
      return device
    }),
  }
  const gpu = {
    requestAdapter: vi.fn(async () => (options.noAdapter ? null : adapter)),
    getPreferredCanvasFormat: () => 'rgba8unorm',
    wgslLanguageFeatures: new Set<string>(),
  }
  return { gpu: gpu as unknown as GPU, device }
}

/**
 * The fake typed as a GPUDevice for code under test.
 */
export function asGPUDevice(device: FakeGPUDevice): GPUDevice {
  return device as unknown as GPUDevice
}
