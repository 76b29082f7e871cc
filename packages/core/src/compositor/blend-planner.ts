/**
 * Blend planner: turns an ordered blend stack into an execution plan.
 *
 * Descriptor 0 is loaded into a working intermediate with the copy pipeline;
 * every later descriptor folds its source onto the previous intermediate.
 * Intermediates are recycled as soon as the dispatch reading them has been
 * emitted, so a stack of any depth needs at most two.
 *
 * A descriptor with a placement covers only that rectangle of the canvas;
 * the result outside it is the backdrop unchanged.
 */

import type { PixelFormat } from '../color'
import {
  calculateDispatchSize,
  packDispatchParams,
  workingByteSize,
  DISPATCH_PARAMS_SIZE,
} from '../gpu/buffer-utils'
import { fitsDeviceLimits } from '../gpu/capabilities'
import type { PipelineCache, PipelineHandle } from '../gpu/pipeline-cache'
import {
  stageReads,
  stageWrites,
  type AllocationPurpose,
  type Plan,
  type PlanStage,
} from '../gpu/plan'
import {
  handleKey,
  type Handle,
  type ResourceArena,
  type SlotRef,
} from '../gpu/resource-arena'
import { BLEND_WORKGROUP_SIZE, pipelineKeyString, type PipelineKey } from '../gpu/shaders'
import { GPUError, type GPUCapabilities } from '../gpu/types'
import {
  containsRectangle,
  formatRectangle,
  rectangleHeight,
  rectangleOf,
  rectangleWidth,
  sameRectangle,
  type Rectangle,
} from './rectangle'
import type { BlendDescriptor, PlanInput } from './types'

interface ResolvedStep {
  descriptor: BlendDescriptor
  source: SlotRef
  format: PixelFormat
  key: PipelineKey
  placement: Rectangle
}

export class BlendPlanner {
  private arena: ResourceArena
  private pipelines: PipelineCache
  private capabilities: GPUCapabilities

  constructor(arena: ResourceArena, pipelines: PipelineCache, capabilities: GPUCapabilities) {
    this.arena = arena
    this.pipelines = pipelines
    this.capabilities = capabilities
  }

  /**
   * Build a plan for a blend stack.
   *
   * @param stack - Descriptors, bottom layer first
   * @param inputs - Source data to upload before the first dispatch
   * @throws GPUError INCOMPATIBLE_FORMATS on mismatched dimensions or a
   *   placement outside the canvas
   * @throws GPUError UNSUPPORTED_MODE when a pipeline is unavailable
   * @throws GPUError VALIDATION_ERROR on an empty or malformed stack, or one
   *   exceeding the device limits
   * @throws GPUError DEVICE_LOST when the device is lost, before or while
   *   pipelines build
   */
  async plan(stack: readonly BlendDescriptor[], inputs: readonly PlanInput[] = []): Promise<Plan> {
    this.arena.assertOpen()
    const steps = this.resolveStack(stack)
    const uploads = this.resolveInputs(inputs)

    for (const step of steps) {
      if (!this.pipelines.supports(step.key)) {
        throw new GPUError(
          `No pipeline available for ${pipelineKeyString(step.key)}`,
          'UNSUPPORTED_MODE'
        )
      }
    }

    const pipelines = await Promise.all(steps.map((step) => this.pipelines.getOrBuild(step.key)))

    // The device may have been lost and sources released while pipelines were building
    this.arena.assertOpen()
    const destination = this.arena.resolve(firstOf(stack).destination)
    for (const step of steps) {
      this.arena.resolve(step.source.handle)
    }

    const owned: Handle[] = []
    try {
      return this.emit(steps, pipelines, uploads, destination, owned)
    } catch (error) {
      for (const handle of owned) {
        if (this.arena.contains(handle)) {
          this.arena.release(handle)
        }
      }
      throw error
    }
  }

  /**
   * Check the stack and resolve every source slot.
   */
  private resolveStack(stack: readonly BlendDescriptor[]): ResolvedStep[] {
    if (stack.length === 0) {
      throw new GPUError('Blend stack is empty', 'VALIDATION_ERROR')
    }

    const destinationHandle = firstOf(stack).destination
    const destination = this.arena.resolve(destinationHandle)
    if (destination.format.usage !== 'readback') {
      throw new GPUError('Destination must be a readback slot', 'VALIDATION_ERROR')
    }
    const { width, height } = destination.format
    if (destination.size < workingByteSize(width, height)) {
      throw new GPUError(
        `Destination holds ${destination.size} bytes, ${workingByteSize(width, height)} needed`,
        'VALIDATION_ERROR'
      )
    }
    this.checkDeviceLimits(width, height)
    const canvas = rectangleOf(width, height)

    const steps: ResolvedStep[] = []
    stack.forEach((descriptor, index) => {
      if (handleKey(descriptor.destination) !== handleKey(destinationHandle)) {
        throw new GPUError(
          `Descriptor ${index} targets a different destination`,
          'VALIDATION_ERROR'
        )
      }

      const source = this.arena.resolve(descriptor.source)
      const format = source.format.pixelFormat
      if (source.format.usage !== 'storage' || format === null) {
        throw new GPUError(`Descriptor ${index} source is not an image slot`, 'VALIDATION_ERROR')
      }

      if (!fitsDeviceLimits(source.size, this.capabilities)) {
        throw new GPUError(
          `Descriptor ${index} source of ${source.size} bytes exceeds the device limits`,
          'VALIDATION_ERROR'
        )
      }

      const placement = descriptor.placement ?? canvas
      if (index === 0 && !sameRectangle(placement, canvas)) {
        throw new GPUError(
          `Descriptor 0 must cover the ${width}x${height} canvas, got ${formatRectangle(placement)}`,
          'INCOMPATIBLE_FORMATS'
        )
      }
      if (!containsRectangle(canvas, placement)) {
        throw new GPUError(
          `Descriptor ${index} placement ${formatRectangle(placement)} is outside the ${width}x${height} canvas`,
          'INCOMPATIBLE_FORMATS'
        )
      }
      const expectedWidth = rectangleWidth(placement)
      const expectedHeight = rectangleHeight(placement)
      if (source.format.width !== expectedWidth || source.format.height !== expectedHeight) {
        throw new GPUError(
          `Descriptor ${index} is ${source.format.width}x${source.format.height}, expected ${expectedWidth}x${expectedHeight}`,
          'INCOMPATIBLE_FORMATS'
        )
      }

      steps.push({
        descriptor,
        source,
        format,
        key: {
          mode: index === 0 ? 'copy' : descriptor.mode,
          space: descriptor.space,
          format,
        },
        placement,
      })
    })

    return steps
  }

  /**
   * @throws GPUError VALIDATION_ERROR when the working image or its dispatch
   *   grid exceeds what the device can bind or dispatch
   */
  private checkDeviceLimits(width: number, height: number): void {
    const bytes = workingByteSize(width, height)
    if (!fitsDeviceLimits(bytes, this.capabilities)) {
      throw new GPUError(
        `Working image of ${bytes} bytes exceeds the device limits`,
        'VALIDATION_ERROR'
      )
    }
    const maxWorkgroups = this.capabilities.limits.maxComputeWorkgroupsPerDimension
    const [x, y] = calculateDispatchSize(width, height, BLEND_WORKGROUP_SIZE)
    if (x > maxWorkgroups || y > maxWorkgroups) {
      throw new GPUError(
        `Dispatch of ${x}x${y} workgroups exceeds ${maxWorkgroups} per dimension`,
        'VALIDATION_ERROR'
      )
    }
  }

  private resolveInputs(inputs: readonly PlanInput[]): Array<{ handle: Handle; data: ArrayBuffer }> {
    return inputs.map((input) => {
      const slot = this.arena.resolve(input.handle)
      const data = copyBytes(input.data)
      if (data.byteLength > slot.size) {
        throw new GPUError(
          `Upload of ${data.byteLength} bytes exceeds slot size ${slot.size}`,
          'VALIDATION_ERROR'
        )
      }
      if (data.byteLength % 4 !== 0) {
        throw new GPUError('Upload size must be a multiple of 4 bytes', 'VALIDATION_ERROR')
      }
      return { handle: input.handle, data }
    })
  }

  /**
   * Allocate intermediates and parameter blocks and lay out the stages.
   */
  private emit(
    steps: ResolvedStep[],
    pipelines: PipelineHandle[],
    uploads: Array<{ handle: Handle; data: ArrayBuffer }>,
    destination: SlotRef,
    owned: Handle[]
  ): Plan {
    const { width, height } = destination.format
    const stages: PlanStage[] = []
    const workgroups = calculateDispatchSize(width, height, BLEND_WORKGROUP_SIZE)

    const allocate = (purpose: AllocationPurpose): Handle => {
      const handle =
        purpose === 'intermediate'
          ? this.arena.allocate(
              { usage: 'storage', pixelFormat: 'rgba32float', width, height },
              workingByteSize(width, height)
            )
          : this.arena.allocate(
              { usage: 'uniform', pixelFormat: null, width: 0, height: 0 },
              DISPATCH_PARAMS_SIZE
            )
      owned.push(handle)
      stages.push({ kind: 'allocate', handle, purpose })
      return handle
    }

    for (const upload of uploads) {
      stages.push({ kind: 'upload', handle: upload.handle, data: upload.data })
    }

    // Intermediate assignment: each result stays live until the next step
    // (or the download) has read it, then returns to the free list.
    const free: Handle[] = []
    const results: Handle[] = []
    let previous: Handle | null = null
    for (let i = 0; i < steps.length; i++) {
      const result = free.pop() ?? allocate('intermediate')
      results.push(result)
      if (previous) {
        free.push(previous)
      }
      previous = result
    }

    const params = steps.map((step) => {
      const handle = allocate('params')
      stages.push({
        kind: 'upload',
        handle,
        data: packDispatchParams(width, height, step.descriptor.opacity, {
          x: step.placement.x,
          y: step.placement.y,
          width: rectangleWidth(step.placement),
          height: rectangleHeight(step.placement),
        }),
      })
      return handle
    })

    const push = (stage: PlanStage): void => {
      const last = stages[stages.length - 1]
      if (last && readsAfterWrite(stage, last)) {
        stages.push({ kind: 'barrier' })
      }
      stages.push(stage)
    }

    steps.forEach((step, index) => {
      push({
        kind: 'dispatch',
        label: `Blend ${index} (${pipelineKeyString(step.key)})`,
        pipeline: at(pipelines, index),
        bindings: {
          backdrop: index === 0 ? null : at(results, index - 1),
          source: step.source.handle,
          result: at(results, index),
          params: at(params, index),
        },
        workgroups,
      })
    })

    const output = new Float32Array(width * height * 4)
    push({
      kind: 'download',
      source: at(results, results.length - 1),
      destination: destination.handle,
      byteSize: workingByteSize(width, height),
      target: output,
    })

    return Object.freeze({
      stages: Object.freeze(stages),
      owned: Object.freeze([...owned]),
      width,
      height,
      output,
    })
  }
}

function readsAfterWrite(stage: PlanStage, previous: PlanStage): boolean {
  const written = new Set(stageWrites(previous).map(handleKey))
  return stageReads(stage).some((handle) => written.has(handleKey(handle)))
}

function copyBytes(data: ArrayBufferView | ArrayBuffer): ArrayBuffer {
  const bytes =
    data instanceof ArrayBuffer
      ? new Uint8Array(data)
      : new Uint8Array(data.buffer, data.byteOffset, data.byteLength)
  const copy = new ArrayBuffer(bytes.byteLength)
  new Uint8Array(copy).set(bytes)
  return copy
}

function firstOf<T>(items: readonly T[]): T {
  return at(items, 0)
}

function at<T>(items: readonly T[], index: number): T {
  const item = items[index]
  if (item === undefined) {
    throw new GPUError(`Missing plan entry ${index}`, 'INTERNAL_ERROR')
  }
  return item
}
