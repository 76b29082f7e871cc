/**
 * Compositor: the public entry point of the blend engine.
 *
 * Validates layers, uploads them into arena slots, plans the blend stack,
 * submits it to the device session and hands the result back as a pixel
 * buffer. The session wait is the only suspension point after planning.
 *
 * Aborting rejects at once; work already submitted keeps draining and its
 * slots return to the pool when it completes.
 */

import { encodePixels, type PixelBuffer, type PixelFormat } from '../color'
import { imageByteSize, workingByteSize } from '../gpu/buffer-utils'
import type { DeviceSession } from '../gpu/device-session'
import type { Plan } from '../gpu/plan'
import type { Handle } from '../gpu/resource-arena'
import { GPUError, hasErrorCode } from '../gpu/types'
import { BlendPlanner } from './blend-planner'
import { compareBuffers, compositeDirect } from './reference'
import { parseCompositeOptions, parseCompositorConfig, parseLayers } from './schemas'
import {
  createBlendDescriptor,
  DEFAULT_COMPOSITOR_CONFIG,
  type BufferComparison,
  type CompositeOptions,
  type CompositorConfig,
  type LayerInput,
} from './types'

/**
 * Result of running a stack on both paths.
 */
export interface VerificationResult {
  gpu: PixelBuffer
  direct: PixelBuffer
  comparison: BufferComparison
}

export class Compositor {
  private _session: DeviceSession
  private _planner: BlendPlanner
  private _config: Required<CompositorConfig>

  constructor(session: DeviceSession, config: CompositorConfig = {}) {
    this._session = session
    this._planner = new BlendPlanner(session.arena, session.pipelines, session.capabilities)
    this._config = { ...DEFAULT_COMPOSITOR_CONFIG, ...parseCompositorConfig(config) }
  }

  get session(): DeviceSession {
    return this._session
  }

  get config(): Readonly<Required<CompositorConfig>> {
    return { ...this._config }
  }

  /**
   * Update compositor configuration.
   */
  configure(config: Partial<CompositorConfig>): void {
    this._config = { ...this._config, ...parseCompositorConfig(config) }
  }

  /**
   * Composite layers on the GPU, bottom layer first.
   *
   * @throws GPUError with the code of the first failure
   * @throws DOMException AbortError when `options.signal` aborts
   */
  async composite(
    layers: readonly LayerInput[],
    options: CompositeOptions = {}
  ): Promise<PixelBuffer> {
    const parsed = parseLayers(layers)
    const { outputFormat, signal } = parseCompositeOptions(options)
    throwIfAborted(signal)

    const startTime = performance.now()
    let attempt = 0
    for (;;) {
      try {
        const result = await this.run(parsed, outputFormat, signal)
        this.logPerformance(parsed, startTime, attempt)
        return result
      } catch (error) {
        if (
          hasErrorCode(error, 'OUT_OF_MEMORY') &&
          attempt < this._config.outOfMemoryRetries
        ) {
          attempt++
          console.warn(
            `[Compositor] Out of memory, trimming pool and retrying (${attempt}/${this._config.outOfMemoryRetries})`
          )
          this._session.arena.trim()
          continue
        }
        throw error
      }
    }
  }

  /**
   * Composite the same layers on the GPU and on the CPU and compare them
   * within the configured channel tolerance.
   */
  async verify(
    layers: readonly LayerInput[],
    options: Omit<CompositeOptions, 'signal'> = {}
  ): Promise<VerificationResult> {
    const gpu = await this.composite(layers, options)
    const direct = compositeDirect(layers, { outputFormat: gpu.format })
    return {
      gpu,
      direct,
      comparison: compareBuffers(gpu, direct, this._config.channelTolerance),
    }
  }

  private async run(
    layers: LayerInput[],
    outputFormat: PixelFormat | undefined,
    signal: AbortSignal | undefined
  ): Promise<PixelBuffer> {
    const arena = this._session.arena
    const held: Handle[] = []
    let plan: Plan | null = null

    this._session.assertUsable()
    try {
      const sources = layers.map((layer) => {
        const { width, height, format } = layer.buffer
        const handle = arena.allocate(
          { usage: 'storage', pixelFormat: format, width, height },
          imageByteSize(format, width, height)
        )
        held.push(handle)
        return handle
      })

      const base = layers[0]
      if (!base) {
        throw new GPUError('At least one layer is required', 'VALIDATION_ERROR')
      }
      const { width, height } = base.buffer
      const destination = arena.allocate(
        { usage: 'readback', pixelFormat: 'rgba32float', width, height },
        workingByteSize(width, height)
      )
      held.push(destination)

      const stack = layers.map((layer, index) =>
        createBlendDescriptor({
          source: sourceAt(sources, index),
          destination,
          mode: layer.mode,
          space: layer.space,
          opacity: layer.opacity,
          placement: layer.placement ?? null,
        })
      )
      const inputs = layers.map((layer, index) => ({
        handle: sourceAt(sources, index),
        data: layer.buffer.data,
      }))

      plan = await this._planner.plan(stack, inputs)
      throwIfAborted(signal)
      const token = this._session.submit(plan)

      await untilAborted(this._session.wait(token), signal)

      return encodePixels(plan.output, width, height, outputFormat ?? base.buffer.format)
    } finally {
      const owned = plan ? plan.owned : []
      for (const handle of [...held, ...owned]) {
        if (arena.contains(handle)) {
          arena.release(handle)
        }
      }
    }
  }

  private logPerformance(layers: LayerInput[], startTime: number, retries: number): void {
    if (!this._config.logPerformance) {
      return
    }
    const base = layers[0]
    const size = base ? `${base.buffer.width}x${base.buffer.height}` : '0x0'
    const timing = performance.now() - startTime
    console.log(
      `[Compositor] ${layers.length} layers ${size}: ${timing.toFixed(2)}ms` +
        (retries > 0 ? ` after ${retries} retries` : '')
    )
  }
}

function sourceAt(sources: Handle[], index: number): Handle {
  const handle = sources[index]
  if (!handle) {
    throw new GPUError(`Missing source slot ${index}`, 'INTERNAL_ERROR')
  }
  return handle
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason
  return reason instanceof Error
    ? reason
    : new DOMException('The operation was aborted', 'AbortError')
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw abortReason(signal)
  }
}

/**
 * Settle with `work`, or reject as soon as `signal` aborts. The work itself
 * is left running.
 */
function untilAborted(work: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
  if (!signal) {
    return work
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal))
    signal.addEventListener('abort', onAbort, { once: true })
    work.then(
      () => {
        signal.removeEventListener('abort', onAbort)
        resolve()
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort)
        if (signal.aborted) {
          console.warn('[Compositor] Submission failed after abort:', error)
        }
        reject(error)
      }
    )
  })
}
