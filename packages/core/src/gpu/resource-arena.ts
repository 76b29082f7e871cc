/// <reference types="@webgpu/types" />
/**
 * Generational handle table for GPU buffers.
 *
 * Every GPU buffer the engine touches is owned by a slot in this arena and
 * referred to through a `(index, generation)` handle. Reclaiming a slot bumps
 * its generation, so a handle that outlived its slot fails to resolve instead
 * of aliasing whatever reuses the slot.
 *
 * Release is deferred: commands in flight hold a reference count on the
 * slots they touch, and a released slot is only reclaimed when that count
 * drops to zero. Reclaimed buffers go to a small reuse pool keyed by usage
 * class and capacity.
 */

import type { PixelFormat } from '../color'
import { alignTo4, SlotBufferUsage, type SlotUsage } from './buffer-utils'
import { GPUError } from './types'

/**
 * Opaque reference to a resource slot.
 */
export interface Handle {
  readonly index: number
  readonly generation: number
}

/**
 * Declared format of a slot's contents.
 */
export interface SlotFormat {
  /** Usage class the buffer was created for */
  usage: SlotUsage
  /** Pixel layout of the contents (null for parameter blocks) */
  pixelFormat: PixelFormat | null
  /** Image width in pixels (0 for parameter blocks) */
  width: number
  /** Image height in pixels (0 for parameter blocks) */
  height: number
}

/**
 * Resolved view of a live slot.
 */
export interface SlotRef {
  readonly handle: Handle
  readonly buffer: GPUBuffer
  readonly format: Readonly<SlotFormat>
  /** Requested size in bytes (the buffer may be larger) */
  readonly size: number
}

/**
 * Arena configuration.
 */
export interface ResourceArenaOptions {
  /** Upper bound on bytes of GPU buffers held by the arena (null = unbounded) */
  memoryBudget?: number | null
  /** Upper bound on bytes kept in the reuse pool */
  maxPooledBytes?: number
  /** Label prefix for created buffers */
  label?: string
}

export const DEFAULT_ARENA_OPTIONS: Required<ResourceArenaOptions> = {
  memoryBudget: null,
  maxPooledBytes: 64 * 1024 * 1024,
  label: 'Arena',
}

/**
 * Arena statistics.
 */
export interface ResourceArenaStats {
  /** Slots handed out and not released */
  live: number
  /** Slots released but still referenced by in-flight commands */
  released: number
  /** Slots available for reuse */
  free: number
  /** Bytes of buffers held by free slots */
  pooledBytes: number
  /** Bytes of all buffers currently held */
  allocatedBytes: number
}

type SlotState = 'live' | 'released' | 'free'

interface Slot {
  generation: number
  state: SlotState
  buffer: GPUBuffer | null
  /** Actual buffer size in bytes */
  capacity: number
  usage: SlotUsage | null
  format: SlotFormat | null
  size: number
  refCount: number
}

/**
 * String key for a handle, usable in maps and sets.
 */
export function handleKey(handle: Handle): string {
  return `${handle.index}:${handle.generation}`
}

export function sameHandle(a: Handle, b: Handle): boolean {
  return a.index === b.index && a.generation === b.generation
}

export class ResourceArena {
  private device: GPUDevice
  private options: Required<ResourceArenaOptions>
  private slots: Slot[] = []
  private freeList: number[] = []
  private allocatedBytes = 0
  /** Set once the owning session is gone; allocation is refused from then on */
  private closedWith: GPUError | null = null

  constructor(device: GPUDevice, options: ResourceArenaOptions = {}) {
    this.device = device
    this.options = { ...DEFAULT_ARENA_OPTIONS, ...options }
  }

  /**
   * Allocate a slot able to hold `size` bytes.
   *
   * Reuses the smallest pooled buffer of the same usage class that fits,
   * otherwise creates a new buffer.
   *
   * @throws GPUError OUT_OF_MEMORY when the memory budget would be exceeded
   * @throws GPUError with the closing code once the arena is closed
   */
  allocate(format: SlotFormat, size: number): Handle {
    this.assertOpen()
    if (!Number.isFinite(size) || size <= 0) {
      throw new GPUError(`Invalid allocation size: ${size}`, 'VALIDATION_ERROR')
    }
    const bytes = alignTo4(size)

    let index = this.takePooled(format.usage, bytes)
    if (index === -1) {
      index = this.createSlot(format.usage, bytes)
    }

    const slot = this.slotAt(index)
    slot.state = 'live'
    slot.format = { ...format }
    slot.size = bytes
    slot.refCount = 0

    return Object.freeze({ index, generation: slot.generation })
  }

  /**
   * Resolve a handle to its live slot.
   *
   * @throws GPUError STALE_HANDLE if the handle's slot was released or reused
   */
  resolve(handle: Handle): SlotRef {
    const slot = this.slots[handle.index]
    if (
      !slot ||
      slot.generation !== handle.generation ||
      slot.state !== 'live' ||
      !slot.buffer ||
      !slot.format
    ) {
      throw new GPUError(
        `Stale handle ${handleKey(handle)}`,
        'STALE_HANDLE'
      )
    }

    return {
      handle,
      buffer: slot.buffer,
      format: slot.format,
      size: slot.size,
    }
  }

  /**
   * Whether a handle still refers to a live slot.
   */
  contains(handle: Handle): boolean {
    const slot = this.slots[handle.index]
    return (
      slot !== undefined &&
      slot.generation === handle.generation &&
      slot.state === 'live'
    )
  }

  /**
   * Resolve a handle and take a reference for an in-flight command.
   */
  acquire(handle: Handle): SlotRef {
    const ref = this.resolve(handle)
    this.slotAt(handle.index).refCount++
    return ref
  }

  /**
   * Drop a reference taken with `acquire`.
   *
   * References into slots invalidated by device loss are ignored.
   */
  relinquish(ref: SlotRef): void {
    const slot = this.slots[ref.handle.index]
    if (!slot || slot.generation !== ref.handle.generation) {
      return
    }
    if (slot.refCount > 0) {
      slot.refCount--
    }
    if (slot.refCount === 0 && slot.state === 'released') {
      this.reclaim(ref.handle.index)
    }
  }

  /**
   * Release a slot. Reclamation waits until no in-flight command uses it.
   *
   * @throws GPUError STALE_HANDLE if the handle was already released
   */
  release(handle: Handle): void {
    this.resolve(handle)
    const slot = this.slotAt(handle.index)
    slot.state = 'released'
    if (slot.refCount === 0) {
      this.reclaim(handle.index)
    }
  }

  /**
   * Invalidate every slot (device loss).
   *
   * All issued handles become stale and all buffers are dropped.
   */
  invalidate(): void {
    this.freeList = []
    this.slots.forEach((slot, index) => {
      slot.buffer?.destroy()
      slot.buffer = null
      slot.capacity = 0
      slot.usage = null
      slot.format = null
      slot.refCount = 0
      slot.generation++
      slot.state = 'free'
      this.freeList.push(index)
    })
    this.allocatedBytes = 0
  }

  /**
   * Destroy all pooled buffers.
   */
  trim(): void {
    for (const index of this.freeList) {
      const slot = this.slotAt(index)
      if (slot.buffer) {
        slot.buffer.destroy()
        this.allocatedBytes -= slot.capacity
        slot.buffer = null
        slot.capacity = 0
        slot.usage = null
      }
    }
  }

  getStats(): ResourceArenaStats {
    let live = 0
    let released = 0
    for (const slot of this.slots) {
      if (slot.state === 'live') live++
      else if (slot.state === 'released') released++
    }
    return {
      live,
      released,
      free: this.freeList.length,
      pooledBytes: this.pooledBytes(),
      allocatedBytes: this.allocatedBytes,
    }
  }

  /**
   * Invalidate every slot and refuse further allocation.
   *
   * @param reason - Error every later allocation fails with
   */
  close(reason: GPUError): void {
    this.invalidate()
    this.closedWith = reason
  }

  get closed(): boolean {
    return this.closedWith !== null
  }

  /**
   * @throws GPUError with the closing code once the arena is closed
   */
  assertOpen(): void {
    if (this.closedWith) {
      throw new GPUError(this.closedWith.message, this.closedWith.code)
    }
  }

  private slotAt(index: number): Slot {
    const slot = this.slots[index]
    if (!slot) {
      throw new GPUError(`No slot at index ${index}`, 'INTERNAL_ERROR')
    }
    return slot
  }

  private pooledBytes(): number {
    let bytes = 0
    for (const index of this.freeList) {
      const slot = this.slotAt(index)
      if (slot.buffer) bytes += slot.capacity
    }
    return bytes
  }

  /**
   * Take the smallest pooled slot of `usage` with capacity >= bytes.
   * Returns -1 if none fits.
   */
  private takePooled(usage: SlotUsage, bytes: number): number {
    let best = -1
    let bestPosition = -1
    this.freeList.forEach((index, position) => {
      const slot = this.slotAt(index)
      if (!slot.buffer || slot.usage !== usage || slot.capacity < bytes) {
        return
      }
      if (best === -1 || slot.capacity < this.slotAt(best).capacity) {
        best = index
        bestPosition = position
      }
    })

    if (bestPosition !== -1) {
      this.freeList.splice(bestPosition, 1)
    }
    return best
  }

  private createSlot(usage: SlotUsage, bytes: number): number {
    this.ensureBudget(bytes)

    // Prefer an empty free slot so indices stay compact
    const emptyPosition = this.freeList.findIndex(
      (index) => this.slotAt(index).buffer === null
    )
    let index: number
    if (emptyPosition !== -1) {
      index = this.freeList.splice(emptyPosition, 1)[0] ?? -1
    } else {
      index = this.slots.length
      this.slots.push({
        generation: 0,
        state: 'free',
        buffer: null,
        capacity: 0,
        usage: null,
        format: null,
        size: 0,
        refCount: 0,
      })
    }

    const slot = this.slotAt(index)
    try {
      slot.buffer = this.device.createBuffer({
        label: `${this.options.label} slot ${index} (${usage})`,
        size: bytes,
        usage: SlotBufferUsage[usage],
      })
    } catch (error) {
      this.freeList.push(index)
      const cause = error instanceof Error ? error : undefined
      if (error instanceof RangeError) {
        throw new GPUError(
          `Device refused a ${bytes} byte buffer`,
          'OUT_OF_MEMORY',
          cause
        )
      }
      throw new GPUError('Buffer creation failed', 'INTERNAL_ERROR', cause)
    }

    slot.capacity = bytes
    slot.usage = usage
    this.allocatedBytes += bytes
    return index
  }

  private ensureBudget(bytes: number): void {
    const budget = this.options.memoryBudget
    if (budget === null || this.allocatedBytes + bytes <= budget) {
      return
    }

    this.trim()
    if (this.allocatedBytes + bytes > budget) {
      throw new GPUError(
        `Allocation of ${bytes} bytes exceeds memory budget (${this.allocatedBytes}/${budget} in use)`,
        'OUT_OF_MEMORY'
      )
    }
  }

  private reclaim(index: number): void {
    const slot = this.slotAt(index)
    slot.generation++
    slot.state = 'free'
    slot.format = null
    slot.size = 0
    slot.refCount = 0

    if (
      slot.buffer &&
      this.pooledBytes() + slot.capacity > this.options.maxPooledBytes
    ) {
      slot.buffer.destroy()
      this.allocatedBytes -= slot.capacity
      slot.buffer = null
      slot.capacity = 0
      slot.usage = null
    }

    this.freeList.push(index)
  }
}
