/**
 * Execution plan consumed by the device session.
 *
 * A plan is an ordered list of stages. It is static once built and is
 * submitted at most once.
 */

import type { PipelineHandle } from './pipeline-cache'
import type { Handle } from './resource-arena'

/**
 * Slots bound to one dispatch. `backdrop` is null for the copy pipeline.
 */
export interface DispatchBindings {
  backdrop: Handle | null
  source: Handle
  result: Handle
  params: Handle
}

/**
 * What an allocate stage allocated.
 * - intermediate: rgba32float working image
 * - params: dispatch parameter block
 */
export type AllocationPurpose = 'intermediate' | 'params'

export type PlanStage =
  | {
      kind: 'allocate'
      handle: Handle
      purpose: AllocationPurpose
    }
  | {
      kind: 'upload'
      handle: Handle
      /** Bytes written at offset 0 */
      data: ArrayBuffer
    }
  | {
      kind: 'dispatch'
      label: string
      pipeline: PipelineHandle
      bindings: DispatchBindings
      workgroups: readonly [number, number, number]
    }
  | {
      kind: 'barrier'
    }
  | {
      kind: 'download'
      /** Intermediate holding the result */
      source: Handle
      /** Readback slot the result is copied into */
      destination: Handle
      byteSize: number
      /** Host array receiving the mapped readback */
      target: Float32Array
    }

export type PlanStageKind = PlanStage['kind']

export interface Plan {
  readonly stages: readonly PlanStage[]
  /** Handles allocated for this plan; released by its owner after completion */
  readonly owned: readonly Handle[]
  readonly width: number
  readonly height: number
  /** Host array the final download fills (linear rgba32float) */
  readonly output: Float32Array
}

/**
 * Handles a stage reads.
 */
export function stageReads(stage: PlanStage): Handle[] {
  switch (stage.kind) {
    case 'dispatch': {
      const { backdrop, source, params } = stage.bindings
      return backdrop ? [backdrop, source, params] : [source, params]
    }
    case 'download':
      return [stage.source]
    default:
      return []
  }
}

/**
 * Handles a stage writes.
 */
export function stageWrites(stage: PlanStage): Handle[] {
  switch (stage.kind) {
    case 'upload':
      return [stage.handle]
    case 'dispatch':
      return [stage.bindings.result]
    case 'download':
      return [stage.destination]
    default:
      return []
  }
}

/**
 * Handles a stage reads or writes.
 */
export function stageHandles(stage: PlanStage): Handle[] {
  switch (stage.kind) {
    case 'allocate':
    case 'barrier':
      return []
    case 'upload':
      return [stage.handle]
    case 'dispatch': {
      const { backdrop, source, result, params } = stage.bindings
      return backdrop ? [backdrop, source, result, params] : [source, result, params]
    }
    case 'download':
      return [stage.source, stage.destination]
  }
}
