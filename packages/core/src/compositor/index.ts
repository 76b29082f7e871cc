/**
 * Blend planning, GPU compositing and the CPU reference path.
 */

export {
  type BlendDescriptor,
  type PlanInput,
  type LayerInput,
  type CompositeOptions,
  type CompositorConfig,
  type BufferComparison,
  createBlendDescriptor,
  DEFAULT_COMPOSITOR_CONFIG,
} from './types'

export {
  parseLayers,
  parseCompositeOptions,
  parseCompositorConfig,
} from './schemas'

export {
  type Rectangle,
  rectangleOf,
  placeAt,
  rectangleWidth,
  rectangleHeight,
  containsRectangle,
  normalizeRectangle,
  sameRectangle,
  formatRectangle,
} from './rectangle'

export { BlendPlanner } from './blend-planner'
export { Compositor, type VerificationResult } from './compositor'
export { compositeDirect, compareBuffers } from './reference'
