/**
 * Compositor request and config schemas.
 *
 * Zod schemas for runtime validation of layers handed in by callers.
 */

import { z } from 'zod'
import { BLEND_MODES, COLOR_SPACES, PIXEL_FORMATS } from '../color'
import { GPUError } from '../gpu/types'
import type { CompositeOptions, CompositorConfig, LayerInput } from './types'

// ============================================================================
// Pixel buffers
// ============================================================================

const dimensionSchema = z.number().int().positive()

const pixelBufferSchema = z
  .union([
    z.object({
      width: dimensionSchema,
      height: dimensionSchema,
      format: z.enum(['rgba8unorm-srgb', 'rgba8unorm']),
      data: z.instanceof(Uint8Array),
    }),
    z.object({
      width: dimensionSchema,
      height: dimensionSchema,
      format: z.literal('rgba32float'),
      data: z.instanceof(Float32Array),
    }),
  ])
  .superRefine((buffer, ctx) => {
    const expected = buffer.width * buffer.height * 4
    if (buffer.data.length !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${expected} channel values, got ${buffer.data.length}`,
        path: ['data'],
      })
    }
  })

// ============================================================================
// Layers
// ============================================================================

const coordinateSchema = z.number().int().min(0)

const rectangleSchema = z.object({
  x: coordinateSchema,
  y: coordinateSchema,
  maxX: coordinateSchema,
  maxY: coordinateSchema,
})

const layerSchema = z.object({
  buffer: pixelBufferSchema,
  mode: z.enum(BLEND_MODES),
  space: z.enum(COLOR_SPACES),
  opacity: z.number().min(0).max(1).optional(),
  placement: rectangleSchema.optional(),
})

const layersSchema = z.array(layerSchema).min(1, 'At least one layer is required')

const compositeOptionsSchema = z.object({
  outputFormat: z.enum(PIXEL_FORMATS).optional(),
  signal: z.instanceof(AbortSignal).optional(),
})

export const compositorConfigSchema = z.object({
  outOfMemoryRetries: z.number().int().min(0).optional(),
  channelTolerance: z.number().min(0).optional(),
  logPerformance: z.boolean().optional(),
})

// ============================================================================
// Parse helpers
// ============================================================================

function toValidationError(what: string, error: z.ZodError): GPUError {
  const detail = error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
  return new GPUError(`Invalid ${what}: ${detail}`, 'VALIDATION_ERROR', error)
}

/**
 * Validate composite layers.
 *
 * @throws GPUError VALIDATION_ERROR describing every issue
 */
export function parseLayers(data: unknown): LayerInput[] {
  const result = layersSchema.safeParse(data)
  if (!result.success) {
    throw toValidationError('layers', result.error)
  }
  return result.data
}

export function parseCompositeOptions(data: unknown): CompositeOptions {
  const result = compositeOptionsSchema.safeParse(data)
  if (!result.success) {
    throw toValidationError('composite options', result.error)
  }
  return result.data
}

export function parseCompositorConfig(data: unknown): CompositorConfig {
  const result = compositorConfigSchema.safeParse(data)
  if (!result.success) {
    throw toValidationError('compositor config', result.error)
  }
  return result.data
}
