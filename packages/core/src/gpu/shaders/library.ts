/**
 * Shader library: maps a pipeline key to the shader artifact that builds it.
 *
 * The engine does not author shaders at run time. A library is produced
 * ahead of time and handed to the pipeline cache; the default one embeds the
 * blend shaders from this directory.
 */

import {
  BLEND_MODES,
  isBlendMode,
  isColorSpace,
  isPixelFormat,
  type BlendMode,
  type ColorSpace,
  type PixelFormat,
} from '../../color'
import {
  BLEND_MODE_CODES,
  COLOR_SPACE_CODES,
  PIXEL_FORMAT_CODES,
  buildBlendShaderSource,
  sourceKindOf,
} from './blend-shader'

/**
 * Blend mode of a pipeline, or `copy` for loading the base layer.
 */
export type PipelineMode = BlendMode | 'copy'

export interface PipelineKey {
  readonly mode: PipelineMode
  /** Evaluation color space */
  readonly space: ColorSpace
  /** Storage format of the source layer */
  readonly format: PixelFormat
}

/**
 * Bind group shape an artifact expects.
 * - blend: backdrop (0), source (1), result (2), params (3)
 * - copy: source (1), result (2), params (3)
 */
export type BindingLayoutKind = 'blend' | 'copy'

export interface ShaderArtifact {
  label: string
  code: string
  entryPoint: string
  constants: Record<string, number>
  bindings: BindingLayoutKind
}

export interface ShaderLibrary {
  /** Artifact for a key, or undefined if the library has none */
  resolve(key: PipelineKey): ShaderArtifact | undefined
}

/**
 * Cache key for a pipeline. The copy pipeline does not evaluate a blend, so
 * its key leaves the space out.
 */
export function pipelineKeyString(key: PipelineKey): string {
  if (key.mode === 'copy') {
    return `copy/${key.format}`
  }
  return `${key.mode}/${key.space}/${key.format}`
}

function isKnownKey(key: PipelineKey): boolean {
  return (
    (key.mode === 'copy' || isBlendMode(key.mode)) &&
    isColorSpace(key.space) &&
    isPixelFormat(key.format)
  )
}

/**
 * Create a library over the embedded WGSL sources.
 *
 * @param modes - Blend modes the library provides (default: all)
 */
export function createShaderLibrary(
  modes: readonly BlendMode[] = BLEND_MODES
): ShaderLibrary {
  const sources = {
    packed: buildBlendShaderSource('packed'),
    float: buildBlendShaderSource('float'),
  }

  return {
    resolve(key: PipelineKey): ShaderArtifact | undefined {
      if (!isKnownKey(key)) {
        return undefined
      }
      const code = sources[sourceKindOf(key.format)]
      const label = `Blend ${pipelineKeyString(key)}`

      if (key.mode === 'copy') {
        return {
          label,
          code,
          entryPoint: 'main_copy',
          constants: { SOURCE_FORMAT: PIXEL_FORMAT_CODES[key.format] },
          bindings: 'copy',
        }
      }

      if (!modes.includes(key.mode)) {
        return undefined
      }
      return {
        label,
        code,
        entryPoint: 'main_blend',
        constants: {
          BLEND_MODE: BLEND_MODE_CODES[key.mode],
          EVAL_SPACE: COLOR_SPACE_CODES[key.space],
          SOURCE_FORMAT: PIXEL_FORMAT_CODES[key.format],
        },
        bindings: 'blend',
      }
    },
  }
}

export const DEFAULT_SHADER_LIBRARY: ShaderLibrary = createShaderLibrary()
