/**
 * GPU shader sources and the library that maps pipeline keys onto them.
 */

export {
  BLEND_MODE_CODES,
  COLOR_SPACE_CODES,
  PIXEL_FORMAT_CODES,
  BLEND_WORKGROUP_SIZE,
  BLEND_SHADER_COMMON,
  PACKED_BLEND_SHADER_SOURCE,
  FLOAT_BLEND_SHADER_SOURCE,
  type SourceKind,
  sourceKindOf,
  buildBlendShaderSource,
} from './blend-shader'

export {
  type PipelineMode,
  type PipelineKey,
  type BindingLayoutKind,
  type ShaderArtifact,
  type ShaderLibrary,
  pipelineKeyString,
  createShaderLibrary,
  DEFAULT_SHADER_LIBRARY,
} from './library'
