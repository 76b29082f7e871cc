/**
 * WGSL blend shader.
 *
 * Embedded as strings to avoid build system issues with raw imports. One
 * source exists per source texel layout (packed 8-bit or float); blend mode,
 * evaluation space and source encoding are selected through
 * pipeline-overridable constants so each pipeline key specializes the same
 * module.
 */

import type { BlendMode, ColorSpace, PixelFormat } from '../../color'

/**
 * Override constant values for each blend mode.
 */
export const BLEND_MODE_CODES: Readonly<Record<BlendMode, number>> = {
  'source-over': 0,
  multiply: 1,
  screen: 2,
  overlay: 3,
  'hard-light': 4,
  darken: 5,
  lighten: 6,
  difference: 7,
  exclusion: 8,
}

/**
 * Override constant values for each evaluation space.
 */
export const COLOR_SPACE_CODES: Readonly<Record<ColorSpace, number>> = {
  srgb: 0,
  linear: 1,
}

/**
 * Override constant values for each source storage format.
 */
export const PIXEL_FORMAT_CODES: Readonly<Record<PixelFormat, number>> = {
  'rgba8unorm-srgb': 0,
  rgba8unorm: 1,
  rgba32float: 2,
}

/**
 * How source texels are laid out in their storage buffer.
 * - packed: one u32 per texel, RGBA bytes (8-bit formats)
 * - float: one vec4<f32> per texel (rgba32float)
 */
export type SourceKind = 'packed' | 'float'

export function sourceKindOf(format: PixelFormat): SourceKind {
  return format === 'rgba32float' ? 'float' : 'packed'
}

/** Workgroup edge length, must match @workgroup_size below */
export const BLEND_WORKGROUP_SIZE = 16

/**
 * Shared WGSL: parameters, transfer functions, blend formulas and
 * compositing. Mirrors color/transfer.ts and color/blend-modes.ts.
 */
export const BLEND_SHADER_COMMON = /* wgsl */ `
override BLEND_MODE: u32 = 0u;
override EVAL_SPACE: u32 = 0u;
override SOURCE_FORMAT: u32 = 0u;

struct Params {
    width: u32,
    height: u32,
    opacity: f32,
    _padding: f32,
    // Canvas region covered by the source layer
    origin_x: u32,
    origin_y: u32,
    source_width: u32,
    source_height: u32,
}

@group(0) @binding(2) var<storage, read_write> result: array<vec4<f32>>;
@group(0) @binding(3) var<uniform> params: Params;

fn srgb_to_linear(c: f32) -> f32 {
    let v = clamp(c, 0.0, 1.0);
    if (v <= 0.04045) {
        return v / 12.92;
    }
    return pow((v + 0.055) / 1.055, 2.4);
}

fn linear_to_srgb(l: f32) -> f32 {
    let v = clamp(l, 0.0, 1.0);
    if (v <= 0.0031308) {
        return v * 12.92;
    }
    return 1.055 * pow(v, 1.0 / 2.4) - 0.055;
}

fn to_working(rgb: vec3<f32>) -> vec3<f32> {
    if (EVAL_SPACE == 0u) {
        return vec3<f32>(linear_to_srgb(rgb.r), linear_to_srgb(rgb.g), linear_to_srgb(rgb.b));
    }
    return clamp(rgb, vec3<f32>(0.0), vec3<f32>(1.0));
}

fn from_working(rgb: vec3<f32>) -> vec3<f32> {
    if (EVAL_SPACE == 0u) {
        return vec3<f32>(srgb_to_linear(rgb.r), srgb_to_linear(rgb.g), srgb_to_linear(rgb.b));
    }
    return clamp(rgb, vec3<f32>(0.0), vec3<f32>(1.0));
}

fn screen(cb: vec3<f32>, cs: vec3<f32>) -> vec3<f32> {
    return cb + cs - cb * cs;
}

fn hard_light(cb: vec3<f32>, cs: vec3<f32>) -> vec3<f32> {
    let low = cb * (2.0 * cs);
    let high = screen(cb, 2.0 * cs - vec3<f32>(1.0));
    return select(high, low, cs <= vec3<f32>(0.5));
}

// Separable blend function B(Cb, Cs)
fn blend_fn(cb: vec3<f32>, cs: vec3<f32>) -> vec3<f32> {
    switch BLEND_MODE {
        case 1u: { return cb * cs; }
        case 2u: { return screen(cb, cs); }
        case 3u: { return hard_light(cs, cb); }
        case 4u: { return hard_light(cb, cs); }
        case 5u: { return min(cb, cs); }
        case 6u: { return max(cb, cs); }
        case 7u: { return abs(cb - cs); }
        case 8u: { return cb + cs - 2.0 * cb * cs; }
        default: { return cs; }
    }
}

// Source-over compositing with straight alpha
fn composite(backdrop: vec4<f32>, src: vec4<f32>) -> vec4<f32> {
    let alpha_b = clamp(backdrop.a, 0.0, 1.0);
    let alpha_s = clamp(src.a, 0.0, 1.0) * clamp(params.opacity, 0.0, 1.0);
    let alpha_o = alpha_s + alpha_b * (1.0 - alpha_s);

    let cb = to_working(backdrop.rgb);
    let cs = to_working(src.rgb);
    let mixed = (1.0 - alpha_b) * cs + alpha_b * blend_fn(cb, cs);

    var co = vec3<f32>(0.0);
    if (alpha_o > 0.0) {
        co = (alpha_s * mixed + alpha_b * cb * (1.0 - alpha_s)) / alpha_o;
    }
    return vec4<f32>(from_working(co), alpha_o);
}
`

const PACKED_SOURCE_BINDING = /* wgsl */ `
@group(0) @binding(1) var<storage, read> source: array<u32>;

fn load_source(index: u32) -> vec4<f32> {
    let texel = unpack4x8unorm(source[index]);
    if (SOURCE_FORMAT == 0u) {
        return vec4<f32>(srgb_to_linear(texel.r), srgb_to_linear(texel.g), srgb_to_linear(texel.b), texel.a);
    }
    return texel;
}
`

const FLOAT_SOURCE_BINDING = /* wgsl */ `
@group(0) @binding(1) var<storage, read> source: array<vec4<f32>>;

fn load_source(index: u32) -> vec4<f32> {
    return clamp(source[index], vec4<f32>(0.0), vec4<f32>(1.0));
}
`

const ENTRY_POINTS = /* wgsl */ `
@group(0) @binding(0) var<storage, read> backdrop: array<vec4<f32>>;

// Fold one layer onto the accumulated backdrop
@compute @workgroup_size(16, 16)
fn main_blend(@builtin(global_invocation_id) global_id: vec3<u32>) {
    if (global_id.x >= params.width || global_id.y >= params.height) {
        return;
    }
    let index = global_id.y * params.width + global_id.x;
    let below = backdrop[index];

    // Outside the placed layer the backdrop passes through
    if (global_id.x < params.origin_x || global_id.y < params.origin_y) {
        result[index] = below;
        return;
    }
    let local = global_id.xy - vec2<u32>(params.origin_x, params.origin_y);
    if (local.x >= params.source_width || local.y >= params.source_height) {
        result[index] = below;
        return;
    }
    result[index] = composite(below, load_source(local.y * params.source_width + local.x));
}

// Load the base layer into linear float working storage
@compute @workgroup_size(16, 16)
fn main_copy(@builtin(global_invocation_id) global_id: vec3<u32>) {
    if (global_id.x >= params.width || global_id.y >= params.height) {
        return;
    }
    let index = global_id.y * params.width + global_id.x;
    let texel = load_source(index);
    result[index] = vec4<f32>(texel.rgb, texel.a * clamp(params.opacity, 0.0, 1.0));
}
`

/**
 * Assemble the blend shader for one source layout.
 */
export function buildBlendShaderSource(kind: SourceKind): string {
  const binding = kind === 'packed' ? PACKED_SOURCE_BINDING : FLOAT_SOURCE_BINDING
  return `${BLEND_SHADER_COMMON}\n${binding}\n${ENTRY_POINTS}`
}

/**
 * Blend shader reading packed 8-bit source texels.
 */
export const PACKED_BLEND_SHADER_SOURCE = buildBlendShaderSource('packed')

/**
 * Blend shader reading rgba32float source texels.
 */
export const FLOAT_BLEND_SHADER_SOURCE = buildBlendShaderSource('float')
