/**
 * Blend mode formulas.
 *
 * These are the ground truth for the WGSL blend shader: every mode operates
 * per channel on values in [0, 1], followed by source-over compositing with
 * straight alpha. See `BLEND_SHADER_COMMON` in ../gpu/shaders for the GPU
 * counterpart.
 */

import type { BlendMode, ColorSpace, Rgba } from './types'
import { clamp01, linearToWorking, workingToLinear } from './transfer'

type ChannelFormula = (cb: number, cs: number) => number

function multiply(cb: number, cs: number): number {
  return cb * cs
}

function screen(cb: number, cs: number): number {
  return cb + cs - cb * cs
}

function hardLight(cb: number, cs: number): number {
  return cs <= 0.5 ? multiply(cb, 2 * cs) : screen(cb, 2 * cs - 1)
}

const FORMULAS: Record<BlendMode, ChannelFormula> = {
  'source-over': (_cb, cs) => cs,
  multiply,
  screen,
  overlay: (cb, cs) => hardLight(cs, cb),
  'hard-light': hardLight,
  darken: (cb, cs) => Math.min(cb, cs),
  lighten: (cb, cs) => Math.max(cb, cs),
  difference: (cb, cs) => Math.abs(cb - cs),
  exclusion: (cb, cs) => cb + cs - 2 * cb * cs,
}

/**
 * Apply the separable blend function B(Cb, Cs) of a mode to one channel.
 */
export function blendChannel(mode: BlendMode, cb: number, cs: number): number {
  return FORMULAS[mode](cb, cs)
}

/**
 * Composite one linear source pixel over one linear backdrop pixel.
 *
 * RGB is moved into `space` before the formula and back to linear light
 * afterwards; alpha is always linear. `opacity` scales the source alpha.
 *
 * @returns The composited pixel in linear light, straight alpha
 */
export function blendPixel(
  backdrop: Rgba,
  source: Rgba,
  mode: BlendMode,
  space: ColorSpace,
  opacity: number = 1
): Rgba {
  const ab = clamp01(backdrop[3])
  const as = clamp01(source[3]) * clamp01(opacity)
  const ao = as + ab * (1 - as)

  const out = [0, 0, 0, ao]
  for (let i = 0; i < 3; i++) {
    const cb = linearToWorking(backdrop[i] ?? 0, space)
    const cs = linearToWorking(source[i] ?? 0, space)
    const mixed = (1 - ab) * cs + ab * blendChannel(mode, cb, cs)
    const co = ao > 0 ? (as * mixed + ab * cb * (1 - as)) / ao : 0
    out[i] = workingToLinear(co, space)
  }

  return [out[0] ?? 0, out[1] ?? 0, out[2] ?? 0, ao]
}

/**
 * Load the base layer of a stack: color unchanged, alpha scaled by opacity.
 *
 * Equivalent to compositing onto a fully transparent backdrop, except that
 * the color of fully transparent pixels is kept.
 */
export function loadBasePixel(source: Rgba, opacity: number = 1): Rgba {
  return [
    clamp01(source[0]),
    clamp01(source[1]),
    clamp01(source[2]),
    clamp01(source[3]) * clamp01(opacity),
  ]
}
