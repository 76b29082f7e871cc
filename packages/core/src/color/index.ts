/**
 * Color model: storage encodings, transfer functions and blend formulas.
 */

export {
  type PixelFormat,
  type ColorSpace,
  type BlendMode,
  type Rgba,
  type PixelBuffer,
  PIXEL_FORMATS,
  COLOR_SPACES,
  BLEND_MODES,
  isBlendMode,
  isPixelFormat,
  isColorSpace,
  storageSpaceOf,
  bytesPerPixel,
} from './types'

export {
  clamp01,
  toLinear,
  fromLinear,
  roundHalfEven,
  quantize,
  decodeChannel,
  encodeChannel,
  linearToWorking,
  workingToLinear,
} from './transfer'

export { blendChannel, blendPixel, loadBasePixel } from './blend-modes'

export {
  createPixelBuffer,
  solidPixelBuffer,
  readTexel,
  decodePixels,
  encodePixels,
  convertPixelBuffer,
} from './pixels'
