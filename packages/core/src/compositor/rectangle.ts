/**
 * Integer rectangles for layer placement.
 *
 * Described by minimum (inclusive) and maximum (exclusive) coordinates. A
 * rectangle whose maximum lies before its minimum is empty.
 */

export interface Rectangle {
  readonly x: number
  readonly y: number
  readonly maxX: number
  readonly maxY: number
}

/**
 * A rectangle at the origin covering `width` x `height`.
 */
export function rectangleOf(width: number, height: number): Rectangle {
  return { x: 0, y: 0, maxX: width, maxY: height }
}

/**
 * A rectangle of `width` x `height` with its top-left corner at (x, y).
 */
export function placeAt(x: number, y: number, width: number, height: number): Rectangle {
  return { x, y, maxX: x + width, maxY: y + height }
}

export function rectangleWidth(rect: Rectangle): number {
  return Math.max(0, rect.maxX - rect.x)
}

export function rectangleHeight(rect: Rectangle): number {
  return Math.max(0, rect.maxY - rect.y)
}

/**
 * Whether `outer` fully contains `inner`.
 */
export function containsRectangle(outer: Rectangle, inner: Rectangle): boolean {
  if (inner.x < outer.x || inner.y < outer.y) {
    return false
  }
  const availableWidth = rectangleWidth(outer) - (inner.x - outer.x)
  const availableHeight = rectangleHeight(outer) - (inner.y - outer.y)
  return (
    availableWidth >= rectangleWidth(inner) && availableHeight >= rectangleHeight(inner)
  )
}

/**
 * Bring the maximum corner in line with the minimum one.
 */
export function normalizeRectangle(rect: Rectangle): Rectangle {
  return placeAt(rect.x, rect.y, rectangleWidth(rect), rectangleHeight(rect))
}

export function sameRectangle(a: Rectangle, b: Rectangle): boolean {
  return a.x === b.x && a.y === b.y && a.maxX === b.maxX && a.maxY === b.maxY
}

export function formatRectangle(rect: Rectangle): string {
  return `(${rect.x},${rect.y})-(${rect.maxX},${rect.maxY})`
}
