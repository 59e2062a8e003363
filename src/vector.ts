import { BoundingBox, Point } from './types'

/**
 * Plane vector helpers. Everything here is pure.
 *
 * `dot` and `cross` round to a fixed number of decimals: the connectors branch
 * on the sign and zero-ness of these products, so float noise must not leak
 * into them. Precision is always passed in, never read from shared state.
 */

export const DEFAULT_PRECISION = 10

export type AngleUnit = 'rad' | 'deg'

export function roundTo(value: number, precision: number = DEFAULT_PRECISION): number {
  const scale = 10 ** precision
  const rounded = Math.round(value * scale) / scale
  // normalise -0 so keys and comparisons stay stable
  return rounded === 0 ? 0 : rounded
}

export function vec(x: number, y: number): Point {
  return { x, y }
}

export function add(a: Point, b: Point): Point {
  return { x: a.x + b.x, y: a.y + b.y }
}

export function sub(a: Point, b: Point): Point {
  return { x: a.x - b.x, y: a.y - b.y }
}

export function scale(v: Point, k: number): Point {
  return { x: v.x * k, y: v.y * k }
}

export function norm(v: Point): number {
  return Math.hypot(v.x, v.y)
}

export function distance(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y)
}

export function dot(a: Point, b: Point, precision: number = DEFAULT_PRECISION): number {
  return roundTo(a.x * b.x + a.y * b.y, precision)
}

/** z-component of the 3D cross product of two plane vectors. */
export function cross(a: Point, b: Point, precision: number = DEFAULT_PRECISION): number {
  return roundTo(a.x * b.y - a.y * b.x, precision)
}

/** Counter-clockwise rotation; negative angles turn clockwise. */
export function rotate(v: Point, angle: number, unit: AngleUnit = 'rad'): Point {
  if (unit === 'deg' && angle % 90 === 0) {
    return quarterTurns(v, angle / 90)
  }
  const radians = unit === 'deg' ? (angle * Math.PI) / 180 : angle
  const cos = Math.cos(radians)
  const sin = Math.sin(radians)
  return {
    x: cos * v.x - sin * v.y,
    y: sin * v.x + cos * v.y
  }
}

// exact for right angles: cos/sin of π/2 leave ~1e-17 residue on the other axis
function quarterTurns(v: Point, turns: number): Point {
  switch (((turns % 4) + 4) % 4) {
    case 1: return { x: v.y === 0 ? 0 : -v.y, y: v.x }
    case 2: return { x: v.x === 0 ? 0 : -v.x, y: v.y === 0 ? 0 : -v.y }
    case 3: return { x: v.y, y: v.x === 0 ? 0 : -v.x }
    default: return { x: v.x, y: v.y }
  }
}

export function unitVector(v: Point): Point {
  const n = norm(v)
  if (n === 0) {
    throw new RangeError('cannot normalise a zero-length vector')
  }
  return { x: v.x / n, y: v.y / n }
}

/** `direction` rotated by +90°, exact for axis-aligned inputs. */
export function normalVector(direction: Point): Point {
  return quarterTurns(unitVector(direction), 1)
}

/** Snap onto the x or y unit vector with the larger projection; x wins a tie. */
export function snapUnitVector(v: Point): Point {
  if (Math.abs(v.x) >= Math.abs(v.y)) {
    return { x: Math.sign(v.x), y: 0 }
  }
  return { x: 0, y: Math.sign(v.y) }
}

export function manhattanDistance(p: Point, q: Point): number {
  return Math.abs(q.x - p.x) + Math.abs(q.y - p.y)
}

export function pointsClose(a: Point, b: Point, tolerance: number = 1e-9): boolean {
  return Math.abs(a.x - b.x) <= tolerance && Math.abs(a.y - b.y) <= tolerance
}

/**
 * Whether segment ab intersects or overlaps segment cd. Touching endpoints and
 * collinear overlap both count.
 */
export function segmentsIntersect(a: Point, b: Point, c: Point, d: Point): boolean {
  const abVertical = a.x === b.x
  const cdVertical = c.x === d.x

  if (abVertical && cdVertical) {
    if (a.x !== c.x) return false
    return rangesOverlap(a.y, b.y, c.y, d.y)
  }

  if (abVertical || cdVertical) {
    // v is the vertical segment, s the sloped one
    const [v0, v1, s0, s1] = abVertical ? [a, b, c, d] : [c, d, a, b]
    if (v0.x < Math.min(s0.x, s1.x) || v0.x > Math.max(s0.x, s1.x)) return false
    const m = (s1.y - s0.y) / (s1.x - s0.x)
    const y = s0.y + m * (v0.x - s0.x)
    return y >= Math.min(v0.y, v1.y) && y <= Math.max(v0.y, v1.y)
  }

  const m0 = (b.y - a.y) / (b.x - a.x)
  const m1 = (d.y - c.y) / (d.x - c.x)
  const b0 = (a.y * b.x - b.y * a.x) / (b.x - a.x)
  const b1 = (c.y * d.x - d.y * c.x) / (d.x - c.x)

  if ((d.x - c.x) * (b.y - a.y) === (b.x - a.x) * (d.y - c.y)) {
    if (b0 !== b1) return false
    return rangesOverlap(a.x, b.x, c.x, d.x)
  }

  const x = (b1 - b0) / (m0 - m1)
  return (
    x >= Math.min(a.x, b.x) && x <= Math.max(a.x, b.x) &&
    x >= Math.min(c.x, d.x) && x <= Math.max(c.x, d.x)
  )
}

function rangesOverlap(p0: number, p1: number, q0: number, q1: number): boolean {
  return !(Math.min(p0, p1) > Math.max(q0, q1) || Math.min(q0, q1) > Math.max(p0, p1))
}

/** Edges of a box as four segments: left, bottom, right, top. */
export function boxEdges(box: BoundingBox): Array<[Point, Point]> {
  const p = vec(box.minX, box.minY)
  const q = vec(box.minX, box.maxY)
  const r = vec(box.maxX, box.minY)
  const s = vec(box.maxX, box.maxY)
  return [[p, q], [p, r], [r, s], [q, s]]
}

export function boundsOf(points: Point[]): BoundingBox {
  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity
  for (const p of points) {
    minX = Math.min(minX, p.x)
    minY = Math.min(minY, p.y)
    maxX = Math.max(maxX, p.x)
    maxY = Math.max(maxY, p.y)
  }
  return { minX, minY, maxX, maxY }
}

export function mergeBounds(a: BoundingBox, b: BoundingBox): BoundingBox {
  return {
    minX: Math.min(a.minX, b.minX),
    minY: Math.min(a.minY, b.minY),
    maxX: Math.max(a.maxX, b.maxX),
    maxY: Math.max(a.maxY, b.maxY)
  }
}
