import { Point, RoutePoint } from './types'
import { norm, sub, unitVector } from './vector'

export function routePoint(position: Point, direction: Point | null = null): RoutePoint {
  return Object.freeze({
    position: Object.freeze({ x: position.x, y: position.y }),
    direction: direction ? Object.freeze({ x: direction.x, y: direction.y }) : null
  })
}

/**
 * Direction a bare anchor should be treated as having, seen from `ref`: along
 * the axis of larger displacement (x on a tie), pointing back toward `ref`.
 */
export function inferAnchorDirection(ref: Point, anchor: Point): Point {
  const offsetX = Math.abs(anchor.x - ref.x)
  const offsetY = Math.abs(anchor.y - ref.y)
  if (offsetX === 0 && offsetY === 0) {
    // coincident points: no preferred axis
    return { x: 1, y: 0 }
  }
  if (offsetX >= offsetY) {
    return { x: Math.sign(ref.x - anchor.x), y: 0 }
  }
  return { x: 0, y: Math.sign(ref.y - anchor.y) }
}

/** Directed point at `tip`, heading away from `previous`. Falls back to `fallback` when they coincide. */
export function headingFrom(previous: Point, tip: Point, fallback: Point | null): RoutePoint {
  const d = sub(tip, previous)
  if (norm(d) === 0) return routePoint(tip, fallback)
  return routePoint(tip, unitVector(d))
}
