import { Point, RoutePoint } from './types'
import { ObstacleChecker } from './obstacles'
import { inferAnchorDirection } from './route-point'
import { dot, sub } from './vector'

export interface ConnectContext {
  precision: number
  /** Obstacle checker, or null when collision avoidance is off. */
  obstacles: ObstacleChecker | null
}

export type SimpleConnection =
  | { kind: 'connected'; points: Point[] }
  | { kind: 'needs-search'; reason: string }

const connected = (points: Point[]): SimpleConnection => ({ kind: 'connected', points })

/**
 * Joins two directed points with a straight segment, one corner (L) or two
 * corners (S), in that order of preference. Returns only the intermediate
 * corners; an empty list means the endpoints connect directly.
 *
 * `end.direction === null` (a bare anchor) places no constraint on the last
 * segment. The S-bend orientation still needs a stop direction, which for an
 * anchor is inferred from the start.
 */
export function connectSimple(start: RoutePoint, end: RoutePoint, ctx: ConnectContext): SimpleConnection {
  const p = ctx.precision
  const s = start.position
  const e = end.position
  const startDir = start.direction ?? inferAnchorDirection(e, s)
  const endDir = end.direction
  const stopDir = endDir ?? inferAnchorDirection(s, e)

  const clear = (...pts: Point[]): boolean => {
    const checker = ctx.obstacles
    if (!checker) return true
    for (let i = 0; i < pts.length - 1; i++) {
      if (!checker.unobstructed(pts[i], pts[i + 1])) return false
    }
    return true
  }
  // end-side constraint, skipped for anchors
  const endAccepts = (corner: Point, strict: boolean): boolean => {
    if (!endDir) return true
    const d = dot(endDir, sub(corner, e), p)
    return strict ? d > 0 : d >= 0
  }

  if (s.x === e.x || s.y === e.y) {
    const span = sub(e, s)
    if (dot(startDir, span, p) >= 0 && (!endDir || dot(span, endDir, p) <= 0)) {
      if (clear(s, e)) return connected([])
      return { kind: 'needs-search', reason: 'the direct segment is obstructed' }
    }
    return { kind: 'needs-search', reason: 'endpoints are aligned but their directions oppose a direct segment' }
  }

  const corner1 = { x: s.x, y: e.y }
  const corner2 = { x: e.x, y: s.y }
  const viaCorner1 = clear(s, corner1, e)
  const viaCorner2 = clear(s, corner2, e)

  if (dot(startDir, sub(corner1, s), p) > 0 && viaCorner1) {
    if (endAccepts(corner1, false)) return connected([corner1])
  } else if (dot(startDir, sub(corner2, s), p) > 0 && viaCorner2) {
    if (endAccepts(corner2, false)) return connected([corner2])
  }

  const midX = (s.x + e.x) / 2
  const midY = (s.y + e.y) / 2
  let corner3: Point, corner4: Point, corner5: Point, corner6: Point
  if (stopDir.x !== 0) {
    // wide: the middle segment runs vertically
    corner3 = { x: midX, y: s.y }
    corner4 = { x: midX, y: e.y }
    corner5 = { x: s.x, y: midY }
    corner6 = { x: e.x, y: midY }
  } else {
    corner3 = { x: s.x, y: midY }
    corner4 = { x: e.x, y: midY }
    corner5 = { x: midX, y: s.y }
    corner6 = { x: midX, y: e.y }
  }
  const via34 = clear(s, corner3, corner4, e)
  const via56 = clear(s, corner5, corner6, e)

  if (dot(startDir, stopDir, p) < 0 && dot(startDir, sub(corner3, s), p) > 0 && via34) {
    if (endAccepts(corner4, true)) return connected([corner3, corner4])
  }

  // relaxed: a zero dot product between successive segments is allowed
  if (dot(startDir, sub(corner1, s), p) >= 0 && viaCorner1 && endAccepts(corner1, false)) {
    return connected([corner1])
  }
  if (dot(startDir, sub(corner2, s), p) >= 0 && viaCorner2 && endAccepts(corner2, false)) {
    return connected([corner2])
  }
  if (dot(startDir, sub(corner3, s), p) >= 0 && via34 && endAccepts(corner4, false)) {
    return connected([corner3, corner4])
  }
  if (dot(startDir, sub(corner5, s), p) >= 0 && via56 && endAccepts(corner6, false)) {
    return connected([corner5, corner6])
  }

  return {
    kind: 'needs-search',
    reason: 'none of the straight, L-shaped or S-shaped connections fit the directions and obstacles'
  }
}
