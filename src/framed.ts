import { BoundingBox, Point, RoutePoint } from './types'
import { ObstacleChecker } from './obstacles'
import { inferAnchorDirection } from './route-point'
import { boundsOf, boxEdges, distance, dot, mergeBounds, roundTo, segmentsIntersect, sub } from './vector'
import { createLogger } from './log'

const log = createLogger('framed')

export interface FrameEnd {
  point: RoutePoint
  /** Outline the connection must not cross; null for a bare anchor. */
  box: BoundingBox | null
}

export interface FrameSettings {
  /** Clearance between the outer frame and the boxes it wraps. */
  keepout: number
  fillet: number
  precision: number
  obstacles: ObstacleChecker | null
}

interface Candidate {
  corners: Point[]
  /** 0 when both ends leave and arrive head-on, 1 when one turns on the spot. */
  flow: 0 | 1
  length: number
  filletsFit: boolean
}

/**
 * Manhattan connection of one to three segments between two directed points,
 * kept off the boxes of the components they belong to. Tries the direct run,
 * both L-corners, the two Z-bends through the midpoint and the four U-frames
 * around both boxes; picks, in order, one whose edges take the fillet, one
 * that flows with both directions, the fewest corners, the shortest.
 *
 * Returns the corners only, or null when nothing clears the boxes.
 */
export function connectFramed(start: FrameEnd, end: FrameEnd, settings: FrameSettings): Point[] | null {
  const { precision, keepout } = settings
  const s = start.point.position
  const e = end.point.position
  const n1 = start.point.direction ?? inferAnchorDirection(e, s)
  const n2 = end.point.direction ?? inferAnchorDirection(s, e)

  const midX = (s.x + e.x) / 2
  const midY = (s.y + e.y) / 2
  let frame = boundsOf([s, e])
  if (start.box) frame = mergeBounds(frame, start.box)
  if (end.box) frame = mergeBounds(frame, end.box)
  const top = frame.maxY + keepout
  const bottom = frame.minY - keepout
  const left = frame.minX - keepout
  const right = frame.maxX + keepout

  const shapes: Point[][] = [
    [],
    [{ x: s.x, y: e.y }],
    [{ x: e.x, y: s.y }],
    [{ x: midX, y: s.y }, { x: midX, y: e.y }],
    [{ x: s.x, y: midY }, { x: e.x, y: midY }],
    [{ x: s.x, y: top }, { x: e.x, y: top }],
    [{ x: s.x, y: bottom }, { x: e.x, y: bottom }],
    [{ x: left, y: s.y }, { x: left, y: e.y }],
    [{ x: right, y: s.y }, { x: right, y: e.y }]
  ]

  const boxes = [start.box, end.box].filter((b): b is BoundingBox => b !== null)
  const candidates: Candidate[] = []

  for (const corners of shapes) {
    const pts = [s, ...corners, e]
    if (!axisAligned(pts) || hasZeroEdge(pts, precision)) continue

    const leave = dot(sub(pts[1], s), n1, precision)
    const arrive = dot(sub(pts[pts.length - 2], e), n2, precision)
    if (leave < 0 || arrive < 0) continue
    if (!clearOf(pts, boxes)) continue
    if (settings.obstacles && !settings.obstacles.unobstructedPath(pts)) continue

    candidates.push({
      corners,
      flow: leave > 0 && arrive > 0 ? 0 : 1,
      length: pathLength(pts),
      filletsFit: filletsFit(pts, settings.fillet, precision)
    })
  }

  if (candidates.length === 0) {
    log.debug(`nothing clears the frame between (${s.x}, ${s.y}) and (${e.x}, ${e.y})`)
    return null
  }

  candidates.sort((a, b) =>
    Number(b.filletsFit) - Number(a.filletsFit) ||
    a.flow - b.flow ||
    a.corners.length - b.corners.length ||
    a.length - b.length
  )
  return candidates[0].corners.map(p => ({ x: p.x, y: p.y }))
}

function axisAligned(pts: Point[]): boolean {
  for (let i = 0; i < pts.length - 1; i++) {
    if (pts[i].x !== pts[i + 1].x && pts[i].y !== pts[i + 1].y) return false
  }
  return true
}

function hasZeroEdge(pts: Point[], precision: number): boolean {
  const tolerance = 10 ** -precision
  for (let i = 0; i < pts.length - 1; i++) {
    if (distance(pts[i], pts[i + 1]) < tolerance) return true
  }
  return false
}

function clearOf(pts: Point[], boxes: BoundingBox[]): boolean {
  for (const box of boxes) {
    const edges = boxEdges(box)
    for (let i = 0; i < pts.length - 1; i++) {
      if (edges.some(([p, q]) => segmentsIntersect(pts[i], pts[i + 1], p, q))) return false
    }
  }
  return true
}

// Edges between two corners need two fillets, edges at a tip one.
function filletsFit(pts: Point[], fillet: number, precision: number): boolean {
  if (fillet <= 0) return true
  const last = pts.length - 2
  for (let i = 0; i <= last; i++) {
    const needed = i === 0 || i === last ? fillet : 2 * fillet
    if (roundTo(distance(pts[i], pts[i + 1]) - needed, precision) < 0) return false
  }
  return true
}

function pathLength(pts: Point[]): number {
  let total = 0
  for (let i = 0; i < pts.length - 1; i++) total += distance(pts[i], pts[i + 1])
  return total
}
