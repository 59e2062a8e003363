import { Point, RoutePoint } from './types'
import { ObstacleChecker } from './obstacles'
import { connectSimple } from './connect-simple'
import { RouteConfigError, formatPoint } from './errors'
import { inferAnchorDirection } from './route-point'
import { add, cross, dot, norm, normalVector, roundTo, scale, snapUnitVector, sub, unitVector } from './vector'
import { createLogger } from './log'

const log = createLogger('meander')

export interface MeanderSettings {
  /** Distance between successive U-turns along the forward axis. */
  spacing: number
  /** Constant sideways offset of the serpentine's centre line. */
  asymmetry: number
  snap: boolean
  preventShortEdges: boolean
  fillet: number
  precision: number
  /** Used only when the serpentine does not fit and a plain connection is returned instead. */
  obstacles: ObstacleChecker | null
}

export interface MeanderFrame {
  forward: Point
  /** `forward` rotated by +90°. */
  sideways: Point
}

type Axis = 'x' | 'y'

/** Unit vector from start to end (snapped to an axis when asked) and its left normal. */
export function meanderFrame(start: RoutePoint, end: RoutePoint, snap: boolean): MeanderFrame {
  const v = sub(end.position, start.position)
  if (norm(v) === 0) {
    throw new RouteConfigError('meander', 'start and end of a meander segment coincide')
  }
  const direction = unitVector(v)
  const forward = snap ? snapUnitVector(direction) : direction
  return { forward, sideways: normalVector(forward) }
}

/** Whether `point` lies on the clockwise side of the line a→b. */
export function isSideways(point: Point, a: Point, b: Point, precision: number): boolean {
  return cross(sub(point, a), sub(b, a), precision) < 0
}

function sidewaysAxis(forward: Point): Axis {
  return Math.abs(forward.x) >= Math.abs(forward.y) ? 'y' : 'x'
}

function other(axis: Axis): Axis {
  return axis === 'x' ? 'y' : 'x'
}

function at<T>(items: T[], index: number): T {
  return items[index < 0 ? items.length + index : index]
}

/**
 * Serpentine from `start` to `end` sized to consume `lengthSegment`. Returns
 * the intermediate points only: one pair per U-turn plus a final root point
 * on the centre line.
 *
 * When `end` is a bare anchor, `exitToward` is where the route goes after it;
 * the last U-turn is then laid on the side away from that point so the next
 * segment does not run back through this one.
 */
export function connectMeandered(
  start: RoutePoint,
  end: RoutePoint,
  lengthSegment: number,
  settings: MeanderSettings,
  exitToward: Point | null = null
): Point[] {
  const { spacing, asymmetry, snap, precision } = settings
  if (!(spacing > 0)) {
    throw new RouteConfigError('meander.spacing', `must be positive, got ${spacing}`)
  }
  const s = start.position
  const e = end.position
  const startDir = start.direction ?? inferAnchorDirection(e, s)
  const endDir = end.direction ?? inferAnchorDirection(s, e)

  const { forward, sideways } = meanderFrame(start, end, snap)
  const dist = sub(e, s)
  const lengthDirect = snap ? Math.abs(dot(dist, forward, precision)) : norm(dist)

  let count = Math.floor(lengthDirect / spacing)
  if (count < 2) {
    log.info(`only ${count} meander period(s) fit between ${formatPoint(s)} and ${formatPoint(e)}; leaving the segment unmeandered`)
    const plain = connectSimple(start, end, { precision, obstacles: settings.obstacles })
    return plain.kind === 'connected' ? plain.points : []
  }

  const startSide = dot(startDir, sideways, precision)
  let endSide = dot(endDir, sideways, precision)
  if (!end.direction && exitToward) {
    endSide = -Math.sign(dot(sub(exitToward, e), sideways, precision))
  }
  const agreement = roundTo(startSide * endSide, precision)
  // both pins on the same side need an odd number of turns, opposite sides an even one
  if (agreement > 0 && count % 2 === 0) count -= 1
  else if (agreement < 0 && count % 2 === 1) count -= 1

  let firstSideways: boolean
  if (startSide > 0) firstSideways = true
  else if (startSide < 0) firstSideways = false
  else if (endSide > 0) firstSideways = count % 2 === 1
  else if (endSide < 0) firstSideways = count % 2 === 0
  else firstSideways = true

  const excess = lengthSegment - lengthDirect - 2 * Math.abs(asymmetry)
  const perp = Math.max(0, excess / (2 * count))

  const roots: Point[] = []
  for (let k = 0; k <= count; k++) {
    roots.push(add(scale(forward, spacing * k), scale(sideways, asymmetry)))
  }
  const top = roots.map(r => add(r, scale(sideways, perp)))
  const bottom = roots.map(r => sub(r, scale(sideways, perp)))

  const pts: Point[] = []
  for (let j = 0; j < count; j++) {
    const side = (j % 2 === 0) === firstSideways ? top : bottom
    pts.push(side[j], side[j + 1])
  }
  pts.push(roots[count])
  for (let i = 0; i < pts.length; i++) pts[i] = add(pts[i], s)

  const sAxis = sidewaysAxis(forward)
  const fAxis = other(sAxis)
  const diverging = dot(startDir, endDir, precision) < 0 && dot(forward, startDir, precision) <= 0
  const last = pts.length - 1

  if (snap) {
    if (diverging) {
      pts[last] = withAxis(withAxis(pts[last], sAxis, pts[last - 1][sAxis]), fAxis, e[fAxis])
    } else {
      pts[last] = withAxis(pts[last], sAxis, e[sAxis])
      const lastTurn = isSideways(pts[last], pts[last - 2], pts[last - 1], precision)
      const lastSide = isSideways(pts[last - 1], add(roots[0], s), add(roots[count], s), precision)
      if (lastTurn === lastSide) {
        pts[last - 1] = withAxis(pts[last - 1], sAxis, e[sAxis])
        pts[last - 2] = withAxis(pts[last - 2], sAxis, e[sAxis])
      }
    }
  }

  if (Math.abs(asymmetry) > Math.abs(perp) && !diverging) {
    if (startSide * asymmetry < 0) {
      pts[0] = withAxis(pts[0], sAxis, s[sAxis])
      pts[1] = withAxis(pts[1], sAxis, s[sAxis])
    }
    if (endSide * asymmetry < 0) {
      pts[last - 1] = withAxis(pts[last - 1], sAxis, e[sAxis])
      pts[last - 2] = withAxis(pts[last - 2], sAxis, e[sAxis])
    }
  }

  if (settings.preventShortEdges) {
    collapseShortEdges(pts, s, e, Math.abs(dot(endDir, sideways, precision)) > 0 ? 0 : 1, settings)
  }

  return pts
}

// Snaps turns that would leave an edge shorter than two fillets onto the endpoint's coordinate.
function collapseShortEdges(pts: Point[], s: Point, e: Point, skip: 0 | 1, settings: MeanderSettings): void {
  const twoFillets = 2 * settings.fillet
  const short = (d: number): boolean => {
    const gap = Math.abs(roundTo(d, settings.precision))
    return gap > 0 && gap < twoFillets
  }
  const last = pts.length - 1

  if (short(e.x - pts[last].x)) {
    const axis: Axis = skip ? 'y' : 'x'
    pts[last - skip] = withAxis(pts[last - skip], axis, e[axis])
    pts[last - 1 - skip] = withAxis(pts[last - 1 - skip], axis, e[axis])
  }
  if (short(e.y - pts[last].y)) {
    const axis: Axis = skip ? 'x' : 'y'
    pts[last - skip] = withAxis(pts[last - skip], axis, e[axis])
    pts[last - 1 - skip] = withAxis(pts[last - 1 - skip], axis, e[axis])
  }
  if (short(s.x - pts[0].x)) {
    pts[0] = withAxis(pts[0], 'x', s.x)
    pts[1] = withAxis(pts[1], 'x', s.x)
  }
  if (short(s.y - pts[0].y)) {
    pts[0] = withAxis(pts[0], 'y', s.y)
    pts[1] = withAxis(pts[1], 'y', s.y)
  }
}

function withAxis(p: Point, axis: Axis, value: number): Point {
  return axis === 'x' ? { x: value, y: p.y } : { x: p.x, y: value }
}

/**
 * Shifts the U-turn pairs of a serpentine sideways so its length changes by
 * `delta`. Each pair is pushed outward (or pulled in for a negative delta);
 * turns next to the endpoints stay put when moving them would leave an edge
 * shorter than the fillet. Pulling in stops at the start-end axis, so a
 * serpentine already flat on that axis stays flat.
 */
export function adjustLength(
  delta: number,
  points: readonly Point[],
  start: RoutePoint,
  end: RoutePoint,
  settings: Pick<MeanderSettings, 'snap' | 'fillet' | 'precision'>
): Point[] {
  const pts = points.map(p => ({ x: p.x, y: p.y }))
  if (pts.length <= 3) return pts

  const { precision } = settings
  const term = pts.length % 2
  const { forward, sideways } = meanderFrame(start, end, settings.snap)

  const firstSideways = cross(sub(pts[1], pts[0]), sub(pts[2], pts[1]), precision) < 0
  const lastSideways = !(cross(
    sub(at(pts, -2 - term), at(pts, -1 - term)),
    sub(at(pts, -3 - term), at(pts, -2 - term)),
    precision
  ) < 0)

  const weights: number[] = pts.map((_, i) => {
    const flipped = firstSideways ? i % 4 >= 2 : i % 4 < 2
    return flipped ? -1 : 1
  })

  const shift = scale(sideways, settings.fillet)
  const s = start.position
  const e = end.position

  const keepFirst = firstSideways
    ? !isSideways(add(s, shift), pts[0], pts[1], precision)
    : isSideways(sub(s, shift), pts[0], pts[1], precision)
  if (!keepFirst) {
    weights[0] = 0
    weights[1] = 0
  }

  const a = pts.length - 2 - term
  const keepLast = lastSideways
    ? !isSideways(add(e, shift), pts[a], pts[a + 1], precision)
    : isSideways(sub(e, shift), pts[a], pts[a + 1], precision)
  if (!keepLast) {
    weights[a] = 0
    weights[a + 1] = 0
  }

  let notAMeander = 0
  if (term) {
    const lastIndex = weights.length - 1
    weights[lastIndex] = 0
    if (start.direction && end.direction &&
        dot(start.direction, end.direction, precision) < 0 &&
        dot(forward, start.direction, precision) <= 0) {
      // the last point rides along with the final turn without adding length
      weights[lastIndex] = weights[lastIndex - 1]
      if (weights[lastIndex] !== 0) notAMeander = 1
    }
  }

  const movable = weights.filter(w => w !== 0).length - notAMeander
  if (movable <= 0) {
    log.debug('no adjustable turns; length left as is')
    return pts
  }

  let share = delta / movable
  if (share < 0) {
    // outward distance of the flattest movable turn
    let room = Infinity
    pts.forEach((p, i) => {
      if (weights[i] !== 0) room = Math.min(room, dot(sub(p, s), sideways, precision) * weights[i])
    })
    share = Math.max(share, -Math.max(0, room))
    if (share === 0) {
      log.debug('turns already sit on the axis; length left as is')
      return pts
    }
  }

  const step = scale(sideways, share)
  return pts.map((p, i) => add(p, scale(step, weights[i])))
}
