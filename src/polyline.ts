import { Point } from './types'
import { cross, distance, roundTo, sub } from './vector'

/**
 * Extra length a sharp corner carries over its fillet arc of radius `fillet`:
 * two legs of length f replaced by a quarter circle.
 */
export function cornerRoundingExcess(corners: number, fillet: number): number {
  if (corners <= 0 || fillet <= 0) return 0
  return corners * (2 * fillet - (Math.PI * fillet) / 2)
}

/** Length of the polyline once every interior corner is rounded by `fillet`. */
export function totalLength(points: readonly Point[], fillet: number): number {
  if (points.length < 2) return 0
  let raw = 0
  for (let i = 0; i < points.length - 1; i++) {
    raw += distance(points[i], points[i + 1])
  }
  return raw - cornerRoundingExcess(points.length - 2, fillet)
}

export function manhattanLength(points: readonly Point[]): number {
  let total = 0
  for (let i = 0; i < points.length - 1; i++) {
    total += Math.abs(points[i + 1].x - points[i].x) + Math.abs(points[i + 1].y - points[i].y)
  }
  return total
}

function samePoint(a: Point, b: Point, precision: number): boolean {
  return roundTo(a.x - b.x, precision) === 0 && roundTo(a.y - b.y, precision) === 0
}

/**
 * Drops coincident points and middle points of straight runs. Running it a
 * second time changes nothing; the order of the survivors is kept.
 */
export function removeCollinearPoints(points: readonly Point[], precision: number): Point[] {
  const out: Point[] = []
  for (const p of points) {
    let keep = true
    while (out.length > 0) {
      const last = out[out.length - 1]
      if (samePoint(last, p, precision)) {
        keep = false
        break
      }
      if (out.length < 2) break
      const prev = out[out.length - 2]
      if (cross(sub(last, prev), sub(p, last), precision) !== 0) break
      out.pop()
    }
    if (keep) out.push({ x: p.x, y: p.y })
  }
  return out
}
