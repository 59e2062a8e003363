import { BoundingBox, ObstacleQuery, Point, Polygon } from './types'
import { boundsOf, boxEdges, mergeBounds, segmentsIntersect } from './vector'

/**
 * Segment-vs-component collision test against a read-only snapshot of the
 * placed components. Cheap bounding-box edge test first; on a hit, the exact
 * contours decide. Nothing is cached between calls.
 */
export class ObstacleChecker {
  private readonly query: ObstacleQuery
  private readonly ignored: ReadonlySet<string>

  constructor(query: ObstacleQuery, ignored: Iterable<string> = []) {
    this.query = query
    this.ignored = new Set(ignored)
  }

  private names(): string[] {
    return this.query.obstacleNames().filter(name => !this.ignored.has(name))
  }

  /** True when segment ab touches no component outline. */
  unobstructed(a: Point, b: Point): boolean {
    for (const name of this.names()) {
      const box = this.query.boundingBox(name)
      const hitsBox = boxEdges(box).some(([p, q]) => segmentsIntersect(a, b, p, q))
      if (hitsBox && !this.unobstructedCloseUp(a, b, name)) {
        return false
      }
    }
    return true
  }

  unobstructedPath(points: Point[]): boolean {
    for (let i = 0; i < points.length - 1; i++) {
      if (!this.unobstructed(points[i], points[i + 1])) return false
    }
    return true
  }

  /** Exact test against one component's contours. */
  unobstructedCloseUp(a: Point, b: Point, name: string): boolean {
    for (const contour of this.query.contours(name)) {
      const n = contour.length
      for (let i = 0; i < n; i++) {
        const j = (i + 1) % n
        if (segmentsIntersect(a, b, contour[i], contour[j])) return false
      }
    }
    return true
  }

  /** Name of the first component whose contour strictly contains `p`, if any. */
  enclosingObstacle(p: Point): string | null {
    for (const name of this.names()) {
      const box = this.query.boundingBox(name)
      if (p.x <= box.minX || p.x >= box.maxX || p.y <= box.minY || p.y >= box.maxY) continue
      if (this.query.contours(name).some(contour => pointInPolygon(p, contour))) {
        return name
      }
    }
    return null
  }

  /** Box around the given points and every obstacle, grown by `margin`. */
  extent(points: Point[], margin: number): BoundingBox {
    let box = boundsOf(points)
    for (const name of this.names()) {
      box = mergeBounds(box, this.query.boundingBox(name))
    }
    return {
      minX: box.minX - margin,
      minY: box.minY - margin,
      maxX: box.maxX + margin,
      maxY: box.maxY + margin
    }
  }
}

/** Ray-casting point-in-polygon test. */
export function pointInPolygon(p: Point, poly: Polygon): boolean {
  let inside = false
  const n = poly.length
  for (let i = 0, j = n - 1; i < n; j = i++) {
    const xi = poly[i].x, yi = poly[i].y
    const xj = poly[j].x, yj = poly[j].y
    if (((yi > p.y) !== (yj > p.y)) &&
        (p.x < (xj - xi) * (p.y - yi) / (yj - yi) + xi)) {
      inside = !inside
    }
  }
  return inside
}

/** Rectangle of the given width around segment ab, with flat ends. */
export function segmentOutline(a: Point, b: Point, width: number): Polygon {
  const dx = b.x - a.x
  const dy = b.y - a.y
  const len = Math.hypot(dx, dy)
  if (len === 0) return []
  const half = width / 2
  const px = (-dy / len) * half
  const py = (dx / len) * half
  return [
    { x: a.x + px, y: a.y + py },
    { x: b.x + px, y: b.y + py },
    { x: b.x - px, y: b.y - py },
    { x: a.x - px, y: a.y - py }
  ]
}
