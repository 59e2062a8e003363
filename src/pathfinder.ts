import { BoundingBox, Point, RoutePoint } from './types'
import { ConnectContext, connectSimple } from './connect-simple'
import { ObstacleChecker } from './obstacles'
import { SearchExhaustedError } from './errors'
import { inferAnchorDirection, routePoint } from './route-point'
import { add, dot, manhattanDistance, roundTo, scale, sub } from './vector'
import { createLogger } from './log'

const log = createLogger('pathfinder')

export interface PathfinderSettings {
  stepSize: number
  /** Pops before giving up. */
  maxIterations: number
  /** Distance the search may stray outside the box around endpoints and obstacles. */
  searchMargin: number
  precision: number
  obstacles: ObstacleChecker | null
  /** Names the route and pins in failure messages. */
  label?: string
}

interface SearchNode {
  f: number
  x: number
  y: number
  travelled: number
  path: Point[]
}

// ── Binary min-heap ordered by (f, x, y) ─────────────────────────

function before(a: SearchNode, b: SearchNode): boolean {
  if (a.f !== b.f) return a.f < b.f
  if (a.x !== b.x) return a.x < b.x
  return a.y < b.y
}

class MinHeap {
  private heap: SearchNode[] = []

  get size(): number { return this.heap.length }

  push(node: SearchNode): void {
    this.heap.push(node)
    this.bubbleUp(this.heap.length - 1)
  }

  pop(): SearchNode | undefined {
    const heap = this.heap
    const top = heap[0]
    const last = heap.pop()
    if (heap.length > 0 && last) {
      heap[0] = last
      this.sinkDown(0)
    }
    return top
  }

  private bubbleUp(i: number): void {
    const heap = this.heap
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!before(heap[i], heap[parent])) break
      ;[heap[i], heap[parent]] = [heap[parent], heap[i]]
      i = parent
    }
  }

  private sinkDown(i: number): void {
    const heap = this.heap
    const n = heap.length
    while (true) {
      let smallest = i
      const l = 2 * i + 1
      const r = 2 * i + 2
      if (l < n && before(heap[l], heap[smallest])) smallest = l
      if (r < n && before(heap[r], heap[smallest])) smallest = r
      if (smallest === i) break
      ;[heap[i], heap[smallest]] = [heap[smallest], heap[i]]
      i = smallest
    }
  }
}

// Order matters: it fixes which of two equal-priority neighbours is queued first.
const DIRS: readonly Point[] = [
  { x: 0, y: 1 },
  { x: 0, y: -1 },
  { x: 1, y: 0 },
  { x: -1, y: 0 }
]

const GOAL_TOLERANCE = 1e-8

export class Pathfinder {
  private readonly settings: PathfinderSettings

  constructor(settings: PathfinderSettings) {
    if (!(settings.stepSize > 0)) {
      throw new RangeError(`step size must be positive, got ${settings.stepSize}`)
    }
    this.settings = settings
  }

  /**
   * Corners between `start` and `end` (both excluded). Tries the simple
   * connector from every expanded point, so an unobstructed pair costs one
   * call and returns exactly what `connectSimple` would.
   */
  findPath(start: RoutePoint, end: RoutePoint): Point[] {
    const { stepSize, maxIterations, precision } = this.settings
    const s = start.position
    const e = end.position
    const startDir = start.direction ?? inferAnchorDirection(e, s)
    const ctx: ConnectContext = { precision, obstacles: this.settings.obstacles }
    const bounds = this.searchBounds(s, e)

    const key = (p: Point): string => `${roundTo(p.x, precision)},${roundTo(p.y, precision)}`
    const visited = new Set<string>([key(s)])
    const open = new MinHeap()
    const startDist = manhattanDistance(s, e)
    open.push({ f: startDist, x: s.x, y: s.y, travelled: 0, path: [{ x: s.x, y: s.y }] })

    let iterations = 0
    while (open.size > 0) {
      if (iterations >= maxIterations) {
        throw this.exhausted(s, e, iterations, 'iteration limit reached')
      }
      const node = open.pop()
      if (!node) break
      iterations++

      const path = node.path
      const tip = path[path.length - 1]
      const heading = path.length === 1 ? startDir : sub(tip, path[path.length - 2])

      const simple = connectSimple(routePoint(tip, heading), end, ctx)
      if (simple.kind === 'connected') {
        log.debug(`connected after ${iterations} expansions`)
        return [...path.slice(1), ...simple.points]
      }

      for (const disp of DIRS) {
        if (dot(disp, heading, precision) < 0) continue
        const next = add(tip, scale(disp, stepSize))
        if (!inBounds(next, bounds)) continue
        if (visited.has(key(next))) continue
        if (!this.unobstructed(tip, next)) continue

        const remaining = manhattanDistance(next, e)
        const travelled = node.travelled + stepSize
        if (remaining < GOAL_TOLERANCE) {
          log.debug(`reached goal on the grid after ${iterations} expansions`)
          return path.slice(1)
        }
        open.push({ f: travelled + remaining, x: next.x, y: next.y, travelled, path: [...path, next] })
        visited.add(key(next))
      }
    }

    throw this.exhausted(s, e, iterations, 'frontier exhausted')
  }

  private exhausted(s: Point, e: Point, iterations: number, reason: string): SearchExhaustedError {
    const checker = this.settings.obstacles
    return new SearchExhaustedError(s, e, {
      stepSize: this.settings.stepSize,
      iterations,
      reason,
      enclosedStart: checker ? checker.enclosingObstacle(s) : null,
      enclosedEnd: checker ? checker.enclosingObstacle(e) : null,
      label: this.settings.label
    })
  }

  private unobstructed(a: Point, b: Point): boolean {
    const checker = this.settings.obstacles
    return checker ? checker.unobstructed(a, b) : true
  }

  private searchBounds(s: Point, e: Point): BoundingBox {
    const margin = this.settings.searchMargin
    const checker = this.settings.obstacles
    if (checker) return checker.extent([s, e], margin)
    return {
      minX: Math.min(s.x, e.x) - margin,
      minY: Math.min(s.y, e.y) - margin,
      maxX: Math.max(s.x, e.x) + margin,
      maxY: Math.max(s.y, e.y) + margin
    }
  }
}

function inBounds(p: Point, box: BoundingBox): boolean {
  return p.x >= box.minX && p.x <= box.maxX && p.y >= box.minY && p.y <= box.maxY
}

export function connectAstarOrSimple(start: RoutePoint, end: RoutePoint, settings: PathfinderSettings): Point[] {
  return new Pathfinder(settings).findPath(start, end)
}
