import {
  BoundingBox,
  ConnectStrategy,
  GeometrySink,
  ObstacleQuery,
  PinRecord,
  PinReference,
  PinResolver,
  Point,
  RouteOptionsInput,
  RoutePoint,
  RouteResult,
  TraceHandle
} from './types'
import { Lead } from './lead'
import { RouteOptions, resolveRouteOptions, strategyFor } from './options'
import { ObstacleChecker } from './obstacles'
import { connectSimple } from './connect-simple'
import { connectAstarOrSimple } from './pathfinder'
import { MeanderSettings, adjustLength, connectMeandered } from './meander'
import { connectFramed } from './framed'
import { manhattanLength, removeCollinearPoints, totalLength } from './polyline'
import { RouteConfigError, RouteInfeasibleError, RoutingError } from './errors'
import { headingFrom, routePoint } from './route-point'
import { boundsOf, mergeBounds, norm } from './vector'
import { createLogger } from './log'

const log = createLogger('route')

/** Realised length within this of the target counts as a hit. */
export const LENGTH_TOLERANCE = 1e-6

export type RouteState =
  | 'empty'
  | 'pins-resolved'
  | 'leads-built'
  | 'segments-connected'
  | 'trimmed'
  | 'finalized'

const NEXT_STATE: Record<RouteState, RouteState | null> = {
  'empty': 'pins-resolved',
  'pins-resolved': 'leads-built',
  'leads-built': 'segments-connected',
  'segments-connected': 'trimmed',
  'trimmed': 'finalized',
  'finalized': null
}

export interface RouteContext {
  pins: PinResolver
  obstacles: ObstacleQuery
  /** Receives the finished polyline; omit to route without emitting. */
  sink?: GeometrySink
}

interface SegmentResult {
  index: number
  strategy: ConnectStrategy
  start: RoutePoint
  end: RoutePoint
  /** Connector output, start and end excluded. */
  corners: Point[]
  /** The anchor closing this segment; null for the last one, which ends at the tail lead. */
  waypoint: Point | null
}

type Connector = (route: Route, start: RoutePoint, end: RoutePoint, segment: number) => Point[]

// ── Strategy dispatch ────────────────────────────────────────────

const CONNECTORS: Record<ConnectStrategy, Connector> = {
  simple: (route, start, end) => {
    const result = connectSimple(start, end, {
      precision: route.options.decimalPrecision,
      obstacles: route.obstacleChecker()
    })
    if (result.kind === 'needs-search') {
      throw new RouteInfeasibleError(start.position, end.position, result.reason)
    }
    return result.points
  },
  pathfinder: (route, start, end, segment) => {
    const o = route.options
    return connectAstarOrSimple(start, end, {
      stepSize: o.stepSize,
      maxIterations: o.maxIterations,
      searchMargin: o.searchMargin,
      precision: o.decimalPrecision,
      obstacles: route.obstacleChecker(),
      label: `${route.describe()} segment ${segment}`
    })
  },
  meander: (route, start, end, segment) => {
    const budget = route.meanderBudget()
    const corners = connectMeandered(start, end, budget, route.meanderSettings(), route.exitAfter(segment))
    if (corners.length < 3) {
      route.warn(`segment ${segment} is too short for a meander; connected without one`)
    }
    return corners
  },
  straight: () => [],
  framed: (route, start, end, segment) => {
    const o = route.options
    const corners = connectFramed(
      { point: start, box: route.frameBox(segment, 'start') },
      { point: end, box: route.frameBox(segment, 'end') },
      {
        keepout: o.keepout,
        fillet: o.fillet,
        precision: o.decimalPrecision,
        obstacles: route.obstacleChecker()
      }
    )
    if (!corners) {
      throw new RouteInfeasibleError(start.position, end.position, 'no framed connection clears the attached components')
    }
    return corners
  }
}

/**
 * One transmission line between two pins. `make()` walks the states in order
 * and may be called again at any time; every call starts over from `empty`.
 */
export class Route {
  readonly name: string
  readonly options: RouteOptions
  private readonly context: RouteContext

  private state: RouteState = 'empty'
  private head = new Lead()
  private tail = new Lead()
  private startPin: PinRecord | null = null
  private endPin: PinRecord | null = null
  private segments: SegmentResult[] = []
  private intermediate: Point[] = []
  private warnings: string[] = []
  private checker: ObstacleChecker | null = null
  private budget: number | null = null
  private handle: TraceHandle = null

  constructor(name: string, input: RouteOptionsInput, context: RouteContext) {
    if (name === '') {
      throw new RouteConfigError('name', 'route name must not be empty')
    }
    this.name = name
    this.options = resolveRouteOptions(input)
    this.context = context
  }

  get currentState(): RouteState {
    return this.state
  }

  get headLead(): Lead {
    return this.head
  }

  get tailLead(): Lead {
    return this.tail
  }

  make(): RouteResult {
    this.reset()
    this.resolvePins()
    this.buildLeads()
    this.connectSegments()
    this.trim()
    this.refineMeanders()
    return this.finalize()
  }

  /** Head lead, connected segments, then the tail lead reversed. */
  getPoints(): Point[] {
    return removeCollinearPoints(
      [...this.head.pts, ...this.intermediate, ...[...this.tail.pts].reverse()],
      this.options.decimalPrecision
    )
  }

  /** Realised length of the current polyline, fillet corners included. */
  get length(): number {
    return totalLength(this.getPoints(), this.options.fillet)
  }

  // ── Helpers shared with the connectors ─────────────────────────

  obstacleChecker(): ObstacleChecker | null {
    if (!this.options.avoidCollision) return null
    if (!this.checker) {
      this.checker = new ObstacleChecker(this.context.obstacles, [this.name])
    }
    return this.checker
  }

  meanderSettings(): MeanderSettings {
    const o = this.options
    return {
      spacing: o.meander.spacing,
      asymmetry: o.meander.asymmetry,
      snap: o.snap,
      preventShortEdges: o.preventShortEdges,
      fillet: o.fillet,
      precision: o.decimalPrecision,
      obstacles: this.obstacleChecker()
    }
  }

  /**
   * Length each meander segment should consume. The free Manhattan distance
   * through the anchors is shared by all segments; what remains of the target
   * goes to the meanders.
   */
  meanderBudget(): number {
    if (this.budget !== null) return this.budget
    const o = this.options
    const segmentCount = o.anchors.length + 1
    let meanderCount = 0
    for (let i = 0; i < segmentCount; i++) {
      if (strategyFor(o, i) === 'meander') meanderCount++
    }
    const free = manhattanLength([this.head.getTip().position, ...o.anchors, this.tail.getTip().position])
    const leads = this.head.length + this.tail.length
    this.budget = (o.totalLength - leads - free) / Math.max(1, meanderCount) + free / segmentCount
    return this.budget
  }

  /** Where the route heads after the anchor closing `segment`; null when that segment ends at the tail lead. */
  exitAfter(segment: number): Point | null {
    const { anchors } = this.options
    if (segment >= anchors.length) return null
    return anchors[segment + 1] ?? this.tail.getTip().position
  }

  /**
   * Box a framed connection must keep clear of at one end of `segment`: the
   * pin's component plus the pin itself at the lead ends, nothing at anchors.
   */
  frameBox(segment: number, side: 'start' | 'end'): BoundingBox | null {
    const atPin = side === 'start' ? segment === 0 : segment === this.options.anchors.length
    if (!atPin) return null
    const ref = side === 'start' ? this.options.startPin : this.options.endPin
    const pin = side === 'start' ? this.startPin : this.endPin
    if (!pin) return null
    const pinBox = boundsOf([pin.position])
    if (!this.context.obstacles.obstacleNames().includes(ref.component)) return pinBox
    return mergeBounds(this.context.obstacles.boundingBox(ref.component), pinBox)
  }

  /** Route name with its pins, for messages. */
  describe(): string {
    const { startPin, endPin } = this.options
    return `${this.name} (${startPin.component}.${startPin.pin} -> ${endPin.component}.${endPin.pin})`
  }

  warn(message: string): void {
    log.warn(`${this.name}: ${message}`)
    this.warnings.push(message)
  }

  // ── States ─────────────────────────────────────────────────────

  private advance(from: RouteState): void {
    const to = NEXT_STATE[from]
    if (this.state !== from || to === null) {
      throw new Error(`route ${this.name}: cannot leave state ${this.state} as if it were ${from}`)
    }
    this.state = to
  }

  private reset(): void {
    this.state = 'empty'
    this.head = new Lead()
    this.tail = new Lead()
    this.startPin = null
    this.endPin = null
    this.segments = []
    this.intermediate = []
    this.warnings = []
    this.checker = null
    this.budget = null
    this.handle = null
  }

  private resolvePins(): void {
    this.startPin = this.resolvePin(this.options.startPin, 'startPin')
    this.endPin = this.resolvePin(this.options.endPin, 'endPin')
    this.advance('empty')
  }

  private resolvePin(ref: PinReference, field: string): PinRecord {
    let pin: PinRecord
    try {
      pin = this.context.pins.resolvePin(ref.component, ref.pin)
    } catch (err) {
      if (err instanceof RoutingError) {
        throw new RouteConfigError(`${this.name}.${field}`, err.message)
      }
      throw err
    }
    if (norm(pin.direction) === 0) {
      throw new RouteConfigError(
        `${this.name}.${field}`,
        `pin ${ref.component}.${ref.pin} has a zero-length direction`
      )
    }
    return pin
  }

  private buildLeads(): void {
    const { startPin, endPin } = this
    if (!startPin || !endPin) {
      throw new Error(`route ${this.name}: pins must be resolved before leads are built`)
    }
    const { lead, traceWidth } = this.options
    this.head.seedFromPin(startPin)
    this.tail.seedFromPin(endPin)
    this.head.goStraight(Math.max(lead.startStraight, traceWidth / 2))
    this.tail.goStraight(Math.max(lead.endStraight, traceWidth / 2))
    this.head.applyJogs(lead.startJogs, 'lead.startJogs')
    this.tail.applyJogs(lead.endJogs, 'lead.endJogs')
    this.head.freeze()
    this.tail.freeze()
    this.advance('pins-resolved')
  }

  private connectSegments(): void {
    const { anchors } = this.options
    const endPoint = this.tail.getTip()

    for (let i = 0; i <= anchors.length; i++) {
      const waypoint = i < anchors.length ? anchors[i] : null
      const start = this.currentTip()
      const end = waypoint ? routePoint(waypoint) : endPoint
      const strategy = strategyFor(this.options, i)
      log.debug(`${this.name}: segment ${i} via ${strategy}`)
      const corners = CONNECTORS[strategy](this, start, end, i)
      this.segments.push({ index: i, strategy, start, end, corners, waypoint })
    }
    this.advance('leads-built')
  }

  // Last connected point, heading away from the distinct point before it.
  private currentTip(): RoutePoint {
    const flat = this.flatten()
    if (flat.length === 0) return this.head.getTip()
    const all = [...this.head.pts, ...flat]
    const tip = all[all.length - 1]
    for (let i = all.length - 2; i >= 0; i--) {
      if (all[i].x !== tip.x || all[i].y !== tip.y) {
        return headingFrom(all[i], tip, this.head.direction)
      }
    }
    return routePoint(tip, this.head.direction)
  }

  private flatten(): Point[] {
    const out: Point[] = []
    for (const segment of this.segments) {
      out.push(...segment.corners)
      if (segment.waypoint) out.push(segment.waypoint)
    }
    return out
  }

  private trim(): void {
    this.intermediate = removeCollinearPoints(this.flatten(), this.options.decimalPrecision)
    this.advance('segments-connected')
  }

  private hasMeander(): boolean {
    return this.segments.some(s => s.strategy === 'meander')
  }

  private refineMeanders(): void {
    const meanders = this.segments.filter(s => s.strategy === 'meander')
    if (meanders.length === 0) return
    const delta = this.options.totalLength - this.length
    const share = delta / meanders.length
    const settings = this.meanderSettings()
    for (const segment of meanders) {
      // anchors carry no direction of their own
      const start = segment.index === 0 ? segment.start : routePoint(segment.start.position)
      segment.corners = adjustLength(share, segment.corners, start, segment.end, settings)
    }
    this.intermediate = removeCollinearPoints(this.flatten(), this.options.decimalPrecision)
  }

  private finalize(): RouteResult {
    const o = this.options
    const points = this.getPoints()
    const actualLength = totalLength(points, o.fillet)
    const targetLength = this.hasMeander() ? o.totalLength : null
    const lengthError = targetLength === null ? null : actualLength - targetLength

    if (lengthError !== null && Math.abs(lengthError) > LENGTH_TOLERANCE) {
      this.warn(`realised length ${actualLength} misses the target ${o.totalLength} by ${lengthError}`)
    }

    if (this.context.sink) {
      this.handle = this.context.sink.emit({
        name: this.name,
        points,
        width: o.traceWidth,
        gap: o.type === 'cpw' ? o.traceGap : 0,
        fillet: o.fillet,
        layer: o.layer,
        chip: o.chip,
        type: o.type
      })
    }
    this.advance('trimmed')

    log.info(`${this.name}: ${points.length} points, length ${actualLength.toFixed(6)}`)
    return {
      name: this.name,
      points,
      actualLength,
      targetLength,
      lengthError,
      warnings: [...this.warnings],
      handle: this.handle
    }
  }
}
