export interface Point {
  x: number
  y: number
}

export type Polygon = Point[]

/** Axis-aligned box, world units. */
export interface BoundingBox {
  minX: number
  minY: number
  maxX: number
  maxY: number
}

/**
 * A location with an optional outward-facing unit direction.
 * Pins always carry a direction; bare anchors do not.
 */
export interface RoutePoint {
  readonly position: Readonly<Point>
  readonly direction: Readonly<Point> | null
}

export interface PinRecord {
  position: Point
  /** Outward normal of the pin, pointing away from its parent shape. */
  direction: Point
}

export interface PinReference {
  component: string
  pin: string
}

// ── Collaborator contracts ─────────────────────────────────────

export interface PinResolver {
  resolvePin(component: string, pin: string): PinRecord
}

export interface ObstacleQuery {
  obstacleNames(): string[]
  boundingBox(name: string): BoundingBox
  /** Exact outlines, only consulted after a bounding-box hit. */
  contours(name: string): Polygon[]
}

export type TraceType = 'cpw' | 'route'

export interface TraceGeometryRequest {
  name: string
  points: Point[]
  width: number
  /** Gap to the ground plane on each side; 0 for plain routes. */
  gap: number
  fillet: number
  layer: number
  chip: string
  type: TraceType
}

/** Opaque to the router; whatever the sink hands back. */
export type TraceHandle = unknown

export interface GeometrySink {
  emit(request: TraceGeometryRequest): TraceHandle
}

// ── Route configuration ────────────────────────────────────────

export type ConnectStrategy = 'simple' | 'pathfinder' | 'meander' | 'straight' | 'framed'

export type RouteKind = 'anchors' | 'pathfinder' | 'meander' | 'mixed' | 'straight' | 'framed'

/** A jog turn is a number (degrees, positive = left) or one of the accepted strings. */
export type JogTurn = number | string

export interface JogStep {
  turn: JogTurn
  length: number
}

export interface LeadInput {
  startStraight?: number
  endStraight?: number
  startJogs?: JogStep[]
  endJogs?: JogStep[]
}

export interface MeanderInput {
  spacing?: number
  asymmetry?: number
}

export interface RouteOptionsInput {
  kind?: RouteKind
  startPin: PinReference
  endPin: PinReference
  anchors?: Point[]
  /** Strategy per segment index; segment 0 starts at the head lead. */
  strategies?: Record<number, ConnectStrategy> | ConnectStrategy[]
  lead?: LeadInput
  fillet?: number
  totalLength?: number
  traceWidth?: number
  traceGap?: number
  type?: TraceType
  meander?: MeanderInput
  snap?: boolean
  preventShortEdges?: boolean
  avoidCollision?: boolean
  stepSize?: number
  maxIterations?: number
  searchMargin?: number
  /** Clearance of a framed connection's outer frame from the boxes it wraps. */
  keepout?: number
  decimalPrecision?: number
  layer?: number
  chip?: string
}

// ── Results ────────────────────────────────────────────────────

export interface RouteResult {
  name: string
  points: Point[]
  /** Realised length after fillet correction. */
  actualLength: number
  /** Only meaningful when a meander segment was present. */
  targetLength: number | null
  lengthError: number | null
  warnings: string[]
  handle: TraceHandle
}

export interface FailedRoute {
  route: string
  start: string
  end: string
  reason: string
  code: string
}

export interface RoutingResult {
  success: boolean
  routes: RouteResult[]
  failedRoutes: FailedRoute[]
}

// ── Design input (CLI / batch router) ──────────────────────────

export type Coordinate = [number, number] | Point

export interface PinInput {
  position: Coordinate
  direction: Coordinate
}

export interface PathInput {
  points: Coordinate[]
  width: number
}

export interface ComponentInput {
  name: string
  pins?: Record<string, PinInput>
  polygons?: Coordinate[][]
  paths?: PathInput[]
}

export interface NamedRouteInput extends Omit<RouteOptionsInput, 'anchors'> {
  name: string
  anchors?: Coordinate[]
}

export interface DesignInput {
  components: ComponentInput[]
  routes: NamedRouteInput[]
}

export interface VisualizationOptions {
  showBoundingBoxes: boolean
  showContours: boolean
  showTraces: boolean
  showPins: boolean
  highlightRoute?: string
}
