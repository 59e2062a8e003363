import {
  ConnectStrategy,
  JogStep,
  PinReference,
  Point,
  RouteKind,
  RouteOptionsInput,
  TraceType
} from './types'
import { RouteConfigError } from './errors'
import { parseJogTurn } from './lead'
import { DEFAULT_PRECISION } from './vector'

export interface LeadOptions {
  startStraight: number
  endStraight: number
  startJogs: JogStep[]
  endJogs: JogStep[]
}

/** Validated, defaulted route configuration. Built once per route and never mutated. */
export interface RouteOptions {
  kind: RouteKind
  startPin: PinReference
  endPin: PinReference
  anchors: Point[]
  /** Strategy for segments without an explicit entry in `strategies`. */
  defaultStrategy: ConnectStrategy
  strategies: ReadonlyMap<number, ConnectStrategy>
  lead: LeadOptions
  fillet: number
  totalLength: number
  traceWidth: number
  traceGap: number
  type: TraceType
  meander: { spacing: number; asymmetry: number }
  snap: boolean
  preventShortEdges: boolean
  avoidCollision: boolean
  stepSize: number
  maxIterations: number
  searchMargin: number
  keepout: number
  decimalPrecision: number
  layer: number
  chip: string
}

// ── Defaults ─────────────────────────────────────────────────────

export const ROUTE_DEFAULTS = {
  fillet: 0,
  totalLength: 7,
  traceWidth: 0.01,
  traceGap: 0.006,
  type: 'cpw',
  spacing: 0.2,
  asymmetry: 0,
  snap: true,
  preventShortEdges: true,
  stepSize: 0.25,
  maxIterations: 200_000,
  keepout: 0.2,
  decimalPrecision: DEFAULT_PRECISION,
  layer: 1,
  chip: 'main'
} as const

interface KindPreset {
  strategy: ConnectStrategy
  avoidCollision: boolean
}

const KIND_PRESETS: Record<RouteKind, KindPreset> = {
  anchors: { strategy: 'simple', avoidCollision: false },
  pathfinder: { strategy: 'pathfinder', avoidCollision: true },
  meander: { strategy: 'meander', avoidCollision: false },
  mixed: { strategy: 'simple', avoidCollision: true },
  straight: { strategy: 'straight', avoidCollision: false },
  framed: { strategy: 'framed', avoidCollision: false }
}

const STRATEGIES: readonly ConnectStrategy[] = ['simple', 'pathfinder', 'meander', 'straight', 'framed']
const TRACE_TYPES: readonly TraceType[] = ['cpw', 'route']

function isRouteKind(value: unknown): value is RouteKind {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(KIND_PRESETS, value)
}

function isStrategy(value: unknown): value is ConnectStrategy {
  return typeof value === 'string' && STRATEGIES.some(s => s === value)
}

function isTraceType(value: unknown): value is TraceType {
  return typeof value === 'string' && TRACE_TYPES.some(t => t === value)
}

// ── Field checks ─────────────────────────────────────────────────

type Bound = 'any' | 'nonNegative' | 'positive'

function num(value: number | undefined, fallback: number, field: string, bound: Bound): number {
  if (value === undefined) return fallback
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RouteConfigError(field, `expected a finite number, got ${JSON.stringify(value)}`)
  }
  if (bound === 'positive' && value <= 0) {
    throw new RouteConfigError(field, `must be positive, got ${value}`)
  }
  if (bound === 'nonNegative' && value < 0) {
    throw new RouteConfigError(field, `must not be negative, got ${value}`)
  }
  return value
}

function int(value: number | undefined, fallback: number, field: string, min: number, max: number): number {
  const n = num(value, fallback, field, 'any')
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new RouteConfigError(field, `expected an integer in [${min}, ${max}], got ${n}`)
  }
  return n
}

function bool(value: boolean | undefined, fallback: boolean, field: string): boolean {
  if (value === undefined) return fallback
  if (typeof value !== 'boolean') {
    throw new RouteConfigError(field, `expected true or false, got ${JSON.stringify(value)}`)
  }
  return value
}

function pinRef(value: PinReference | undefined, field: string): PinReference {
  if (!value || typeof value.component !== 'string' || typeof value.pin !== 'string' ||
      value.component === '' || value.pin === '') {
    throw new RouteConfigError(field, 'expected { component, pin } with non-empty names')
  }
  return { component: value.component, pin: value.pin }
}

function jogs(value: JogStep[] | undefined, field: string): JogStep[] {
  if (value === undefined) return []
  if (!Array.isArray(value)) {
    throw new RouteConfigError(field, 'expected a list of { turn, length } steps')
  }
  return value.map((step, i) => {
    // bad turns fail here, before any geometry exists
    parseJogTurn(step.turn, `${field}[${i}].turn`)
    return { turn: step.turn, length: num(step.length, 0, `${field}[${i}].length`, 'nonNegative') }
  })
}

function strategyMap(
  value: RouteOptionsInput['strategies'],
  segmentCount: number
): Map<number, ConnectStrategy> {
  const out = new Map<number, ConnectStrategy>()
  if (value === undefined) return out
  const entries: Array<[string, unknown]> = Array.isArray(value)
    ? value.map((s, i): [string, unknown] => [String(i), s])
    : Object.entries(value)
  for (const [key, strategy] of entries) {
    const index = Number(key)
    if (!Number.isInteger(index) || index < 0 || index >= segmentCount) {
      throw new RouteConfigError(
        `strategies.${key}`,
        `segment index must be an integer in [0, ${segmentCount - 1}]`
      )
    }
    if (!isStrategy(strategy)) {
      throw new RouteConfigError(
        `strategies.${key}`,
        `unknown strategy ${JSON.stringify(strategy)}; expected one of ${STRATEGIES.join(', ')}`
      )
    }
    out.set(index, strategy)
  }
  return out
}

/**
 * Validates caller input once and fills in defaults. Every problem is a
 * `RouteConfigError` carrying the offending field path.
 */
export function resolveRouteOptions(input: RouteOptionsInput): RouteOptions {
  const kind = input.kind ?? 'mixed'
  if (!isRouteKind(kind)) {
    throw new RouteConfigError('kind', `unknown route kind ${JSON.stringify(kind)}`)
  }
  const preset = KIND_PRESETS[kind]

  const rawAnchors = input.anchors ?? []
  if (!Array.isArray(rawAnchors)) {
    throw new RouteConfigError('anchors', 'expected a list of points')
  }
  const anchors = kind === 'meander'
    ? []
    : rawAnchors.map((a, i) => ({
      x: num(a.x, 0, `anchors[${i}].x`, 'any'),
      y: num(a.y, 0, `anchors[${i}].y`, 'any')
    }))

  const type = input.type ?? ROUTE_DEFAULTS.type
  if (!isTraceType(type)) {
    throw new RouteConfigError('type', `expected "cpw" or "route", got ${JSON.stringify(type)}`)
  }

  const stepSize = num(input.stepSize, ROUTE_DEFAULTS.stepSize, 'stepSize', 'positive')
  const chip = input.chip ?? ROUTE_DEFAULTS.chip
  if (typeof chip !== 'string' || chip === '') {
    throw new RouteConfigError('chip', 'expected a non-empty name')
  }

  const lead = input.lead ?? {}
  const meander = input.meander ?? {}

  return {
    kind,
    startPin: pinRef(input.startPin, 'startPin'),
    endPin: pinRef(input.endPin, 'endPin'),
    anchors,
    defaultStrategy: preset.strategy,
    strategies: kind === 'meander' ? new Map<number, ConnectStrategy>() : strategyMap(input.strategies, anchors.length + 1),
    lead: {
      startStraight: num(lead.startStraight, 0, 'lead.startStraight', 'nonNegative'),
      endStraight: num(lead.endStraight, 0, 'lead.endStraight', 'nonNegative'),
      startJogs: jogs(lead.startJogs, 'lead.startJogs'),
      endJogs: jogs(lead.endJogs, 'lead.endJogs')
    },
    fillet: num(input.fillet, ROUTE_DEFAULTS.fillet, 'fillet', 'nonNegative'),
    totalLength: num(input.totalLength, ROUTE_DEFAULTS.totalLength, 'totalLength', 'positive'),
    traceWidth: num(input.traceWidth, ROUTE_DEFAULTS.traceWidth, 'traceWidth', 'positive'),
    traceGap: num(input.traceGap, ROUTE_DEFAULTS.traceGap, 'traceGap', 'nonNegative'),
    type,
    meander: {
      spacing: num(meander.spacing, ROUTE_DEFAULTS.spacing, 'meander.spacing', 'positive'),
      asymmetry: num(meander.asymmetry, ROUTE_DEFAULTS.asymmetry, 'meander.asymmetry', 'any')
    },
    snap: bool(input.snap, ROUTE_DEFAULTS.snap, 'snap'),
    preventShortEdges: bool(input.preventShortEdges, ROUTE_DEFAULTS.preventShortEdges, 'preventShortEdges'),
    avoidCollision: bool(input.avoidCollision, preset.avoidCollision, 'avoidCollision'),
    stepSize,
    maxIterations: int(input.maxIterations, ROUTE_DEFAULTS.maxIterations, 'maxIterations', 1, Number.MAX_SAFE_INTEGER),
    searchMargin: num(input.searchMargin, 10 * stepSize, 'searchMargin', 'nonNegative'),
    keepout: num(input.keepout, ROUTE_DEFAULTS.keepout, 'keepout', 'nonNegative'),
    decimalPrecision: int(input.decimalPrecision, ROUTE_DEFAULTS.decimalPrecision, 'decimalPrecision', 0, 15),
    layer: int(input.layer, ROUTE_DEFAULTS.layer, 'layer', 0, Number.MAX_SAFE_INTEGER),
    chip
  }
}

/** Strategy for segment `index`: explicit override, else the kind's default. */
export function strategyFor(options: RouteOptions, index: number): ConnectStrategy {
  return options.strategies.get(index) ?? options.defaultStrategy
}
