import { Point } from './types'

export type RoutingErrorCode = 'CONFIG' | 'INFEASIBLE' | 'SEARCH_EXHAUSTED'

export class RoutingError extends Error {
  readonly code: RoutingErrorCode

  constructor(code: RoutingErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/** Bad input: unknown pin, malformed jog, out-of-range option, degenerate geometry. */
export class RouteConfigError extends RoutingError {
  readonly field: string

  constructor(field: string, message: string) {
    super('CONFIG', `${field}: ${message}`)
    this.field = field
  }
}

/** A simple (non-searching) connection was asked for and no 0-2 corner path exists. */
export class RouteInfeasibleError extends RoutingError {
  readonly start: Point
  readonly end: Point

  constructor(start: Point, end: Point, reason: string) {
    super(
      'INFEASIBLE',
      `cannot route between ${formatPoint(start)} and ${formatPoint(end)} given their directions: ${reason}`
    )
    this.start = start
    this.end = end
  }
}

export interface SearchFailure {
  stepSize: number
  iterations: number
  reason: string
  /** Components found to enclose the start or the end. */
  enclosedStart?: string | null
  enclosedEnd?: string | null
  /** Prefix naming the route and pins being searched for. */
  label?: string
}

export class SearchExhaustedError extends RoutingError {
  readonly start: Point
  readonly end: Point
  readonly stepSize: number
  readonly iterations: number
  readonly blockers: string[]

  constructor(start: Point, end: Point, failure: SearchFailure) {
    const enclosed: string[] = []
    if (failure.enclosedStart) enclosed.push(`start lies inside "${failure.enclosedStart}"`)
    if (failure.enclosedEnd) enclosed.push(`end lies inside "${failure.enclosedEnd}"`)
    super(
      'SEARCH_EXHAUSTED',
      (failure.label ? `${failure.label}: ` : '') +
        `no obstacle-free path found from ${formatPoint(start)} to ${formatPoint(end)} ` +
        `(step ${failure.stepSize}, ${failure.iterations} iterations): ${failure.reason}` +
        enclosed.map(text => `; ${text}`).join('')
    )
    this.start = start
    this.end = end
    this.stepSize = failure.stepSize
    this.iterations = failure.iterations
    this.blockers = [failure.enclosedStart, failure.enclosedEnd].filter((name): name is string => !!name)
  }
}

export function formatPoint(p: Point): string {
  return `(${p.x}, ${p.y})`
}
