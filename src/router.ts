import {
  Coordinate,
  DesignInput,
  FailedRoute,
  NamedRouteInput,
  PinRecord,
  Point,
  RouteOptionsInput,
  RouteResult,
  RoutingResult
} from './types'
import { Design } from './design'
import { Route } from './route'
import { RouteConfigError, RoutingError } from './errors'
import { createLogger } from './log'

const log = createLogger('router')

export function toPoint(value: Coordinate, field: string): Point {
  if (Array.isArray(value)) {
    if (value.length !== 2) {
      throw new RouteConfigError(field, 'expected [x, y]')
    }
    return finitePoint(value[0], value[1], field)
  }
  if (value === null || typeof value !== 'object') {
    throw new RouteConfigError(field, 'expected [x, y] or { x, y }')
  }
  return finitePoint(value.x, value.y, field)
}

function finitePoint(x: unknown, y: unknown, field: string): Point {
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    throw new RouteConfigError(field, `coordinates must be finite numbers, got ${JSON.stringify([x, y])}`)
  }
  return { x, y }
}

/** Builds the in-memory design described by the JSON input. */
export function buildDesign(input: DesignInput): Design {
  if (!input || !Array.isArray(input.components)) {
    throw new RouteConfigError('components', 'expected a list of components')
  }
  const design = new Design()
  input.components.forEach((component, i) => {
    const field = `components[${i}]`
    const pins: Record<string, PinRecord> = {}
    for (const [name, pin] of Object.entries(component.pins ?? {})) {
      pins[name] = {
        position: toPoint(pin.position, `${field}.pins.${name}.position`),
        direction: toPoint(pin.direction, `${field}.pins.${name}.direction`)
      }
    }
    design.addComponent(component.name, {
      pins,
      polygons: (component.polygons ?? []).map((polygon, j) =>
        polygon.map((c, k) => toPoint(c, `${field}.polygons[${j}][${k}]`))
      ),
      paths: (component.paths ?? []).map((path, j) => ({
        points: path.points.map((c, k) => toPoint(c, `${field}.paths[${j}].points[${k}]`)),
        width: path.width
      }))
    })
  })
  return design
}

function routeOptions(input: NamedRouteInput, index: number): RouteOptionsInput {
  const { name: _name, anchors, ...rest } = input
  return {
    ...rest,
    anchors: (anchors ?? []).map((c, k) => toPoint(c, `routes[${index}].anchors[${k}]`))
  }
}

/**
 * Routes every requested line in order against one shared design. A route
 * that fails is reported and skipped; the rest still run, and each finished
 * route is an obstacle for those after it.
 */
export class Router {
  private readonly input: DesignInput
  private readonly design: Design
  private readonly routes: Route[] = []

  constructor(input: DesignInput) {
    this.input = input
    this.design = buildDesign(input)
  }

  route(): RoutingResult {
    const results: RouteResult[] = []
    const failedRoutes: FailedRoute[] = []
    const requests = this.input.routes ?? []
    if (!Array.isArray(requests)) {
      throw new RouteConfigError('routes', 'expected a list of routes')
    }
    log.info(`routing ${requests.length} line(s) over ${this.design.getComponents().length} component(s)`)

    requests.forEach((request, index) => {
      const start = request.startPin ? `${request.startPin.component}.${request.startPin.pin}` : 'unknown'
      const end = request.endPin ? `${request.endPin.component}.${request.endPin.pin}` : 'unknown'
      const name = request.name || `route${index}`
      try {
        const route = new Route(name, routeOptions(request, index), {
          pins: this.design,
          obstacles: this.design,
          sink: this.design
        })
        this.routes.push(route)
        results.push(route.make())
      } catch (err) {
        if (!(err instanceof RoutingError)) throw err
        log.warn(`${name} failed: ${err.message}`)
        failedRoutes.push({ route: name, start, end, reason: err.message, code: err.code })
      }
    })

    log.info(`routed ${results.length}, failed ${failedRoutes.length}`)
    return {
      success: failedRoutes.length === 0,
      routes: results,
      failedRoutes
    }
  }

  getDesign(): Design {
    return this.design
  }

  getRoutes(): Route[] {
    return [...this.routes]
  }
}
