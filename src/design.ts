import {
  BoundingBox,
  GeometrySink,
  ObstacleQuery,
  PinRecord,
  PinResolver,
  Point,
  Polygon,
  TraceGeometryRequest,
  TraceHandle
} from './types'
import { RouteConfigError } from './errors'
import { segmentOutline } from './obstacles'
import { boundsOf } from './vector'

export interface ComponentDefinition {
  pins?: Record<string, PinRecord>
  polygons?: Polygon[]
  /** Centre lines with a width; stored as one rectangle per segment. */
  paths?: Array<{ points: Point[]; width: number }>
}

export interface PlacedComponent {
  name: string
  pins: ReadonlyMap<string, PinRecord>
  contours: Polygon[]
  box: BoundingBox | null
}

export interface EmittedTrace extends TraceGeometryRequest {
  id: number
  contours: Polygon[]
  box: BoundingBox | null
}

/**
 * In-memory chip layout: placed components with their pins and outlines, plus
 * every trace emitted so far. Emitted traces block later routes like any
 * other component.
 */
export class Design implements PinResolver, ObstacleQuery, GeometrySink {
  private readonly components = new Map<string, PlacedComponent>()
  private readonly traces = new Map<string, EmittedTrace>()
  private nextId = 1

  addComponent(name: string, definition: ComponentDefinition = {}): PlacedComponent {
    if (name === '') {
      throw new RouteConfigError('component', 'component name must not be empty')
    }
    if (this.components.has(name) || this.traces.has(name)) {
      throw new RouteConfigError(name, 'name is already in use')
    }

    const contours: Polygon[] = []
    for (const [i, polygon] of (definition.polygons ?? []).entries()) {
      if (polygon.length < 3) {
        throw new RouteConfigError(`${name}.polygons[${i}]`, 'a polygon needs at least 3 vertices')
      }
      contours.push(polygon.map(p => ({ x: p.x, y: p.y })))
    }
    for (const [i, path] of (definition.paths ?? []).entries()) {
      if (!(path.width > 0)) {
        throw new RouteConfigError(`${name}.paths[${i}].width`, `must be positive, got ${path.width}`)
      }
      contours.push(...outlinePath(path.points, path.width))
    }

    const pins = new Map<string, PinRecord>()
    for (const [pinName, pin] of Object.entries(definition.pins ?? {})) {
      if (pin.direction.x === 0 && pin.direction.y === 0) {
        throw new RouteConfigError(`${name}.${pinName}`, 'pin direction must not be zero')
      }
      pins.set(pinName, {
        position: { x: pin.position.x, y: pin.position.y },
        direction: { x: pin.direction.x, y: pin.direction.y }
      })
    }

    const component: PlacedComponent = { name, pins, contours, box: boxOf(contours) }
    this.components.set(name, component)
    return component
  }

  getComponent(name: string): PlacedComponent | undefined {
    return this.components.get(name)
  }

  getComponents(): PlacedComponent[] {
    return [...this.components.values()]
  }

  getTraces(): EmittedTrace[] {
    return [...this.traces.values()]
  }

  getTrace(name: string): EmittedTrace | undefined {
    return this.traces.get(name)
  }

  removeTrace(name: string): boolean {
    return this.traces.delete(name)
  }

  /** Box around every component and trace, or null for an empty design. */
  extent(): BoundingBox | null {
    const corners: Point[] = []
    for (const item of [...this.components.values(), ...this.traces.values()]) {
      if (item.box) {
        corners.push({ x: item.box.minX, y: item.box.minY }, { x: item.box.maxX, y: item.box.maxY })
      }
      if ('pins' in item) {
        for (const pin of item.pins.values()) corners.push(pin.position)
      }
    }
    return corners.length > 0 ? boundsOf(corners) : null
  }

  // ── PinResolver ────────────────────────────────────────────────

  resolvePin(component: string, pin: string): PinRecord {
    const owner = this.components.get(component)
    if (!owner) {
      throw new RouteConfigError(`${component}.${pin}`, `no component named "${component}"`)
    }
    const record = owner.pins.get(pin)
    if (!record) {
      const known = [...owner.pins.keys()].join(', ') || 'none'
      throw new RouteConfigError(
        `${component}.${pin}`,
        `component "${component}" has no pin "${pin}" (pins: ${known})`
      )
    }
    return {
      position: { x: record.position.x, y: record.position.y },
      direction: { x: record.direction.x, y: record.direction.y }
    }
  }

  // ── ObstacleQuery ──────────────────────────────────────────────

  obstacleNames(): string[] {
    const names: string[] = []
    for (const c of this.components.values()) if (c.box) names.push(c.name)
    for (const t of this.traces.values()) if (t.box) names.push(t.name)
    return names
  }

  boundingBox(name: string): BoundingBox {
    const box = (this.components.get(name) ?? this.traces.get(name))?.box
    if (!box) {
      throw new RouteConfigError(name, 'no obstacle with this name')
    }
    return box
  }

  contours(name: string): Polygon[] {
    return (this.components.get(name) ?? this.traces.get(name))?.contours ?? []
  }

  // ── GeometrySink ───────────────────────────────────────────────

  /** Stores the trace under its route name, replacing an earlier one. Returns its id. */
  emit(request: TraceGeometryRequest): TraceHandle {
    if (this.components.has(request.name)) {
      throw new RouteConfigError(request.name, 'a component already uses this name')
    }
    const id = this.nextId++
    const contours = outlinePath(request.points, request.width + 2 * request.gap)
    this.traces.set(request.name, {
      ...request,
      points: request.points.map(p => ({ x: p.x, y: p.y })),
      id,
      contours,
      box: boxOf(contours)
    })
    return id
  }
}

function outlinePath(points: Point[], width: number): Polygon[] {
  const out: Polygon[] = []
  for (let i = 0; i < points.length - 1; i++) {
    const rect = segmentOutline(points[i], points[i + 1], width)
    if (rect.length > 0) out.push(rect)
  }
  return out
}

function boxOf(contours: Polygon[]): BoundingBox | null {
  const all = contours.flat()
  return all.length > 0 ? boundsOf(all) : null
}
