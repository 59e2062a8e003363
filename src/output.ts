import sharp from 'sharp'
import { BoundingBox, Point, Polygon } from './types'
import { Design } from './design'
import { segmentOutline } from './obstacles'
import { cross, distance, dot, sub, unitVector } from './vector'

export interface TraceGeometry {
  name: string
  /** Centre line with every corner replaced by its fillet arc. */
  centerLine: Point[]
  /** Metal of the centre conductor. */
  conductor: Polygon[]
  /** Region cut from the ground plane: conductor plus a gap on each side. Empty for plain routes. */
  cut: Polygon[]
}

export interface OutputGeometry {
  extent: BoundingBox
  components: Polygon[]
  traces: TraceGeometry[]
}

export interface RasterOutput {
  /** Components and conductors white on black. */
  positiveMask: Buffer
  /** Ground plane white with the CPW gaps cleared. */
  negativeMask: Buffer
  width: number
  height: number
}

export interface RasterOptions {
  pixelsPerUnit: number
  /** World units of empty border around the design. */
  margin: number
  arcSegments: number
}

const DEFAULT_RASTER: RasterOptions = { pixelsPerUnit: 100, margin: 0.5, arcSegments: 8 }

const MAX_PIXELS = 16384

// ── Geometry ─────────────────────────────────────────────────────

/**
 * Replaces each interior corner with a circular arc of `radius`, sampled
 * with `segments` chords. The radius shrinks where the adjacent edges are
 * too short to hold it.
 */
export function filletPolyline(points: readonly Point[], radius: number, segments: number = 8): Point[] {
  if (points.length < 3 || radius <= 0) return points.map(p => ({ x: p.x, y: p.y }))

  const out: Point[] = [{ x: points[0].x, y: points[0].y }]
  for (let i = 1; i < points.length - 1; i++) {
    const prev = points[i - 1]
    const corner = points[i]
    const next = points[i + 1]
    const lenIn = distance(prev, corner)
    const lenOut = distance(corner, next)
    if (lenIn === 0 || lenOut === 0) {
      out.push({ x: corner.x, y: corner.y })
      continue
    }
    const u = unitVector(sub(corner, prev))
    const v = unitVector(sub(next, corner))
    const turn = cross(u, v)
    if (turn === 0) {
      out.push({ x: corner.x, y: corner.y })
      continue
    }

    const theta = Math.acos(Math.max(-1, Math.min(1, dot(u, v))))
    const half = Math.tan(theta / 2)
    const tangent = Math.min(radius * half, lenIn / 2, lenOut / 2)
    const r = tangent / half
    const a = { x: corner.x - u.x * tangent, y: corner.y - u.y * tangent }
    // centre lies on the inside of the turn
    const side = turn > 0 ? 1 : -1
    const centre = { x: a.x - side * u.y * r, y: a.y + side * u.x * r }
    const startAngle = Math.atan2(a.y - centre.y, a.x - centre.x)
    for (let k = 0; k <= segments; k++) {
      const angle = startAngle + side * theta * (k / segments)
      out.push({ x: centre.x + r * Math.cos(angle), y: centre.y + r * Math.sin(angle) })
    }
  }
  const last = points[points.length - 1]
  out.push({ x: last.x, y: last.y })
  return out
}

/** One rectangle per segment plus a disc at each vertex so joints have no notches. */
export function strokePolyline(points: readonly Point[], width: number): Polygon[] {
  const polygons: Polygon[] = []
  for (let i = 0; i < points.length - 1; i++) {
    const rect = segmentOutline(points[i], points[i + 1], width)
    if (rect.length > 0) polygons.push(rect)
  }
  for (let i = 1; i < points.length - 1; i++) {
    polygons.push(circlePolygon(points[i], width / 2, 8))
  }
  return polygons
}

function circlePolygon(center: Point, radius: number, segments: number): Polygon {
  const points: Point[] = []
  for (let i = 0; i < segments; i++) {
    const angle = (2 * Math.PI * i) / segments
    points.push({
      x: center.x + radius * Math.cos(angle),
      y: center.y + radius * Math.sin(angle)
    })
  }
  return points
}

// ── Rasterising ──────────────────────────────────────────────────

/** Maps world coordinates (y up) onto a pixel grid (y down). */
export class Viewport {
  readonly width: number
  readonly height: number
  private readonly extent: BoundingBox
  private readonly scale: number

  constructor(extent: BoundingBox, pixelsPerUnit: number) {
    this.extent = extent
    this.scale = pixelsPerUnit
    this.width = Math.max(1, Math.ceil((extent.maxX - extent.minX) * pixelsPerUnit))
    this.height = Math.max(1, Math.ceil((extent.maxY - extent.minY) * pixelsPerUnit))
    if (this.width > MAX_PIXELS || this.height > MAX_PIXELS) {
      throw new RangeError(
        `raster of ${this.width}x${this.height} pixels exceeds ${MAX_PIXELS}; lower pixelsPerUnit`
      )
    }
  }

  toPixel(p: Point): { px: number; py: number } {
    return {
      px: (p.x - this.extent.minX) * this.scale,
      py: (this.extent.maxY - p.y) * this.scale
    }
  }
}

/** Scanline fill of `polygon` into a buffer with `channels` bytes per pixel. */
export function fillPolygon(
  pixels: Uint8Array,
  view: Viewport,
  polygon: Polygon,
  value: readonly number[]
): void {
  if (polygon.length < 3) return
  const { width, height } = view
  const channels = value.length
  const pixelPolygon = polygon.map(p => view.toPixel(p))

  let minY = Infinity, maxY = -Infinity
  for (const p of pixelPolygon) {
    minY = Math.min(minY, p.py)
    maxY = Math.max(maxY, p.py)
  }
  minY = Math.max(0, Math.floor(minY))
  maxY = Math.min(height - 1, Math.ceil(maxY))

  for (let y = minY; y <= maxY; y++) {
    const intersections: number[] = []
    for (let i = 0; i < pixelPolygon.length; i++) {
      const p1 = pixelPolygon[i]
      const p2 = pixelPolygon[(i + 1) % pixelPolygon.length]
      if ((p1.py <= y && p2.py > y) || (p2.py <= y && p1.py > y)) {
        intersections.push(p1.px + ((y - p1.py) / (p2.py - p1.py)) * (p2.px - p1.px))
      }
    }
    intersections.sort((a, b) => a - b)
    for (let i = 0; i < intersections.length - 1; i += 2) {
      const xStart = Math.max(0, Math.floor(intersections[i]))
      const xEnd = Math.min(width - 1, Math.ceil(intersections[i + 1]))
      for (let x = xStart; x <= xEnd; x++) {
        const offset = (y * width + x) * channels
        for (let c = 0; c < channels; c++) pixels[offset + c] = value[c]
      }
    }
  }
}

// ── Generator ────────────────────────────────────────────────────

export class OutputGenerator {
  private readonly design: Design
  private readonly options: RasterOptions

  constructor(design: Design, options: Partial<RasterOptions> = {}) {
    this.design = design
    this.options = { ...DEFAULT_RASTER, ...options }
  }

  generateGeometry(): OutputGeometry {
    const margin = this.options.margin
    const box = this.design.extent() ?? { minX: 0, minY: 0, maxX: 0, maxY: 0 }
    const extent = {
      minX: box.minX - margin,
      minY: box.minY - margin,
      maxX: box.maxX + margin,
      maxY: box.maxY + margin
    }

    const components = this.design.getComponents().flatMap(c => c.contours)
    const traces = this.design.getTraces().map(trace => {
      const centerLine = filletPolyline(trace.points, trace.fillet, this.options.arcSegments)
      return {
        name: trace.name,
        centerLine,
        conductor: strokePolyline(centerLine, trace.width),
        cut: trace.type === 'cpw' && trace.gap > 0
          ? strokePolyline(centerLine, trace.width + 2 * trace.gap)
          : []
      }
    })
    return { extent, components, traces }
  }

  async generateRasterOutput(): Promise<RasterOutput> {
    const geometry = this.generateGeometry()
    const view = new Viewport(geometry.extent, this.options.pixelsPerUnit)
    const metal = [...geometry.components, ...geometry.traces.flatMap(t => t.conductor)]

    const positive = new Uint8Array(view.width * view.height)
    for (const polygon of metal) fillPolygon(positive, view, polygon, [255])

    const negative = new Uint8Array(view.width * view.height).fill(255)
    for (const trace of geometry.traces) {
      for (const polygon of trace.cut) fillPolygon(negative, view, polygon, [0])
      for (const polygon of trace.conductor) fillPolygon(negative, view, polygon, [255])
    }

    return {
      positiveMask: await encodeGray(positive, view),
      negativeMask: await encodeGray(negative, view),
      width: view.width,
      height: view.height
    }
  }

  async saveToFiles(basePath: string): Promise<void> {
    const output = await this.generateRasterOutput()
    await sharp(output.positiveMask).toFile(`${basePath}_positive.png`)
    await sharp(output.negativeMask).toFile(`${basePath}_negative.png`)
  }
}

function encodeGray(pixels: Uint8Array, view: Viewport): Promise<Buffer> {
  return sharp(Buffer.from(pixels), {
    raw: { width: view.width, height: view.height, channels: 1 }
  })
    .png()
    .toBuffer()
}
