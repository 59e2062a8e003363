import sharp from 'sharp'
import { Point, VisualizationOptions } from './types'
import { Design } from './design'
import { Viewport, fillPolygon, filletPolyline } from './output'

interface Color {
  r: number
  g: number
  b: number
  a: number
}

const COLORS = {
  background: { r: 40, g: 40, b: 40, a: 255 },
  component: { r: 100, g: 50, b: 50, a: 255 },
  contour: { r: 255, g: 140, b: 0, a: 255 },
  boundingBox: { r: 90, g: 90, b: 90, a: 255 },
  pin: { r: 255, g: 215, b: 0, a: 255 },
  traceColors: [
    { r: 0, g: 255, b: 100, a: 255 },
    { r: 100, g: 200, b: 255, a: 255 },
    { r: 255, g: 100, b: 100, a: 255 },
    { r: 255, g: 200, b: 50, a: 255 },
    { r: 200, g: 100, b: 255, a: 255 },
    { r: 100, g: 255, b: 200, a: 255 }
  ],
  highlight: { r: 255, g: 255, b: 0, a: 255 }
} as const

const DEFAULT_OPTIONS: VisualizationOptions = {
  showBoundingBoxes: true,
  showContours: true,
  showTraces: true,
  showPins: true
}

/** Debug picture of a design: components, their boxes, pins and routed traces. */
export class Visualizer {
  private readonly design: Design
  private readonly pixelsPerUnit: number
  private readonly margin: number

  constructor(design: Design, pixelsPerUnit: number = 50, margin: number = 0.5) {
    this.design = design
    this.pixelsPerUnit = pixelsPerUnit
    this.margin = margin
  }

  viewport(): Viewport {
    const box = this.design.extent() ?? { minX: 0, minY: 0, maxX: 0, maxY: 0 }
    return new Viewport({
      minX: box.minX - this.margin,
      minY: box.minY - this.margin,
      maxX: box.maxX + this.margin,
      maxY: box.maxY + this.margin
    }, this.pixelsPerUnit)
  }

  async render(options: Partial<VisualizationOptions> = {}): Promise<Buffer> {
    const opts: VisualizationOptions = { ...DEFAULT_OPTIONS, ...options }
    const view = this.viewport()
    const pixels = new Uint8Array(view.width * view.height * 4)
    const draw = new Canvas(pixels, view)
    draw.fill(COLORS.background)

    const components = this.design.getComponents()
    for (const component of components) {
      for (const contour of component.contours) {
        fillPolygon(pixels, view, contour, rgba(COLORS.component))
      }
    }

    if (opts.showBoundingBoxes) {
      for (const { box } of components) {
        if (!box) continue
        draw.polyline([
          { x: box.minX, y: box.minY },
          { x: box.maxX, y: box.minY },
          { x: box.maxX, y: box.maxY },
          { x: box.minX, y: box.maxY },
          { x: box.minX, y: box.minY }
        ], COLORS.boundingBox)
      }
    }

    if (opts.showContours) {
      for (const component of components) {
        for (const contour of component.contours) {
          draw.polyline([...contour, contour[0]], COLORS.contour)
        }
      }
    }

    if (opts.showTraces) {
      this.design.getTraces().forEach((trace, index) => {
        const color = trace.name === opts.highlightRoute
          ? COLORS.highlight
          : COLORS.traceColors[index % COLORS.traceColors.length]
        draw.polyline(filletPolyline(trace.points, trace.fillet), color)
      })
    }

    if (opts.showPins) {
      for (const component of components) {
        for (const pin of component.pins.values()) {
          draw.disc(pin.position, 2, COLORS.pin)
        }
      }
    }

    return sharp(Buffer.from(pixels.buffer), {
      raw: { width: view.width, height: view.height, channels: 4 }
    })
      .png()
      .toBuffer()
  }

  async saveToFile(path: string, options: Partial<VisualizationOptions> = {}): Promise<void> {
    const buffer = await this.render(options)
    await sharp(buffer).toFile(path)
  }
}

function rgba(color: Color): number[] {
  return [color.r, color.g, color.b, color.a]
}

class Canvas {
  constructor(private readonly pixels: Uint8Array, private readonly view: Viewport) {}

  fill(color: Color): void {
    for (let i = 0; i < this.pixels.length; i += 4) this.write(i, color)
  }

  polyline(points: Point[], color: Color): void {
    for (let i = 0; i < points.length - 1; i++) {
      const a = this.view.toPixel(points[i])
      const b = this.view.toPixel(points[i + 1])
      this.line(Math.round(a.px), Math.round(a.py), Math.round(b.px), Math.round(b.py), color)
    }
  }

  disc(center: Point, radius: number, color: Color): void {
    const c = this.view.toPixel(center)
    const cx = Math.round(c.px)
    const cy = Math.round(c.py)
    for (let dy = -radius; dy <= radius; dy++) {
      for (let dx = -radius; dx <= radius; dx++) {
        if (dx * dx + dy * dy <= radius * radius) this.set(cx + dx, cy + dy, color)
      }
    }
  }

  // Bresenham
  private line(x0: number, y0: number, x1: number, y1: number, color: Color): void {
    const dx = Math.abs(x1 - x0)
    const dy = -Math.abs(y1 - y0)
    const sx = x0 < x1 ? 1 : -1
    const sy = y0 < y1 ? 1 : -1
    let err = dx + dy
    let x = x0
    let y = y0
    while (true) {
      this.set(x, y, color)
      if (x === x1 && y === y1) break
      const e2 = 2 * err
      if (e2 >= dy) { err += dy; x += sx }
      if (e2 <= dx) { err += dx; y += sy }
    }
  }

  private set(x: number, y: number, color: Color): void {
    if (x < 0 || x >= this.view.width || y < 0 || y >= this.view.height) return
    this.write((y * this.view.width + x) * 4, color)
  }

  private write(i: number, color: Color): void {
    this.pixels[i] = color.r
    this.pixels[i + 1] = color.g
    this.pixels[i + 2] = color.b
    this.pixels[i + 3] = color.a
  }
}
