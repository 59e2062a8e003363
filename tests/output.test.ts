import { describe, it, expect } from 'vitest'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import sharp from 'sharp'
import { OutputGenerator, Viewport, fillPolygon, filletPolyline, strokePolyline } from '../src/output'
import { Design } from '../src/design'
import { TraceGeometryRequest } from '../src/types'
import { expectPoints, square } from './helpers'

const p = (x: number, y: number) => ({ x, y })

function line(overrides: Partial<TraceGeometryRequest> = {}): TraceGeometryRequest {
  return {
    name: 'line',
    points: [p(0, 0), p(10, 0)],
    width: 0.01,
    gap: 0.006,
    fillet: 0,
    layer: 1,
    chip: 'main',
    type: 'cpw',
    ...overrides
  }
}

async function whitePixels(png: Buffer): Promise<number> {
  const raw = await sharp(png).extractChannel(0).raw().toBuffer()
  let count = 0
  for (const value of raw) if (value === 255) count++
  return count
}

describe('filletPolyline', () => {
  it('replaces a corner with an arc', () => {
    const out = filletPolyline([p(0, 0), p(1, 0), p(1, 1)], 0.2, 2)
    expectPoints(out, [p(0, 0), p(0.8, 0), p(0.8 + 0.2 * Math.SQRT1_2, 0.2 - 0.2 * Math.SQRT1_2), p(1, 0.2), p(1, 1)])
  })

  it('shrinks the radius to fit short edges', () => {
    const out = filletPolyline([p(0, 0), p(0.2, 0), p(0.2, 1)], 0.5)
    expect(out).toHaveLength(11)
    expect(out[1].x).toBeCloseTo(0.1, 9)
    expect(out[1].y).toBeCloseTo(0, 9)
    expect(out[9].x).toBeCloseTo(0.2, 9)
    expect(out[9].y).toBeCloseTo(0.1, 9)
  })

  it('leaves straight runs and zero radii alone', () => {
    expect(filletPolyline([p(0, 0), p(1, 0), p(2, 0)], 0.2)).toEqual([p(0, 0), p(1, 0), p(2, 0)])
    expect(filletPolyline([p(0, 0), p(1, 0), p(1, 1)], 0)).toEqual([p(0, 0), p(1, 0), p(1, 1)])
  })
})

describe('strokePolyline', () => {
  it('outlines each segment and rounds the joints', () => {
    expect(strokePolyline([p(0, 0), p(2, 0)], 1)).toEqual([[p(0, 0.5), p(2, 0.5), p(2, -0.5), p(0, -0.5)]])
    const bent = strokePolyline([p(0, 0), p(1, 0), p(1, 1)], 1)
    expect(bent).toHaveLength(3)
    expect(bent[2]).toHaveLength(8)
  })
})

describe('Viewport', () => {
  it('flips y and scales', () => {
    const view = new Viewport({ minX: 0, minY: 0, maxX: 2, maxY: 1 }, 10)
    expect([view.width, view.height]).toEqual([20, 10])
    expect(view.toPixel(p(0, 1))).toEqual({ px: 0, py: 0 })
    expect(view.toPixel(p(2, 0))).toEqual({ px: 20, py: 10 })
  })

  it('refuses huge rasters', () => {
    expect(() => new Viewport({ minX: 0, minY: 0, maxX: 200, maxY: 1 }, 100)).toThrow(RangeError)
  })
})

describe('fillPolygon', () => {
  it('fills the rows between the edges', () => {
    const view = new Viewport({ minX: 0, minY: 0, maxX: 4, maxY: 4 }, 1)
    const pixels = new Uint8Array(16)
    fillPolygon(pixels, view, square(1, 1, 3, 3), [255])
    expect(Array.from(pixels)).toEqual([
      0, 0, 0, 0,
      0, 255, 255, 255,
      0, 255, 255, 255,
      0, 0, 0, 0
    ])
  })
})

describe('OutputGenerator', () => {
  it('cuts a ground-plane gap around CPW traces only', () => {
    const design = new Design()
    design.emit(line())
    design.emit(line({ name: 'plain', points: [p(0, 1), p(10, 1)], gap: 0, type: 'route' }))
    const [cpw, plain] = new OutputGenerator(design).generateGeometry().traces

    expect(cpw.conductor).toHaveLength(1)
    expect(cpw.cut).toHaveLength(1)
    expectPoints(cpw.cut[0], [p(0, 0.011), p(10, 0.011), p(10, -0.011), p(0, -0.011)])
    expect(plain.cut).toEqual([])
  })

  it('rasterises components into the positive mask', async () => {
    const design = new Design()
    design.addComponent('pad', { polygons: [square(0, 0, 1, 1)] })
    const out = await new OutputGenerator(design, { pixelsPerUnit: 10 }).generateRasterOutput()

    expect([out.width, out.height]).toEqual([20, 20])
    const meta = await sharp(out.positiveMask).metadata()
    expect([meta.format, meta.width, meta.height]).toEqual(['png', 20, 20])
    expect(await whitePixels(out.positiveMask)).toBe(110)
    expect(await whitePixels(out.negativeMask)).toBe(400)
  })

  it('writes both masks', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'masks-'))
    try {
      const design = new Design()
      design.emit(line())
      await new OutputGenerator(design, { pixelsPerUnit: 10 }).saveToFiles(path.join(dir, 'chip'))
      expect(fs.readdirSync(dir).sort()).toEqual(['chip_negative.png', 'chip_positive.png'])
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})
