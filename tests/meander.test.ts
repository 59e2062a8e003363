import { describe, it, expect } from 'vitest'
import { MeanderSettings, adjustLength, connectMeandered, isSideways, meanderFrame } from '../src/meander'
import { removeCollinearPoints, totalLength } from '../src/polyline'
import { RouteConfigError } from '../src/errors'
import { routePoint } from '../src/route-point'
import { Point } from '../src/types'
import { expectPoints } from './helpers'

const p = (x: number, y: number) => ({ x, y })

const settings: MeanderSettings = {
  spacing: 1,
  asymmetry: 0,
  snap: true,
  preventShortEdges: true,
  fillet: 0.1,
  precision: 10,
  obstacles: null
}

function realised(start: Point, corners: Point[], end: Point, fillet: number): number {
  return totalLength(removeCollinearPoints([start, ...corners, end], 10), fillet)
}

describe('meanderFrame', () => {
  it('snaps the forward axis and turns it left for sideways', () => {
    const frame = meanderFrame(routePoint(p(0, 0)), routePoint(p(3, -4)), true)
    expect(frame).toEqual({ forward: p(0, -1), sideways: p(1, 0) })
  })

  it('keeps the exact direction without snapping', () => {
    const frame = meanderFrame(routePoint(p(0, 0)), routePoint(p(3, -4)), false)
    expect(frame.forward).toEqual(p(0.6, -0.8))
    expect(frame.sideways.x).toBeCloseTo(0.8, 12)
    expect(frame.sideways.y).toBeCloseTo(0.6, 12)
  })

  it('rejects coincident endpoints', () => {
    expect(() => meanderFrame(routePoint(p(1, 1)), routePoint(p(1, 1)), true)).toThrow(RouteConfigError)
  })
})

describe('isSideways', () => {
  it('is true on the clockwise side of the line', () => {
    expect(isSideways(p(5, -1), p(0, 0), p(10, 0), 10)).toBe(true)
    expect(isSideways(p(5, 1), p(0, 0), p(10, 0), 10)).toBe(false)
  })
})

describe('connectMeandered', () => {
  const start = routePoint(p(0, 0), p(1, 0))
  const end = routePoint(p(10, 0), p(-1, 0))

  it('lays out alternating U-turns sized to the budget', () => {
    const pts = connectMeandered(start, end, 30, settings)
    expect(pts).toHaveLength(21)
    expect(pts.slice(0, 6)).toEqual([p(0, 1), p(1, 1), p(1, -1), p(2, -1), p(2, 1), p(3, 1)])
    expect(pts.slice(-3)).toEqual([p(9, -1), p(10, -1), p(10, 0)])
  })

  it('loses one fillet excess per corner, which adjustLength recovers', () => {
    const pts = connectMeandered(start, end, 30, settings)
    const before = realised(start.position, pts, end.position, 0.1)
    expect(before).toBeCloseTo(30 - 20 * (0.2 - 0.05 * Math.PI), 9)

    const adjusted = adjustLength(30 - before, pts, start, end, settings)
    expect(adjusted).toHaveLength(21)
    expect(adjusted[0].y).toBeCloseTo(1 + (30 - before) / 20, 9)
    expect(adjusted[2].y).toBeCloseTo(-1 - (30 - before) / 20, 9)
    expect(adjusted[20]).toEqual(p(10, 0))
    expect(realised(start.position, adjusted, end.position, 0.1)).toBeCloseTo(30, 9)
  })

  it('shrinks for a negative delta', () => {
    const pts = connectMeandered(start, end, 30, settings)
    const before = realised(start.position, pts, end.position, 0.1)
    const adjusted = adjustLength(-2, pts, start, end, settings)
    expect(adjusted[0].y).toBeCloseTo(0.9, 12)
    expect(realised(start.position, adjusted, end.position, 0.1)).toBeCloseTo(before - 2, 9)
  })

  it('keeps every edge axis-aligned', () => {
    const pts = [start.position, ...connectMeandered(start, end, 30, settings), end.position]
    for (let i = 0; i < pts.length - 1; i++) {
      const horizontal = pts[i].y === pts[i + 1].y
      const vertical = pts[i].x === pts[i + 1].x
      expect(horizontal || vertical).toBe(true)
    }
  })

  it('uses an odd number of turns when both pins face the same side', () => {
    const pts = connectMeandered(routePoint(p(0, 0), p(0, 1)), routePoint(p(10, 0), p(0, 1)), 30, settings)
    expect(pts).toHaveLength(19)
  })

  it('keeps an even count when the pins face opposite sides', () => {
    const pts = connectMeandered(routePoint(p(0, 0), p(0, 1)), routePoint(p(10, 0), p(0, -1)), 30, settings)
    expect(pts).toHaveLength(21)
  })

  it('falls back to a plain connection when fewer than two periods fit', () => {
    const pts = connectMeandered(start, routePoint(p(1.5, 0), p(-1, 0)), 30, settings)
    expect(pts).toEqual([])
  })

  it('treats a bare anchor at the end as facing back toward the start', () => {
    const pts = connectMeandered(start, routePoint(p(10, 0)), 30, settings)
    expect(pts).toHaveLength(21)
    expect(pts.slice(0, 6)).toEqual([p(0, 1), p(1, 1), p(1, -1), p(2, -1), p(2, 1), p(3, 1)])
    expect(pts.slice(-3)).toEqual([p(9, -1), p(10, -1), p(10, 0)])
  })

  it('lays the last turn at an anchor away from where the route goes next', () => {
    const pts = connectMeandered(start, routePoint(p(10, 0)), 30, settings, p(10, -5))
    expect(pts).toHaveLength(21)
    expect(pts.slice(0, 6)).toEqual([p(0, -1), p(1, -1), p(1, 1), p(2, 1), p(2, -1), p(3, -1)])
    expect(pts.slice(-3)).toEqual([p(9, 1), p(10, 1), p(10, 0)])
  })

  it('pins the outer turns to the endpoints when the asymmetry exceeds the amplitude', () => {
    const pts = connectMeandered(
      routePoint(p(0, 0), p(0, 1)),
      routePoint(p(10, 0), p(0, 1)),
      32,
      { ...settings, asymmetry: -2 }
    )
    expectPoints(pts, [
      p(0, 0), p(1, 0),
      p(1, -3), p(2, -3), p(2, -1), p(3, -1), p(3, -3), p(4, -3), p(4, -1), p(5, -1),
      p(5, -3), p(6, -3), p(6, -1), p(7, -1), p(7, -3), p(8, -3),
      p(8, 0), p(9, 0), p(9, 0)
    ])
  })

  it('collapses a last turn that would leave an edge shorter than two fillets', () => {
    const end2 = routePoint(p(10.15, 0), p(-1, 0))
    const collapsed = connectMeandered(start, end2, 30.15, settings)
    expect(collapsed).toHaveLength(21)
    expectPoints(collapsed.slice(-3), [p(9, 0), p(10, 0), p(10, 0)])

    const kept = connectMeandered(start, end2, 30.15, { ...settings, preventShortEdges: false })
    expectPoints(kept.slice(-3), [p(9, -1), p(10, -1), p(10, 0)])
  })

  it('rejects a non-positive spacing', () => {
    expect(() => connectMeandered(start, end, 30, { ...settings, spacing: 0 })).toThrow(
      'meander.spacing: must be positive, got 0'
    )
  })
})

describe('adjustLength', () => {
  it('stops pulling turns in at the start-end axis', () => {
    const start = routePoint(p(0, 0), p(1, 0))
    const end = routePoint(p(10, 0), p(-1, 0))
    const pts = connectMeandered(start, end, 30, settings)
    const adjusted = adjustLength(-100, pts, start, end, settings)
    expect(adjusted.every(q => Math.abs(q.y) < 1e-12)).toBe(true)
    expect(realised(start.position, adjusted, end.position, 0.1)).toBeCloseTo(10, 9)
  })

  it('leaves a flat serpentine flat for a shorter target', () => {
    const start = routePoint(p(0, 0), p(1, 0))
    const end = routePoint(p(10, 0), p(-1, 0))
    const flat = connectMeandered(start, end, 8, settings)
    expect(flat.every(q => q.y === 0)).toBe(true)
    expect(adjustLength(-2, flat, start, end, settings)).toEqual(flat)
  })

  it('leaves too-short point lists alone', () => {
    const pts = [p(0, 1), p(1, 1), p(1, 0)]
    const start = routePoint(p(0, 0), p(1, 0))
    const end = routePoint(p(2, 0), p(-1, 0))
    expect(adjustLength(1, pts, start, end, settings)).toEqual(pts)
  })
})
