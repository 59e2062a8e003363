import { describe, it, expect } from 'vitest'
import { connectSimple } from '../src/connect-simple'
import { ObstacleChecker } from '../src/obstacles'
import { Design } from '../src/design'
import { routePoint } from '../src/route-point'
import { square } from './helpers'

const p = (x: number, y: number) => ({ x, y })
const free = { precision: 10, obstacles: null }

function blocked(...boxes: Array<[number, number, number, number]>) {
  const design = new Design()
  boxes.forEach(([x0, y0, x1, y1], i) => {
    design.addComponent(`block${i}`, { polygons: [square(x0, y0, x1, y1)] })
  })
  return { precision: 10, obstacles: new ObstacleChecker(design) }
}

describe('connectSimple', () => {
  it('connects facing aligned points directly', () => {
    const result = connectSimple(routePoint(p(0, 0), p(1, 0)), routePoint(p(5, 0), p(-1, 0)), free)
    expect(result).toEqual({ kind: 'connected', points: [] })
  })

  it('will not go straight against the start direction', () => {
    const result = connectSimple(routePoint(p(0, 0), p(-1, 0)), routePoint(p(5, 0), p(-1, 0)), free)
    expect(result.kind).toBe('needs-search')
  })

  it('takes the relaxed corner when the perfect one does not fit', () => {
    const result = connectSimple(routePoint(p(0, 0), p(1, 0)), routePoint(p(3, 4), p(0, 1)), free)
    expect(result).toEqual({ kind: 'connected', points: [p(0, 4)] })
  })

  it('takes the perfect L through corner2', () => {
    const result = connectSimple(routePoint(p(0, 0), p(1, 0)), routePoint(p(3, 4), p(0, -1)), free)
    expect(result).toEqual({ kind: 'connected', points: [p(3, 0)] })
  })

  it('bends into an S when the L corner is blocked', () => {
    const ctx = blocked([3.5, -0.5, 4.5, 0.5])
    const result = connectSimple(routePoint(p(0, 0), p(1, 0)), routePoint(p(4, 2), p(-1, 0)), ctx)
    expect(result).toEqual({ kind: 'connected', points: [p(2, 0), p(2, 2)] })
  })

  it('places no constraint on an anchor end', () => {
    const result = connectSimple(routePoint(p(0, 0), p(0, 1)), routePoint(p(3, 4)), free)
    expect(result).toEqual({ kind: 'connected', points: [p(0, 4)] })
  })

  it('infers a start direction toward the end', () => {
    const result = connectSimple(routePoint(p(0, 0)), routePoint(p(-3, 1)), free)
    expect(result).toEqual({ kind: 'connected', points: [p(-3, 0)] })
  })

  it('reports an obstructed direct segment', () => {
    const ctx = blocked([2, -1, 4, 1])
    const start = routePoint(p(0, 0), p(1, 0))
    const end = routePoint(p(6, 0), p(-1, 0))
    expect(connectSimple(start, end, ctx)).toEqual({
      kind: 'needs-search',
      reason: 'the direct segment is obstructed'
    })
    expect(connectSimple(start, end, free)).toEqual({ kind: 'connected', points: [] })
  })

  it('gives up when every candidate heads backwards', () => {
    const result = connectSimple(routePoint(p(0, 0), p(-1, -1)), routePoint(p(3, 4), p(0, 1)), free)
    expect(result).toEqual({
      kind: 'needs-search',
      reason: 'none of the straight, L-shaped or S-shaped connections fit the directions and obstacles'
    })
  })
})
