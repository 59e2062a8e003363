import { expect } from 'vitest'
import { Design } from '../src/design'
import { Point } from '../src/types'

export function expectPoints(actual: Point[], expected: Point[], digits: number = 9): void {
  expect(actual).toHaveLength(expected.length)
  actual.forEach((p, i) => {
    expect(p.x).toBeCloseTo(expected[i].x, digits)
    expect(p.y).toBeCloseTo(expected[i].y, digits)
  })
}

export function square(minX: number, minY: number, maxX: number, maxY: number): Point[] {
  return [
    { x: minX, y: minY },
    { x: maxX, y: minY },
    { x: maxX, y: maxY },
    { x: minX, y: maxY }
  ]
}

/** Components "qa" (pin "out") and "qb" (pin "in") with nothing else placed. */
export function twoPinDesign(start: Point, startDir: Point, end: Point, endDir: Point): Design {
  const design = new Design()
  design.addComponent('qa', { pins: { out: { position: start, direction: startDir } } })
  design.addComponent('qb', { pins: { in: { position: end, direction: endDir } } })
  return design
}

export const PINS = {
  startPin: { component: 'qa', pin: 'out' },
  endPin: { component: 'qb', pin: 'in' }
}
