import { describe, it, expect } from 'vitest'
import * as fs from 'fs'
import * as path from 'path'
import { Router, buildDesign, toPoint } from '../src/router'
import { parseArgs, systemFailure } from '../src/cli-options'
import { RouteConfigError } from '../src/errors'
import { routeDesign } from '../src/index'
import { DesignInput } from '../src/types'

function fixture(): DesignInput {
  const text = fs.readFileSync(path.join(__dirname, 'fixtures', 'crossing-lines.json'), 'utf-8')
  return JSON.parse(text) as DesignInput
}

describe('toPoint', () => {
  it('accepts pairs and objects', () => {
    expect(toPoint([1, 2], 'p')).toEqual({ x: 1, y: 2 })
    expect(toPoint({ x: 3, y: 4 }, 'p')).toEqual({ x: 3, y: 4 })
  })

  it('rejects malformed coordinates', () => {
    expect(() => toPoint(JSON.parse('[1]'), 'p')).toThrow('p: expected [x, y]')
    expect(() => toPoint(JSON.parse('[1, "a"]'), 'p')).toThrow('p: coordinates must be finite numbers, got [1,"a"]')
  })
})

describe('buildDesign', () => {
  it('places every component', () => {
    const design = buildDesign(fixture())
    expect(design.getComponents().map(c => c.name)).toEqual(['qa', 'qb', 'qc', 'qd', 'pad'])
    expect(design.resolvePin('qd', 'in')).toEqual({ position: { x: 5, y: 2 }, direction: { x: 0, y: -1 } })
    expect(design.obstacleNames()).toEqual(['pad'])
  })

  it('names the field of a bad coordinate', () => {
    const input: DesignInput = {
      components: [{ name: 'x', polygons: [JSON.parse('[[0, 0], [1, 0], [1]]')] }],
      routes: []
    }
    let caught: unknown
    try {
      buildDesign(input)
    } catch (err) {
      caught = err
    }
    expect(caught instanceof RouteConfigError && caught.field).toBe('components[0].polygons[0][2]')
  })
})

describe('Router', () => {
  it('routes what it can and reports the rest', () => {
    const result = new Router(fixture()).route()

    expect(result.success).toBe(false)
    expect(result.routes.map(r => r.name)).toEqual(['r1'])
    expect(result.routes[0].points).toEqual([{ x: 0, y: 0 }, { x: 10, y: 0 }])

    expect(result.failedRoutes).toHaveLength(2)
    const [blocked, bad] = result.failedRoutes
    expect(blocked.route).toBe('r2')
    expect([blocked.start, blocked.end, blocked.code]).toEqual(['qc.out', 'qd.in', 'INFEASIBLE'])
    expect(blocked.reason).toMatch(/: the direct segment is obstructed$/)
    expect(bad).toEqual({
      route: 'bad',
      start: 'qa.nope',
      end: 'qb.in',
      reason: 'bad.startPin: qa.nope: component "qa" has no pin "nope" (pins: out)',
      code: 'CONFIG'
    })
  })

  it('keeps finished routes in the design', () => {
    const router = new Router(fixture())
    router.route()
    expect(router.getDesign().getTraces().map(t => t.name)).toEqual(['r1'])
    expect(router.getRoutes().map(r => r.currentState)).toEqual(['finalized', 'leads-built', 'empty'])
  })

  it('names unnamed routes by position', () => {
    const input = fixture()
    const result = routeDesign({ ...input, routes: [{ ...input.routes[0], name: '' }] })
    expect(result.success).toBe(true)
    expect(result.routes[0].name).toBe('route0')
  })

  it('rejects a routes field that is not a list', () => {
    const router = new Router({ components: [], routes: JSON.parse('{"name": "feed"}') })
    expect(() => router.route()).toThrow(RouteConfigError)
    expect(() => router.route()).toThrow('routes: expected a list of routes')
  })
})

describe('cli options', () => {
  it('parses flags', () => {
    expect(parseArgs(['--input', 'a.json', '--output', 'out/chip', '--quiet'])).toEqual({
      inputFile: 'a.json',
      outputPath: 'out/chip',
      visualize: true,
      quiet: true
    })
    expect(parseArgs([])).toEqual({ visualize: false, quiet: false })
  })

  it('wraps a failure before routing', () => {
    expect(systemFailure(new RouteConfigError('components', 'expected a list of components'))).toEqual({
      success: false,
      routes: [],
      failedRoutes: [{
        route: 'SYSTEM',
        start: 'N/A',
        end: 'N/A',
        reason: 'components: expected a list of components',
        code: 'CONFIG'
      }]
    })
    expect(systemFailure('boom').failedRoutes[0]).toMatchObject({ reason: 'boom', code: 'INTERNAL' })
  })
})
