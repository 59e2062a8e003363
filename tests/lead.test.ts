import { describe, it, expect } from 'vitest'
import { Lead, parseJogTurn } from '../src/lead'
import { RouteConfigError } from '../src/errors'
import { expectPoints } from './helpers'

describe('parseJogTurn', () => {
  it('accepts every spelling of a left quarter turn', () => {
    const spellings = ['L', 'L90', 'R-90', 90, '90', 'A,90', 'angle, 90', 'left', 'left90', 'right-90']
    for (const turn of spellings) {
      expect(parseJogTurn(turn)).toBe(90)
    }
  })

  it('parses right turns and straight runs', () => {
    expect(parseJogTurn('R')).toBe(-90)
    expect(parseJogTurn('right')).toBe(-90)
    expect(parseJogTurn('right45')).toBe(-45)
    expect(parseJogTurn('R30.5')).toBe(-30.5)
    expect(parseJogTurn('-30')).toBe(-30)
    expect(parseJogTurn('S')).toBe(0)
    expect(parseJogTurn('D')).toBe(0)
    expect(parseJogTurn('straight')).toBe(0)
  })

  it('reports the field of a bad turn', () => {
    let caught: unknown
    try {
      parseJogTurn('Q', 'lead.startJogs[2].turn')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(RouteConfigError)
    expect(caught instanceof RouteConfigError && caught.field).toBe('lead.startJogs[2].turn')
  })

  it('rejects non-finite numbers', () => {
    expect(() => parseJogTurn(Infinity)).toThrow('turn angle must be finite, got Infinity')
  })
})

describe('Lead', () => {
  it('appends one point per move and rotates the heading', () => {
    const lead = new Lead()
    const tip = lead.seedFromPin({ position: { x: 0, y: 0 }, direction: { x: 0, y: 2 } })
    expect(tip.direction).toEqual({ x: 0, y: 1 })

    lead.goStraight(1)
    lead.goLeft(2)
    lead.goRight(1)

    expect(lead.pts).toEqual([
      { x: 0, y: 0 },
      { x: 0, y: 1 },
      { x: -2, y: 1 },
      { x: -2, y: 2 }
    ])
    expect(lead.direction).toEqual({ x: 0, y: 1 })
    expect(lead.length).toBe(4)
  })

  it('turns by 45 degrees', () => {
    const lead = new Lead()
    lead.seedFromPin({ position: { x: 0, y: 0 }, direction: { x: 1, y: 0 } })
    lead.goLeft45(Math.SQRT2)
    lead.goRight45(1)
    expectPoints([...lead.pts], [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 1 }])
  })

  it('applies jog lists', () => {
    const lead = new Lead()
    lead.seedFromPin({ position: { x: 0, y: 0 }, direction: { x: 1, y: 0 } })
    lead.applyJogs([{ turn: 'L', length: 1 }, { turn: 'R90', length: 2 }], 'lead.startJogs')
    expect(lead.pts).toEqual([{ x: 0, y: 0 }, { x: 0, y: 1 }, { x: 2, y: 1 }])
    expect(lead.getTip()).toEqual({ position: { x: 2, y: 1 }, direction: { x: 1, y: 0 } })
  })

  it('refuses to grow before seeding or after freezing', () => {
    const lead = new Lead()
    expect(() => lead.goStraight(1)).toThrow('lead must be seeded from a pin before it can be extended')

    lead.seedFromPin({ position: { x: 0, y: 0 }, direction: { x: 1, y: 0 } })
    lead.freeze()
    expect(lead.isFrozen).toBe(true)
    expect(() => lead.goStraight(1)).toThrow('lead is frozen; rebuild the route to change it')
    expect(lead.pts).toHaveLength(1)
  })
})
