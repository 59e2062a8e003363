import { JogStep, JogTurn, PinRecord, Point, RoutePoint } from './types'
import { RouteConfigError } from './errors'
import { routePoint } from './route-point'
import { add, distance, rotate, scale, unitVector } from './vector'

const NUMBER = String.raw`[-+]?(?:\d+\.\d+|\d+)`
const BARE_ANGLE = new RegExp(`^${NUMBER}$`)
const LEFT_ANGLE = new RegExp(`^(?:left|L)(${NUMBER})$`)
const RIGHT_ANGLE = new RegExp(`^(?:right|R)(${NUMBER})$`)
const EXPLICIT_ANGLE = new RegExp(`^(?:A|angle)\\s*,\\s*(${NUMBER})$`)

/**
 * Turn instruction → signed angle in degrees (positive turns left).
 *
 * Accepted: "L", "L#", "R", "R#", #, "#", "A,#", "left", "left#", "right",
 * "right#", "straight", "S", "D". So "L", "L90", "R-90", 90, "90", "A,90",
 * "left", "left90" and "right-90" are all the same quarter turn.
 */
export function parseJogTurn(turn: JogTurn, field: string = 'jog'): number {
  if (typeof turn === 'number') {
    if (!Number.isFinite(turn)) {
      throw new RouteConfigError(field, `turn angle must be finite, got ${turn}`)
    }
    return turn
  }

  const text = turn.trim()
  if (BARE_ANGLE.test(text)) return parseFloat(text)

  switch (text) {
    case 'left':
    case 'L':
      return 90
    case 'right':
    case 'R':
      return -90
    case 'straight':
    case 'S':
    case 'D':
      return 0
  }

  let match = LEFT_ANGLE.exec(text)
  if (match) return parseFloat(match[1])
  match = RIGHT_ANGLE.exec(text)
  if (match) return -parseFloat(match[1])
  match = EXPLICIT_ANGLE.exec(text)
  if (match) return parseFloat(match[1])

  throw new RouteConfigError(
    field,
    `unsupported jog turn "${turn}". Use one of "L", "L#", "R", "R#", #, "#", "A,#", ` +
      `"left", "left#", "right", "right#", "straight" where # is a signed number of degrees`
  )
}

/**
 * Ordered run of points growing outward from a pin. Seeded with exactly one
 * point; every move appends exactly one point and rotates the heading.
 */
export class Lead {
  private readonly points: Point[] = []
  private heading: Point | null = null
  private frozen = false

  get pts(): readonly Point[] {
    return this.points
  }

  get direction(): Point | null {
    return this.heading
  }

  get isSeeded(): boolean {
    return this.points.length > 0
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  seedFromPin(pin: PinRecord): RoutePoint {
    this.assertWritable()
    this.points.length = 0
    this.points.push({ x: pin.position.x, y: pin.position.y })
    this.heading = unitVector(pin.direction)
    return this.getTip()
  }

  goStraight(length: number): void {
    this.goAngle(length, 0)
  }

  /** 90° counter-clockwise relative to the current heading. */
  goLeft(length: number): void {
    this.goAngle(length, 90)
  }

  goRight(length: number): void {
    this.goAngle(length, -90)
  }

  goLeft45(length: number): void {
    this.goAngle(length, 45)
  }

  goRight45(length: number): void {
    this.goAngle(length, -45)
  }

  goAngle(length: number, angleDegrees: number): void {
    this.assertWritable()
    const heading = this.heading
    if (!heading || this.points.length === 0) {
      throw new Error('lead must be seeded from a pin before it can be extended')
    }
    const next = rotate(heading, angleDegrees, 'deg')
    this.heading = next
    this.points.push(add(this.points[this.points.length - 1], scale(next, length)))
  }

  applyJogs(jogs: JogStep[], field: string): void {
    jogs.forEach((jog, i) => {
      this.goAngle(jog.length, parseJogTurn(jog.turn, `${field}[${i}].turn`))
    })
  }

  freeze(): void {
    this.frozen = true
  }

  getTip(): RoutePoint {
    if (this.points.length === 0) {
      throw new Error('lead has not been seeded')
    }
    return routePoint(this.points[this.points.length - 1], this.heading)
  }

  get length(): number {
    let total = 0
    for (let i = 0; i < this.points.length - 1; i++) {
      total += distance(this.points[i], this.points[i + 1])
    }
    return total
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new Error('lead is frozen; rebuild the route to change it')
    }
  }
}
