/**
 * tline-router: routing of coplanar-waveguide traces between component pins.
 *
 * Entry point for batch use is cli.ts (stdin JSON → stdout JSON); the exports
 * below are the library surface.
 */

export * from './types'
export * from './errors'
export * from './vector'
export { routePoint, inferAnchorDirection, headingFrom } from './route-point'
export { Lead, parseJogTurn } from './lead'
export { connectSimple } from './connect-simple'
export type { ConnectContext, SimpleConnection } from './connect-simple'
export { ObstacleChecker, pointInPolygon, segmentOutline } from './obstacles'
export { Pathfinder, connectAstarOrSimple } from './pathfinder'
export type { PathfinderSettings } from './pathfinder'
export { meanderFrame, isSideways, connectMeandered, adjustLength } from './meander'
export type { MeanderSettings, MeanderFrame } from './meander'
export { connectFramed } from './framed'
export type { FrameEnd, FrameSettings } from './framed'
export { totalLength, cornerRoundingExcess, manhattanLength, removeCollinearPoints } from './polyline'
export { ROUTE_DEFAULTS, resolveRouteOptions, strategyFor } from './options'
export type { RouteOptions, LeadOptions } from './options'
export { Route, LENGTH_TOLERANCE } from './route'
export type { RouteContext, RouteState } from './route'
export { Design } from './design'
export type { ComponentDefinition, PlacedComponent, EmittedTrace } from './design'
export { OutputGenerator, Viewport, filletPolyline, strokePolyline, fillPolygon } from './output'
export type { OutputGeometry, TraceGeometry, RasterOutput, RasterOptions } from './output'
export { Visualizer } from './visualizer'
export { Router, buildDesign, toPoint } from './router'
export { createLogger, setLogLevel } from './log'
export type { Logger, LogLevel } from './log'

import { DesignInput, RoutingResult } from './types'
import { Router } from './router'

/** Routes every line in `input` and returns the batch result. */
export function routeDesign(input: DesignInput): RoutingResult {
  return new Router(input).route()
}
