// Path data primitive types

import type { Point } from '../geometry'

// Every primitive is stored in absolute coordinates and knows where it
// starts, so a sequence can be re-serialized after entries are dropped.

export interface MovePrimitive {
  type: 'move'
  start: Point
  end: Point
}

export interface LinePrimitive {
  type: 'line'
  start: Point
  end: Point
}

export interface CubicPrimitive {
  type: 'cubic'
  start: Point
  control1: Point
  control2: Point
  end: Point
}

export interface QuadraticPrimitive {
  type: 'quadratic'
  start: Point
  control: Point
  end: Point
}

export interface ArcPrimitive {
  type: 'arc'
  start: Point
  radius: Point
  rotation: number  // degrees
  largeArc: boolean
  sweep: boolean
  end: Point
}

/** Implicit line back to the subpath start; `end` is that start point */
export interface ClosePrimitive {
  type: 'close'
  start: Point
  end: Point
}

export type PathPrimitive =
  | MovePrimitive
  | LinePrimitive
  | CubicPrimitive
  | QuadraticPrimitive
  | ArcPrimitive
  | ClosePrimitive

export type PrimitiveType = PathPrimitive['type']
