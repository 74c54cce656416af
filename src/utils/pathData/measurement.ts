// Length of path primitives

import type { Point } from '../geometry'
import { distance, pointsEqual } from '../geometry'
import type { ArcPrimitive, CubicPrimitive, PathPrimitive, QuadraticPrimitive } from './types'
import { PATH_DATA } from '../../constants'

function cubicPointAt(curve: CubicPrimitive, t: number): Point {
  const mt = 1 - t
  const a = mt * mt * mt
  const b = 3 * mt * mt * t
  const c = 3 * mt * t * t
  const d = t * t * t
  return {
    x: a * curve.start.x + b * curve.control1.x + c * curve.control2.x + d * curve.end.x,
    y: a * curve.start.y + b * curve.control1.y + c * curve.control2.y + d * curve.end.y,
  }
}

function quadraticPointAt(curve: QuadraticPrimitive, t: number): Point {
  const mt = 1 - t
  return {
    x: mt * mt * curve.start.x + 2 * mt * t * curve.control.x + t * t * curve.end.x,
    y: mt * mt * curve.start.y + 2 * mt * t * curve.control.y + t * t * curve.end.y,
  }
}

function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
  return Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy)
}

/**
 * Point sampler for an elliptical arc, using the endpoint-to-center
 * conversion from the SVG implementation notes. Returns null for arcs
 * that degenerate to a straight line (zero radius).
 */
function arcSampler(arc: ArcPrimitive): ((t: number) => Point) | null {
  let rx = Math.abs(arc.radius.x)
  let ry = Math.abs(arc.radius.y)
  if (rx === 0 || ry === 0) return null

  const phi = (arc.rotation * Math.PI) / 180
  const cosPhi = Math.cos(phi)
  const sinPhi = Math.sin(phi)
  const dx2 = (arc.start.x - arc.end.x) / 2
  const dy2 = (arc.start.y - arc.end.y) / 2
  const x1p = cosPhi * dx2 + sinPhi * dy2
  const y1p = -sinPhi * dx2 + cosPhi * dy2

  // Radii too small to span the endpoints are scaled up
  const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
  if (lambda > 1) {
    const scale = Math.sqrt(lambda)
    rx *= scale
    ry *= scale
  }

  const numerator = rx * rx * ry * ry - rx * rx * y1p * y1p - ry * ry * x1p * x1p
  const denominator = rx * rx * y1p * y1p + ry * ry * x1p * x1p
  const sign = arc.largeArc !== arc.sweep ? 1 : -1
  const coefficient = sign * Math.sqrt(Math.max(0, numerator / denominator))
  const cxp = (coefficient * rx * y1p) / ry
  const cyp = (-coefficient * ry * x1p) / rx
  const cx = cosPhi * cxp - sinPhi * cyp + (arc.start.x + arc.end.x) / 2
  const cy = sinPhi * cxp + cosPhi * cyp + (arc.start.y + arc.end.y) / 2

  const ux = (x1p - cxp) / rx
  const uy = (y1p - cyp) / ry
  const vx = (-x1p - cxp) / rx
  const vy = (-y1p - cyp) / ry
  const theta1 = vectorAngle(1, 0, ux, uy)
  let deltaTheta = vectorAngle(ux, uy, vx, vy)
  if (!arc.sweep && deltaTheta > 0) deltaTheta -= 2 * Math.PI
  if (arc.sweep && deltaTheta < 0) deltaTheta += 2 * Math.PI

  return (t: number): Point => {
    const theta = theta1 + deltaTheta * t
    const cosTheta = Math.cos(theta)
    const sinTheta = Math.sin(theta)
    return {
      x: cx + rx * cosTheta * cosPhi - ry * sinTheta * sinPhi,
      y: cy + rx * cosTheta * sinPhi + ry * sinTheta * cosPhi,
    }
  }
}

function sampledLength(pointAt: (t: number) => Point, steps: number): number {
  let length = 0
  let previous = pointAt(0)
  for (let i = 1; i <= steps; i++) {
    const next = pointAt(i / steps)
    length += distance(previous, next)
    previous = next
  }
  return length
}

/**
 * Drawn length of a primitive. Moves draw nothing; curves and arcs are
 * measured along a sampled polyline.
 */
export function primitiveLength(primitive: PathPrimitive, steps: number = PATH_DATA.CURVE_SAMPLES): number {
  switch (primitive.type) {
    case 'move':
      return 0
    case 'line':
    case 'close':
      return distance(primitive.start, primitive.end)
    case 'cubic': {
      const curve = primitive
      return sampledLength(t => cubicPointAt(curve, t), steps)
    }
    case 'quadratic': {
      const curve = primitive
      return sampledLength(t => quadraticPointAt(curve, t), steps)
    }
    case 'arc': {
      if (pointsEqual(primitive.start, primitive.end)) return 0
      const pointAt = arcSampler(primitive)
      return pointAt ? sampledLength(pointAt, steps) : distance(primitive.start, primitive.end)
    }
  }
}
