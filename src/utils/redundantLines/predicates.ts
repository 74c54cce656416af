// Geometric predicates for collinear overlap detection

import type { LineSegment, Point, SegmentBounds } from '../geometry'
import { segmentBounds, segmentLength } from '../geometry'
import { formatNumber } from '../pathData'
import { GeometryAssertionError } from './errors'
import type { OverlapKind, SlopeIntercept } from './types'

export function describeSegment(segment: LineSegment): string {
  const { start, end } = segment
  return `(${formatNumber(start.x)},${formatNumber(start.y)})-(${formatNumber(end.x)},${formatNumber(end.y)})`
}

/**
 * Slope and y-intercept of the line through two points. Points whose
 * x-coordinates differ by less than the tolerance form a vertical line.
 */
export function slopeIntercept(p1: Point, p2: Point, tolerance: number): SlopeIntercept {
  if (Math.abs(p1.x - p2.x) < tolerance) {
    return { slope: null, intercept: p1.x }
  }

  const slope = (p2.y - p1.y) / (p2.x - p1.x)
  const intercept1 = p1.y - slope * p1.x
  const intercept2 = p2.y - slope * p2.x
  // Written negated so NaN intercepts fail too
  if (!(Math.abs(intercept1 - intercept2) < tolerance)) {
    throw new GeometryAssertionError(
      `Points (${p1.x},${p1.y}) and (${p2.x},${p2.y}) give inconsistent intercepts ${intercept1} and ${intercept2}`
    )
  }
  return { slope, intercept: intercept1 }
}

export function areCollinear(a: LineSegment, b: LineSegment, tolerance: number): boolean {
  const eq1 = slopeIntercept(a.start, a.end, tolerance)
  const eq2 = slopeIntercept(b.start, b.end, tolerance)

  const sameSlope = (eq1.slope === null && eq2.slope === null) ||
    (eq1.slope !== null && eq2.slope !== null && Math.abs(eq1.slope - eq2.slope) < tolerance)
  const sameIntercept = Math.abs(eq1.intercept - eq2.intercept) < tolerance

  return sameSlope && sameIntercept
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits
  // + 0 folds -0 into 0 so both land in the same bucket
  return Math.round(value * factor) / factor + 0
}

/**
 * Bucket key for a slope/intercept pair, rounded to absorb float noise
 */
export function slopeInterceptKey(equation: SlopeIntercept, digits: number): string {
  const slope = equation.slope === null ? 'vertical' : String(roundTo(equation.slope, digits))
  return `${slope}|${roundTo(equation.intercept, digits)}`
}

function assertNotShorter(longer: LineSegment, shorter: LineSegment, tolerance: number): void {
  if (segmentLength(longer) + tolerance < segmentLength(shorter)) {
    throw new GeometryAssertionError(
      `Containing line ${describeSegment(longer)} is shorter than contained line ${describeSegment(shorter)}`
    )
  }
}

// A bounds corner lies strictly inside the other span on one axis and
// inclusively on the other. Two segments meeting end-to-end only touch
// inclusively on both axes, so they never match.
function cornerInside(outer: SegmentBounds, x: number, y: number, eps: number): boolean {
  return (
    (outer.minX <= x + eps && x <= outer.maxX + eps && outer.minY + eps < y && y + eps < outer.maxY) ||
    (outer.minX + eps < x && x + eps < outer.maxX && outer.minY <= y + eps && y <= outer.maxY + eps)
  )
}

/**
 * Classify how two collinear segments overlap, comparing their bounds
 * with the tolerance applied on both sides so near-equal values count
 * as overlapping.
 */
export function classifyOverlap(first: LineSegment, second: LineSegment, tolerance: number): OverlapKind {
  const a = segmentBounds(first)
  const b = segmentBounds(second)
  const eps = tolerance

  if (a.minX <= b.minX + eps && a.maxX + eps >= b.maxX && a.minY <= b.minY + eps && a.maxY + eps >= b.maxY) {
    assertNotShorter(first, second, tolerance)
    return 'first-contains-second'
  }
  if (a.minX + eps >= b.minX && a.maxX <= b.maxX + eps && a.minY + eps >= b.minY && a.maxY <= b.maxY + eps) {
    assertNotShorter(second, first, tolerance)
    return 'second-contains-first'
  }
  if (cornerInside(a, b.minX, b.minY, eps) || cornerInside(a, b.maxX, b.maxY, eps)) {
    return 'partial'
  }
  return 'disjoint'
}

/**
 * The longest segment spanned by any two of the four endpoints.
 *
 * Sorting the endpoints would pick the wrong pair when two x-coordinates
 * differ only by float noise, so every pair is measured instead.
 */
export function longestSpan(first: LineSegment, second: LineSegment): LineSegment {
  const points = [first.start, first.end, second.start, second.end]
  let longest: LineSegment = first
  let longestLength = segmentLength(first)

  for (let i = 0; i < points.length; i++) {
    for (let j = i + 1; j < points.length; j++) {
      const candidate = { start: points[i], end: points[j] }
      const length = segmentLength(candidate)
      if (length > longestLength) {
        longest = candidate
        longestLength = length
      }
    }
  }

  return {
    start: { ...longest.start },
    end: { ...longest.end },
  }
}
