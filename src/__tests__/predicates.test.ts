import { describe, it, expect } from 'vitest'
import {
  areCollinear,
  classifyOverlap,
  GeometryAssertionError,
  longestSpan,
  slopeIntercept,
  slopeInterceptKey,
} from '../utils/redundantLines'
import type { LineSegment } from '../utils/geometry'

const EPS = 0.001

function seg(x1: number, y1: number, x2: number, y2: number): LineSegment {
  return { start: { x: x1, y: y1 }, end: { x: x2, y: y2 } }
}

describe('slopeIntercept', () => {
  it('should compute slope and y-intercept', () => {
    expect(slopeIntercept({ x: 0, y: 0 }, { x: 10, y: 5 }, EPS)).toEqual({ slope: 0.5, intercept: 0 })
    expect(slopeIntercept({ x: 2, y: 3 }, { x: 4, y: 7 }, EPS)).toEqual({ slope: 2, intercept: -1 })
  })

  it('should treat nearly equal x-coordinates as vertical', () => {
    expect(slopeIntercept({ x: 3, y: 0 }, { x: 3.0005, y: 10 }, EPS)).toEqual({ slope: null, intercept: 3 })
  })

  it('should reject points without a consistent intercept', () => {
    expect(() => slopeIntercept({ x: 0, y: 0 }, { x: 1, y: Infinity }, EPS)).toThrow(GeometryAssertionError)
  })
})

describe('areCollinear', () => {
  it('should match segments on the same line', () => {
    expect(areCollinear(seg(0, 0, 10, 0), seg(20, 0, 30, 0), EPS)).toBe(true)
    expect(areCollinear(seg(0, 0, 1, 1), seg(5, 5, 3, 3), EPS)).toBe(true)
  })

  it('should reject parallel segments with a different intercept', () => {
    expect(areCollinear(seg(0, 0, 10, 0), seg(0, 5, 10, 5), EPS)).toBe(false)
  })

  it('should compare vertical segments by x-coordinate', () => {
    expect(areCollinear(seg(2, 0, 2, 5), seg(2, 8, 2, 9), EPS)).toBe(true)
    expect(areCollinear(seg(2, 0, 2, 5), seg(3, 0, 3, 5), EPS)).toBe(false)
    expect(areCollinear(seg(0, 0, 0, 5), seg(0, 0, 5, 0), EPS)).toBe(false)
  })
})

describe('slopeInterceptKey', () => {
  it('should round to the requested precision', () => {
    expect(slopeInterceptKey({ slope: 0.50049, intercept: 1.23449 }, 3)).toBe('0.5|1.234')
  })

  it('should fold negative zero into zero', () => {
    expect(slopeInterceptKey({ slope: -0, intercept: -0.0001 }, 3)).toBe('0|0')
  })

  it('should key vertical lines separately', () => {
    expect(slopeInterceptKey({ slope: null, intercept: 2.0004 }, 3)).toBe('vertical|2')
  })
})

describe('classifyOverlap', () => {
  it('should detect containment in either order', () => {
    expect(classifyOverlap(seg(0, 0, 10, 0), seg(2, 0, 5, 0), EPS)).toBe('first-contains-second')
    expect(classifyOverlap(seg(5, 0, 2, 0), seg(0, 0, 10, 0), EPS)).toBe('second-contains-first')
  })

  it('should treat identical segments as the first containing the second', () => {
    expect(classifyOverlap(seg(0, 0, 10, 0), seg(10, 0, 0, 0), EPS)).toBe('first-contains-second')
  })

  it('should detect partial overlaps', () => {
    expect(classifyOverlap(seg(0, 0, 5, 0), seg(3, 0, 10, 0), EPS)).toBe('partial')
    expect(classifyOverlap(seg(3, 0, 10, 0), seg(0, 0, 5, 0), EPS)).toBe('partial')
    expect(classifyOverlap(seg(1, 0, 1, 5), seg(1, 3, 1, 9), EPS)).toBe('partial')
    expect(classifyOverlap(seg(0, 0, 4, 4), seg(2, 2, 6, 6), EPS)).toBe('partial')
  })

  it('should not treat end-to-end segments as overlapping', () => {
    expect(classifyOverlap(seg(0, 0, 5, 0), seg(5, 0, 10, 0), EPS)).toBe('disjoint')
    expect(classifyOverlap(seg(0, 0, 2, 2), seg(2, 2, 4, 4), EPS)).toBe('disjoint')
  })

  it('should count endpoints within tolerance as contained', () => {
    expect(classifyOverlap(seg(0, 0, 10, 0), seg(0.0005, 0, 10.0005, 0), EPS)).toBe('first-contains-second')
    expect(classifyOverlap(seg(0.0005, 0, 10.0005, 0), seg(0, 0, 10, 0), EPS)).toBe('first-contains-second')
  })

  it('should treat segments meeting within tolerance as end-to-end', () => {
    expect(classifyOverlap(seg(0, 0, 5, 0), seg(4.9995, 0, 10, 0), EPS)).toBe('disjoint')
    expect(classifyOverlap(seg(0, 0, 5, 0), seg(4.99, 0, 10, 0), EPS)).toBe('partial')
  })

  it('should report separated segments as disjoint', () => {
    expect(classifyOverlap(seg(0, 0, 2, 0), seg(3, 0, 6, 0), EPS)).toBe('disjoint')
  })

  it('should leave partial overlaps on falling diagonals undetected', () => {
    expect(classifyOverlap(seg(0, 10, 10, 0), seg(5, 5, 15, -5), EPS)).toBe('disjoint')
  })

  it('should fail when the containing segment is the shorter one', () => {
    expect(() => classifyOverlap(seg(0, 0, 10, 0), seg(-0.9, 0, 10.9, 0), 1)).toThrow(GeometryAssertionError)
  })
})

describe('longestSpan', () => {
  it('should span the two farthest endpoints', () => {
    expect(longestSpan(seg(0, 0, 5, 0), seg(3, 0, 10, 0))).toEqual(seg(0, 0, 10, 0))
    expect(longestSpan(seg(10, 0, 3, 0), seg(5, 0, 0, 0))).toEqual(seg(10, 0, 0, 0))
  })

  it('should keep the first segment when nothing is longer', () => {
    const first = seg(0, 0, 10, 0)
    const span = longestSpan(first, seg(2, 0, 4, 0))
    expect(span).toEqual(first)
    expect(span.start).not.toBe(first.start)
  })
})
