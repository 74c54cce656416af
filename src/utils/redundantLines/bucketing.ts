// Group lines by slope/intercept so overlap checks stay within collinear sets

import { copySegment } from '../geometry'
import type { LineSegment } from '../geometry'
import type { PathPrimitive } from '../pathData'
import { slopeIntercept, slopeInterceptKey } from './predicates'
import type { Bucket, BucketIndex, ResolvedReducerOptions } from './types'

/**
 * Scan every primitive of every path in order. Each primitive takes the
 * next overall index (moves and curves included, so reconstruction can
 * walk the same sequence), but only straight edges are bucketed: lines,
 * and closes, which draw a straight edge back to the subpath start.
 */
export function bucketSegments(paths: PathPrimitive[][], options: ResolvedReducerOptions): BucketIndex {
  const buckets = new Map<string, Bucket>()
  const arena: LineSegment[] = []
  let overallIndex = 0

  for (let pathIndex = 0; pathIndex < paths.length; pathIndex++) {
    const primitives = paths[pathIndex]
    for (let lineIndex = 0; lineIndex < primitives.length; lineIndex++) {
      const primitive = primitives[lineIndex]

      if (primitive.type === 'line' || primitive.type === 'close') {
        const equation = slopeIntercept(primitive.start, primitive.end, options.tolerance)
        const key = slopeInterceptKey(equation, options.keyPrecision)

        let bucket = buckets.get(key)
        if (!bucket) {
          bucket = []
          buckets.set(key, bucket)
        }
        bucket.push({ overallIndex, pathIndex, lineIndex, slot: arena.length })
        arena.push(copySegment(primitive))
      }

      overallIndex++
    }
  }

  return { buckets, arena }
}
