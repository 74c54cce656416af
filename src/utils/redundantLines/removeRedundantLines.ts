// Collinear overlap reduction over a set of parsed paths

import type { PathPrimitive } from '../pathData'
import { bucketSegments } from './bucketing'
import { LOG_PREFIX, resolveReducerOptions } from './options'
import { reduceBucket } from './overlapCheck'
import { reconstructPaths } from './reconstruction'
import type { ReducerOptions, ReductionResult, ReductionState } from './types'

/**
 * Remove lines that retrace other lines. Exact and partial overlaps between
 * collinear segments collapse into a minimal set covering the same ground;
 * moves, curves and arcs pass through, closes become explicit lines.
 *
 * The input paths are not modified. Throws GeometryAssertionError or
 * ExceededMaxPassesError before producing any output if a bucket cannot
 * be reduced.
 */
export function reduceRedundantLines(paths: PathPrimitive[][], options: ReducerOptions = {}): ReductionResult {
  const resolved = resolveReducerOptions(options)
  const { buckets, arena } = bucketSegments(paths, resolved)
  const state: ReductionState = {
    arena,
    removals: new Map(),
    updates: new Map(),
  }

  for (const [key, bucket] of buckets) {
    const outcome = reduceBucket(key, bucket, state, resolved)
    if (!outcome.ok) {
      throw outcome.error
    }
  }

  const result = reconstructPaths(paths, state)
  const { removedCount, removedLength, keptCount, keptLength } = result.stats
  resolved.logger.log(
    `${LOG_PREFIX} Removed ${removedCount} lines (${removedLength} length) and kept ${keptCount} lines (${keptLength} length)`
  )
  return result
}
