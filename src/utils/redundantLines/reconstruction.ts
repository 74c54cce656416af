// Rebuild path primitive sequences from removal/update decisions

import type { PathPrimitive } from '../pathData'
import { primitiveLength } from '../pathData'
import { GeometryAssertionError } from './errors'
import type { ReductionResult, ReductionState, ReductionStats, TrackedSegment } from './types'

function assertSameOrigin(entry: TrackedSegment, pathIndex: number, lineIndex: number, overallIndex: number): void {
  if (entry.pathIndex !== pathIndex || entry.lineIndex !== lineIndex) {
    throw new GeometryAssertionError(
      `Entry ${overallIndex} was recorded for path ${entry.pathIndex} line ${entry.lineIndex} ` +
      `but maps to path ${pathIndex} line ${lineIndex}`
    )
  }
}

/**
 * Walk the original primitives with the same overall index counter used
 * for bucketing. Removed lines are dropped, updated lines replaced, and
 * closes rewritten as explicit lines: once lines around it are removed or
 * merged, an implicit close would no longer draw the same edge.
 */
export function reconstructPaths(paths: PathPrimitive[][], state: ReductionState): ReductionResult {
  const stats: ReductionStats = {
    removedCount: 0,
    removedLength: 0,
    keptCount: 0,
    keptLength: 0,
  }
  const keep = (output: PathPrimitive[], primitive: PathPrimitive): void => {
    output.push(primitive)
    stats.keptCount++
    stats.keptLength += primitiveLength(primitive)
  }

  let overallIndex = 0
  const reconstructed = paths.map((primitives, pathIndex) => {
    const output: PathPrimitive[] = []

    primitives.forEach((primitive, lineIndex) => {
      const removal = state.removals.get(overallIndex)
      const update = state.updates.get(overallIndex)

      if (removal) {
        assertSameOrigin(removal, pathIndex, lineIndex, overallIndex)
        stats.removedCount++
        stats.removedLength += primitiveLength(primitive)
      } else if (update) {
        assertSameOrigin(update, pathIndex, lineIndex, overallIndex)
        const { start, end } = update.segment
        keep(output, { type: 'line', start: { ...start }, end: { ...end } })
      } else if (primitive.type === 'close') {
        keep(output, { type: 'line', start: { ...primitive.start }, end: { ...primitive.end } })
      } else {
        keep(output, primitive)
      }

      overallIndex++
    })

    return output
  })

  return {
    paths: reconstructed,
    removed: [...state.removals.values()].map(entry => entry.segment),
    merged: [...state.updates.values()].map(entry => entry.segment),
    stats,
  }
}
