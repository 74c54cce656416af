// Pairwise overlap detection and merging within one bucket

import type { LineSegment } from '../geometry'
import { ExceededMaxPassesError } from './errors'
import { LOG_PREFIX } from './options'
import { areCollinear, classifyOverlap, describeSegment, longestSpan } from './predicates'
import type { Bucket, BucketReduction, ReductionState, ResolvedReducerOptions, SegmentRecord } from './types'

function markRemoved(state: ReductionState, record: SegmentRecord): void {
  state.updates.delete(record.overallIndex)
  state.removals.set(record.overallIndex, {
    pathIndex: record.pathIndex,
    lineIndex: record.lineIndex,
    segment: state.arena[record.slot],
  })
}

function markUpdated(state: ReductionState, record: SegmentRecord, segment: LineSegment): void {
  state.removals.delete(record.overallIndex)
  state.arena[record.slot] = segment
  state.updates.set(record.overallIndex, {
    pathIndex: record.pathIndex,
    lineIndex: record.lineIndex,
    segment,
  })
}

/**
 * One naive N^2 scan over a bucket.
 *
 * Fully redundant lines go to the removal set and the scan continues. On a
 * partial overlap the earlier line is removed, the later one is lengthened
 * to cover both, and the pass stops with `changed` set: the lengthened line
 * may now overlap records that were already compared.
 */
export function pairwiseOverlapPass(
  bucket: Bucket,
  state: ReductionState,
  options: ResolvedReducerOptions
): { changed: boolean } {
  const { tolerance, logger } = options

  for (let i = 0; i < bucket.length; i++) {
    const first = bucket[i]
    if (state.removals.has(first.overallIndex)) continue

    for (let j = i + 1; j < bucket.length; j++) {
      const second = bucket[j]
      if (state.removals.has(second.overallIndex)) continue

      const line1 = state.arena[first.slot]
      const line2 = state.arena[second.slot]
      if (!areCollinear(line1, line2, tolerance)) continue

      const overlap = classifyOverlap(line1, line2, tolerance)
      if (overlap === 'first-contains-second') {
        markRemoved(state, second)
      } else if (overlap === 'second-contains-first') {
        markRemoved(state, first)
        break
      } else if (overlap === 'partial') {
        logger.log(`${LOG_PREFIX} Partial overlap of these lines:\n  ${describeSegment(line1)}\n  ${describeSegment(line2)}`)

        const merged = longestSpan(line1, line2)
        markRemoved(state, first)
        markUpdated(state, second, merged)

        logger.log(`${LOG_PREFIX}   -- merged into a single line: ${describeSegment(merged)}`)
        return { changed: true }
      }
    }
  }

  return { changed: false }
}

/**
 * Repeat pairwise passes until one makes no change. Every changed pass
 * retires one line, so a bucket of N lines settles within N passes.
 */
export function reduceBucket(
  key: string,
  bucket: Bucket,
  state: ReductionState,
  options: ResolvedReducerOptions
): BucketReduction {
  for (let pass = 1; pass <= options.maxPasses; pass++) {
    const { changed } = pairwiseOverlapPass(bucket, state, options)
    if (!changed) {
      return { ok: true, passes: pass }
    }
    options.logger.log(`${LOG_PREFIX} Re-running pairwise overlap check because of updated/merged line`)
  }

  return { ok: false, error: new ExceededMaxPassesError(key, options.maxPasses) }
}
