// Reducer option defaults

import { REDUNDANT_LINES } from '../../constants'
import type { ReducerOptions, ResolvedReducerOptions } from './types'

export const LOG_PREFIX = '[remove-redundant-lines]'

export function resolveReducerOptions(options: ReducerOptions = {}): ResolvedReducerOptions {
  const resolved: ResolvedReducerOptions = {
    tolerance: options.tolerance ?? REDUNDANT_LINES.TOLERANCE,
    keyPrecision: options.keyPrecision ?? REDUNDANT_LINES.KEY_PRECISION,
    maxPasses: options.maxPasses ?? REDUNDANT_LINES.MAX_PASSES,
    logger: options.logger ?? console,
  }

  if (!Number.isFinite(resolved.tolerance) || resolved.tolerance <= 0) {
    throw new RangeError(`tolerance must be a positive number, got ${resolved.tolerance}`)
  }
  if (!Number.isInteger(resolved.keyPrecision) || resolved.keyPrecision < 0) {
    throw new RangeError(`keyPrecision must be a non-negative integer, got ${resolved.keyPrecision}`)
  }
  if (!Number.isInteger(resolved.maxPasses) || resolved.maxPasses < 1) {
    throw new RangeError(`maxPasses must be a positive integer, got ${resolved.maxPasses}`)
  }

  return resolved
}
