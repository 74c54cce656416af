// Convert path primitives back to SVG path data

import type { Point } from '../geometry'
import { pointsEqual } from '../geometry'
import type { PathPrimitive } from './types'
import { PATH_DATA } from '../../constants'

export function formatNumber(value: number): string {
  return String(Number(value.toFixed(PATH_DATA.DECIMALS)))
}

function formatPoint(point: Point): string {
  return `${formatNumber(point.x)},${formatNumber(point.y)}`
}

/**
 * Serialize primitives to a d attribute using absolute commands.
 * A drawn primitive that does not begin at the current pen position
 * (because something before it was dropped) gets its own move first.
 * Z returns to the last written M, so a close aiming anywhere else is
 * written as a line.
 */
export function serializePathData(primitives: PathPrimitive[]): string {
  const parts: string[] = []
  let current: Point | null = null
  let subpathStart: Point | null = null

  for (const primitive of primitives) {
    if (primitive.type !== 'move' && (current === null || !pointsEqual(current, primitive.start))) {
      parts.push(`M ${formatPoint(primitive.start)}`)
      subpathStart = primitive.start
    }

    switch (primitive.type) {
      case 'move':
        parts.push(`M ${formatPoint(primitive.end)}`)
        subpathStart = primitive.end
        break
      case 'line':
        parts.push(`L ${formatPoint(primitive.end)}`)
        break
      case 'cubic':
        parts.push(`C ${formatPoint(primitive.control1)} ${formatPoint(primitive.control2)} ${formatPoint(primitive.end)}`)
        break
      case 'quadratic':
        parts.push(`Q ${formatPoint(primitive.control)} ${formatPoint(primitive.end)}`)
        break
      case 'arc': {
        const flags = `${primitive.largeArc ? 1 : 0},${primitive.sweep ? 1 : 0}`
        parts.push(`A ${formatPoint(primitive.radius)} ${formatNumber(primitive.rotation)} ${flags} ${formatPoint(primitive.end)}`)
        break
      }
      case 'close':
        if (subpathStart !== null && pointsEqual(subpathStart, primitive.end)) {
          parts.push('Z')
        } else {
          parts.push(`L ${formatPoint(primitive.end)}`)
        }
        break
    }

    current = primitive.end
  }

  return parts.join(' ')
}
