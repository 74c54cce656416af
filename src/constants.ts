/**
 * Application-wide constants
 * Centralizes tolerances, pass limits and presentation attributes
 */

// ============================================================================
// Redundant Line Removal
// ============================================================================

export const REDUNDANT_LINES = {
  /** Coordinates, slopes and intercepts closer than this are treated as equal */
  TOLERANCE: 0.001,
  /** Decimal digits kept when bucketing by slope/intercept */
  KEY_PRECISION: 3,
  /** Pairwise overlap passes allowed per bucket before giving up */
  MAX_PASSES: 20,
} as const

// ============================================================================
// Path Data
// ============================================================================

export const PATH_DATA = {
  /** Polyline steps used to measure curves and arcs */
  CURVE_SAMPLES: 64,
  /** Decimal places written when serializing coordinates */
  DECIMALS: 6,
} as const

// ============================================================================
// Presentation Attributes
// ============================================================================

export type PathAttributes = Readonly<Record<string, string>>

export const LASER_STYLES = {
  /** Thin blue hairline, read by the laser driver as a cut */
  CUT: {
    'fill': 'none',
    'stroke': '#0000ff',
    'stroke-width': '0.1',
  },
  /** Solid black fill, read as a raster etch */
  ETCH: {
    'fill': '#000000',
    'stroke': 'none',
  },
  /** Black outline for composite raster previews */
  RASTER: {
    'fill': 'none',
    'stroke': '#000000',
    'stroke-width': '0.2',
  },
} as const satisfies Record<string, PathAttributes>

export const HIGHLIGHT = {
  REMOVED_COLOR: '#ff0000',
  MERGED_COLOR: '#00ff00',
  STROKE_WIDTH: '1',
  STROKE_OPACITY: '.45',
} as const

/** Units written into width/height after documents are combined */
export const DIMENSION_UNIT = 'mm'
