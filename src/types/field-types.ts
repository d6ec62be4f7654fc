/**
 * Read-only view of an N×N intensity field, stored row-major.
 * Used by rendering and utility code that reads a computed pattern without modifying it.
 */
export interface IField {
  readonly size: number;
  readonly values: Float64Array;
  max(): number;
}

/** Measured features of a computed pattern, in micrometres on the screen. */
export interface PatternSummary {
  peakIntensity: number;
  /** Distance from the centre at which intensity first falls to half maximum, or null. */
  centralHalfWidthUm: number | null;
  /** Mean distance between neighbouring bright fringes, or null. */
  fringeSpacingUm: number | null;
}
