import { HALF_MAXIMUM, UM_PER_MM } from "../constants";
import type { IField, PatternSummary } from "../types/field-types";
import type { PatternRequest } from "../simulation/pattern";

/** Index of the centre row/column. For odd sizes this cell sits on the optical axis. */
export function centerIndex(size: number): number {
  return Math.floor(size / 2);
}

/** Screen distance between neighbouring cell centres, in µm. */
export function cellSpacingUm(screenDistanceMm: number, gridSize: number): number {
  return screenDistanceMm * UM_PER_MM / (gridSize - 1);
}

/** Intensities along the centre row, from the centre cell outward. */
export function radialProfile(field: IField): Float64Array {
  const { size, values } = field;
  const c = centerIndex(size);
  const start = c * size + c;
  return values.slice(start, (c + 1) * size);
}

/**
 * Offset in cells from the centre at which the profile first drops to half
 * maximum or below. Returns null if it never does within the screen.
 */
export function centralMaximumHalfWidth(field: IField): number | null {
  const profile = radialProfile(field);
  for (let k = 0; k < profile.length; k++) {
    if (profile[k] <= HALF_MAXIMUM) return k;
  }
  return null;
}

/** Offsets of local maxima along the radial profile. The centre counts when it is not below its neighbour. */
export function profileMaxima(profile: Float64Array): number[] {
  const maxima: number[] = [];
  if (profile.length === 0) return maxima;
  if (profile.length === 1 || profile[0] >= profile[1]) maxima.push(0);
  for (let k = 1; k < profile.length - 1; k++) {
    if (profile[k] >= profile[k - 1] && profile[k] > profile[k + 1]) {
      maxima.push(k);
    }
  }
  return maxima;
}

/**
 * Mean offset in cells between consecutive bright fringes along the radial
 * profile. Returns null when fewer than two maxima are on the screen.
 */
export function fringeSpacing(field: IField): number | null {
  const maxima = profileMaxima(radialProfile(field));
  if (maxima.length < 2) return null;
  return (maxima[maxima.length - 1] - maxima[0]) / (maxima.length - 1);
}

/** Measure the features the settings panel reports for the given request's field. */
export function summarizePattern(request: PatternRequest, field: IField): PatternSummary {
  const spacing = cellSpacingUm(request.screenDistanceMm, field.size);

  const halfWidth = request.mode === "single-slit" ? centralMaximumHalfWidth(field) : null;
  const fringes = request.mode === "double-slit" ? fringeSpacing(field) : null;

  return {
    peakIntensity: field.max(),
    centralHalfWidthUm: halfWidth === null ? null : halfWidth * spacing,
    fringeSpacingUm: fringes === null ? null : fringes * spacing,
  };
}
