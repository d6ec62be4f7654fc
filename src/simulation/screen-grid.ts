import {
  DEFAULT_GRID_SIZE, MIN_GRID_SIZE, NM_PER_UM, UM_PER_MM, SCREEN_HALF_WIDTH_RATIO, SIN_THETA_LIMIT,
} from "../constants";

/**
 * Observation-screen geometry shared by both pattern models. All lengths are
 * in micrometres, so slit dimensions (given in µm) combine with it directly.
 *
 * The N×N arrays are row-major: x[i, j] = axis[i], y[i, j] = axis[j].
 */
export interface ScreenGrid {
  readonly size: number;
  readonly wavelengthUm: number;
  readonly screenDistanceUm: number;
  readonly halfWidthUm: number;
  readonly axis: Float64Array;
  readonly x: Float64Array;
  readonly y: Float64Array;
  readonly radius: Float64Array;
  readonly sinTheta: Float64Array;
}

/**
 * `num` evenly spaced values from `start` to `stop` inclusive.
 * Element k is k * step + start; the last element is pinned to `stop`.
 */
export function linspace(start: number, stop: number, num: number): Float64Array {
  const out = new Float64Array(num);
  if (num === 0) return out;
  if (num === 1) {
    out[0] = start;
    return out;
  }
  const step = (stop - start) / (num - 1);
  for (let k = 0; k < num; k++) {
    out[k] = k * step + start;
  }
  out[num - 1] = stop;
  return out;
}

/** Limit value to [lo, hi]. */
export function clip(value: number, lo: number, hi: number): number {
  return value < lo ? lo : value > hi ? hi : value;
}

/**
 * Build the screen grid for the given wavelength and screen distance.
 *
 * The screen spans ±L/2 on both axes. Each cell carries its radial distance
 * r from the optical axis, and sin θ is approximated by r / L, clipped to
 * ±SIN_THETA_LIMIT. Using r rather than a single slit-axis coordinate turns
 * the fringes into concentric rings; this matches the reference visuals.
 *
 * Wavelength and screen distance are assumed positive and finite.
 *
 * @throws RangeError if gridSize is not an integer of at least 2
 */
export function buildScreenGrid(
  wavelengthNm: number,
  screenDistanceMm: number,
  gridSize: number = DEFAULT_GRID_SIZE,
): ScreenGrid {
  if (!Number.isInteger(gridSize) || gridSize < MIN_GRID_SIZE) {
    throw new RangeError(`Grid size must be an integer >= ${MIN_GRID_SIZE}, got ${gridSize}`);
  }

  const wavelengthUm = wavelengthNm / NM_PER_UM;
  const screenDistanceUm = screenDistanceMm * UM_PER_MM;
  const halfWidthUm = SCREEN_HALF_WIDTH_RATIO * screenDistanceUm;
  const axis = linspace(-halfWidthUm, halfWidthUm, gridSize);

  const cells = gridSize * gridSize;
  const x = new Float64Array(cells);
  const y = new Float64Array(cells);
  const radius = new Float64Array(cells);
  const sinTheta = new Float64Array(cells);

  for (let i = 0; i < gridSize; i++) {
    const xi = axis[i];
    const rowIdx = i * gridSize;
    for (let j = 0; j < gridSize; j++) {
      const idx = rowIdx + j;
      const yj = axis[j];
      x[idx] = xi;
      y[idx] = yj;
      const r = Math.sqrt(xi * xi + yj * yj);
      radius[idx] = r;
      sinTheta[idx] = clip(r / screenDistanceUm, -SIN_THETA_LIMIT, SIN_THETA_LIMIT);
    }
  }

  return { size: gridSize, wavelengthUm, screenDistanceUm, halfWidthUm, axis, x, y, radius, sinTheta };
}
