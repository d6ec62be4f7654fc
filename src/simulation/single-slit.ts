import { DEFAULT_GRID_SIZE } from "../constants";
import { buildScreenGrid } from "./screen-grid";
import { IntensityField } from "./intensity-field";
import { normalizeByMax } from "./normalize";

/**
 * Fraunhofer single-slit diffraction intensity, normalized to a peak of 1.
 *
 * I = (sin β / β)²,  β = π · a · sin θ / λ
 *
 * Cells with β = 0 (the optical axis) take the analytic limit 1 instead of
 * evaluating 0/0.
 */
export function singleSlitIntensity(
  wavelengthNm: number,
  slitWidthUm: number,
  screenDistanceMm: number,
  gridSize: number = DEFAULT_GRID_SIZE,
): IntensityField {
  const { size, sinTheta, wavelengthUm } = buildScreenGrid(wavelengthNm, screenDistanceMm, gridSize);
  const field = new IntensityField(size);
  const values = field.values;

  for (let i = 0; i < values.length; i++) {
    const beta = Math.PI * slitWidthUm * sinTheta[i] / wavelengthUm;
    if (beta === 0) {
      values[i] = 1;
    } else {
      const sinc = Math.sin(beta) / beta;
      values[i] = sinc * sinc;
    }
  }

  normalizeByMax(values);
  return field;
}
