import { DEFAULT_GRID_SIZE } from "../constants";
import { buildScreenGrid } from "./screen-grid";
import { IntensityField } from "./intensity-field";
import { normalizeByMax } from "./normalize";

/**
 * Two-beam interference intensity, normalized to a peak of 1.
 *
 * I = cos²(π · d · sin θ / λ)
 */
export function doubleSlitIntensity(
  wavelengthNm: number,
  slitSeparationUm: number,
  screenDistanceMm: number,
  gridSize: number = DEFAULT_GRID_SIZE,
): IntensityField {
  const { size, sinTheta, wavelengthUm } = buildScreenGrid(wavelengthNm, screenDistanceMm, gridSize);
  const field = new IntensityField(size);
  const values = field.values;

  for (let i = 0; i < values.length; i++) {
    const phaseDiff = Math.PI * slitSeparationUm * sinTheta[i] / wavelengthUm;
    const c = Math.cos(phaseDiff);
    values[i] = c * c;
  }

  normalizeByMax(values);
  return field;
}
