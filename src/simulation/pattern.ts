import { singleSlitIntensity } from "./single-slit";
import { doubleSlitIntensity } from "./double-slit";
import type { IntensityField } from "./intensity-field";

export type PatternMode = "single-slit" | "double-slit";

export interface SingleSlitRequest {
  mode: "single-slit";
  wavelengthNm: number;
  slitWidthUm: number;
  screenDistanceMm: number;
  gridSize?: number;
}

export interface DoubleSlitRequest {
  mode: "double-slit";
  wavelengthNm: number;
  slitSeparationUm: number;
  screenDistanceMm: number;
  gridSize?: number;
}

export type PatternRequest = SingleSlitRequest | DoubleSlitRequest;

/** Computes the normalized intensity field for the requested pattern. */
export function computePattern(request: PatternRequest): IntensityField {
  switch (request.mode) {
    case "single-slit":
      return singleSlitIntensity(
        request.wavelengthNm, request.slitWidthUm, request.screenDistanceMm, request.gridSize);

    case "double-slit":
      return doubleSlitIntensity(
        request.wavelengthNm, request.slitSeparationUm, request.screenDistanceMm, request.gridSize);
  }
}
