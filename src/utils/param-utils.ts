import type { ParamRange } from "../constants";

/** Clamp a raw control value into its recognized range. Non-numeric input falls back to the default. */
export function clampToRange(value: number, range: ParamRange): number {
  if (Number.isNaN(value)) return range.defaultValue;
  return Math.max(range.min, Math.min(range.max, value));
}

/** Number of decimals needed to display values on the range's step. */
export function stepDecimals(range: ParamRange): number {
  const text = String(range.step);
  const dot = text.indexOf(".");
  return dot < 0 ? 0 : text.length - dot - 1;
}

/** Format a value with its range's step precision and a unit suffix. */
export function formatParam(value: number, range: ParamRange, unit: string): string {
  return `${value.toFixed(stepDecimals(range))} ${unit}`;
}
