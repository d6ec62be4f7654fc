import type { IField } from "../types/field-types";

/**
 * Square intensity field on the observation screen.
 *
 * values[i * size + j] holds the intensity of cell (i, j). Row i runs along
 * the first screen axis, column j along the second; both are centred on the
 * optical axis.
 */
export class IntensityField implements IField {
  readonly size: number;
  readonly values: Float64Array;

  constructor(size: number) {
    this.size = size;
    this.values = new Float64Array(size * size);
  }

  idx(row: number, col: number): number {
    return row * this.size + col;
  }

  get(row: number, col: number): number {
    return this.values[this.idx(row, col)];
  }

  max(): number {
    let max = -Infinity;
    for (let i = 0; i < this.values.length; i++) {
      if (this.values[i] > max) max = this.values[i];
    }
    return max;
  }

  /** Nested row-major copy, for consumers that want a plain 2D array. */
  toRows(): number[][] {
    const rows: number[][] = [];
    for (let r = 0; r < this.size; r++) {
      const start = r * this.size;
      rows.push(Array.from(this.values.subarray(start, start + this.size)));
    }
    return rows;
  }
}
