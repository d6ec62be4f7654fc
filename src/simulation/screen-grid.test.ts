import { buildScreenGrid, clip, linspace } from "./screen-grid";
import { SIN_THETA_LIMIT, DEFAULT_GRID_SIZE } from "../constants";

describe("clip", () => {
  it("limits values beyond the sin θ bounds", () => {
    expect(clip(1.5, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(0.99);
    expect(clip(0.995, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(0.99);
    expect(clip(-1.2, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(-0.99);
  });

  it("passes values inside the bounds through", () => {
    expect(clip(0.99, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(0.99);
    expect(clip(-0.5, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(-0.5);
    expect(clip(0, -SIN_THETA_LIMIT, SIN_THETA_LIMIT)).toBe(0);
  });
});

describe("linspace", () => {
  it("spans start to stop inclusive with even spacing", () => {
    expect(Array.from(linspace(-50000, 50000, 5))).toEqual([-50000, -25000, 0, 25000, 50000]);
  });

  it("pins the last element to stop", () => {
    const values = linspace(0, 0.3, 4);
    expect(values[3]).toBe(0.3);
    expect(values[1]).toBeCloseTo(0.1);
  });

  it("returns just the start for a single element", () => {
    expect(Array.from(linspace(2, 9, 1))).toEqual([2]);
  });
});

describe("buildScreenGrid", () => {
  const grid = buildScreenGrid(550, 100, 5);
  const idx = (i: number, j: number) => i * grid.size + j;

  it("converts wavelength to µm and screen distance to µm", () => {
    expect(grid.wavelengthUm).toBe(0.55);
    expect(grid.screenDistanceUm).toBe(100000);
    expect(grid.halfWidthUm).toBe(50000);
  });

  it("spans ±L/2 on both axes", () => {
    expect(Array.from(grid.axis)).toEqual([-50000, -25000, 0, 25000, 50000]);
    for (let i = 0; i < grid.x.length; i++) {
      expect(Math.abs(grid.x[i])).toBeLessThanOrEqual(50000);
      expect(Math.abs(grid.y[i])).toBeLessThanOrEqual(50000);
    }
  });

  it("takes x from the row and y from the column", () => {
    expect(grid.x[idx(0, 4)]).toBe(-50000);
    expect(grid.y[idx(0, 4)]).toBe(50000);
    expect(grid.x[idx(3, 1)]).toBe(25000);
    expect(grid.y[idx(3, 1)]).toBe(-25000);
  });

  it("has zero radius only at the centre cell", () => {
    for (let i = 0; i < 5; i++) {
      for (let j = 0; j < 5; j++) {
        if (i === 2 && j === 2) {
          expect(grid.radius[idx(i, j)]).toBe(0);
        } else {
          expect(grid.radius[idx(i, j)]).toBeGreaterThan(0);
        }
      }
    }
  });

  it("approximates sin θ as r / L", () => {
    expect(grid.sinTheta[idx(2, 2)]).toBe(0);
    expect(grid.sinTheta[idx(2, 4)]).toBe(0.5);
    expect(grid.sinTheta[idx(4, 4)]).toBeCloseTo(Math.SQRT1_2, 12);
  });

  it("keeps sin θ within [0, clip limit] across the screen", () => {
    const big = buildScreenGrid(400, 500, 41);
    for (let i = 0; i < big.sinTheta.length; i++) {
      expect(big.sinTheta[i]).toBeGreaterThanOrEqual(0);
      expect(big.sinTheta[i]).toBeLessThanOrEqual(SIN_THETA_LIMIT);
    }
  });

  it("is symmetric under swapping row and column", () => {
    const g = buildScreenGrid(632, 37, 8);
    for (let i = 0; i < g.size; i++) {
      for (let j = 0; j < g.size; j++) {
        expect(g.radius[i * g.size + j]).toBe(g.radius[j * g.size + i]);
      }
    }
  });

  it("uses the default grid size when none is given", () => {
    const g = buildScreenGrid(550, 100);
    expect(g.size).toBe(DEFAULT_GRID_SIZE);
    expect(g.sinTheta.length).toBe(DEFAULT_GRID_SIZE * DEFAULT_GRID_SIZE);
  });

  it("rejects grid sizes below 2 or non-integers", () => {
    expect(() => buildScreenGrid(550, 100, 1)).toThrow(RangeError);
    expect(() => buildScreenGrid(550, 100, 2.5)).toThrow(RangeError);
  });

  it("has no centre cell on an even grid", () => {
    const g = buildScreenGrid(550, 100, 4);
    for (let i = 0; i < g.radius.length; i++) {
      expect(g.radius[i]).toBeGreaterThan(0);
    }
  });
});
