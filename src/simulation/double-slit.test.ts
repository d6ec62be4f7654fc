import { doubleSlitIntensity } from "./double-slit";
import { fringeSpacing } from "../utils/field-utils";

const VALID_PARAMS: [number, number, number][] = [
  [400, 1, 10],
  [550, 10, 100],
  [700, 20, 500],
  [610, 7.5, 320],
];

describe("doubleSlitIntensity", () => {
  it("is exactly 1 at the centre cell", () => {
    for (const [lambda, d, L] of VALID_PARAMS) {
      const field = doubleSlitIntensity(lambda, d, L, 21);
      expect(field.get(10, 10)).toBe(1);
    }
  });

  it("peaks at 1 and stays finite within [0, 1]", () => {
    for (const [lambda, d, L] of VALID_PARAMS) {
      for (const n of [20, 21]) {
        const field = doubleSlitIntensity(lambda, d, L, n);
        expect(Math.abs(field.max() - 1)).toBeLessThan(1e-9);
        for (let i = 0; i < field.values.length; i++) {
          const v = field.values[i];
          expect(Number.isNaN(v)).toBe(false);
          expect(v).toBeGreaterThanOrEqual(0);
          expect(v).toBeLessThanOrEqual(1);
        }
      }
    }
  });

  it("follows cos²(π d sin θ / λ)", () => {
    const field = doubleSlitIntensity(550, 10, 100, 5);
    // Cell (2, 3) sits at r = L/4, so sin θ = 0.25
    const phase = Math.PI * 10 * 0.25 / 0.55;
    expect(field.get(2, 3)).toBeCloseTo(Math.cos(phase) ** 2, 12);
    expect(field.get(2, 3)).toBeCloseTo(0.0202535, 6);
    expect(field.get(2, 4)).toBeCloseTo(0.9206268, 6);
  });

  it("is deterministic for repeated calls with identical parameters", () => {
    const a = doubleSlitIntensity(550, 10.0, 100, 5);
    const b = doubleSlitIntensity(550, 10.0, 100, 5);
    expect(a.get(2, 2)).toBe(1);
    expect(Array.from(a.values)).toEqual(Array.from(b.values));
    expect(a.values).not.toBe(b.values);
  });

  it("is symmetric under swapping row and column", () => {
    const field = doubleSlitIntensity(450, 12, 60, 16);
    for (let i = 0; i < field.size; i++) {
      for (let j = 0; j < field.size; j++) {
        expect(field.get(i, j)).toBe(field.get(j, i));
      }
    }
  });

  it("spreads the fringes apart as the slits move closer", () => {
    // Period in sin θ is λ / d; the centre row advances 0.005 in sin θ per cell
    expect(fringeSpacing(doubleSlitIntensity(550, 20, 100, 201))).toBeCloseTo(5.5);
    expect(fringeSpacing(doubleSlitIntensity(550, 10, 100, 201))).toBeCloseTo(11);
    expect(fringeSpacing(doubleSlitIntensity(550, 5, 100, 201))).toBeCloseTo(22);
  });
});
