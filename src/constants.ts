// ── Units ──

/** Nanometres per micrometre. Wavelengths arrive in nm and are computed in µm. */
export const NM_PER_UM = 1000;

/** Micrometres per millimetre. Screen distances arrive in mm and are computed in µm. */
export const UM_PER_MM = 1000;

// ── Grid ──

/** Default number of cells along each side of the observation screen grid. */
export const DEFAULT_GRID_SIZE = 500;

/** Smallest grid that still spans the screen with two distinct coordinates. */
export const MIN_GRID_SIZE = 2;

/** Screen half-width as a fraction of the slit-to-screen distance. */
export const SCREEN_HALF_WIDTH_RATIO = 0.5;

/** Bound on |sin θ| from the small-angle proxy r / L. */
export const SIN_THETA_LIMIT = 0.99;

/** Grid resolutions offered by the resolution selector. */
export const GRID_SIZE_OPTIONS = [101, 251, DEFAULT_GRID_SIZE];

// ── Parameters ──

export interface ParamRange {
  min: number;
  max: number;
  step: number;
  defaultValue: number;
}

/** Visible spectrum, in nm. */
export const WAVELENGTH_RANGE: ParamRange = { min: 400, max: 700, step: 10, defaultValue: 550 };

/** Single-slit width a, in µm. */
export const SLIT_WIDTH_RANGE: ParamRange = { min: 0.5, max: 10, step: 0.5, defaultValue: 5 };

/** Double-slit centre-to-centre separation d, in µm. */
export const SLIT_SEPARATION_RANGE: ParamRange = { min: 1, max: 20, step: 0.5, defaultValue: 10 };

/** Slit-to-screen distance L, in mm. */
export const SCREEN_DISTANCE_RANGE: ParamRange = { min: 10, max: 500, step: 10, defaultValue: 100 };

// ── Analysis ──

/** Intensity level that bounds the central maximum when measuring its half-width. */
export const HALF_MAXIMUM = 0.5;

// ── Rendering ──

/** Page and canvas background (dark theme). */
export const BACKGROUND_COLOR = 0x0e1117;

/** Left margin in pixels, reserving space for the vertical axis labels. */
export const LEFT_MARGIN = 48;

/** Right margin in pixels, reserving space for the color scale. */
export const RIGHT_MARGIN = 72;

/** Bottom margin in pixels, reserving space for the horizontal axis labels. */
export const BOTTOM_MARGIN = 40;

/** Tick positions on both axes, in normalized screen units. */
export const AXIS_TICKS = [-1, -0.5, 0, 0.5, 1];

/** Number of gradient stops for the color scale bar. */
export const COLOR_SCALE_STOPS = 50;
