import type { IField } from "../types/field-types";

type ChannelStops = [number, number][];

/**
 * "Hot" color scale: black → red → yellow → white.
 * Each channel is piecewise linear between its (position, level) stops.
 */
const HOT_RED: ChannelStops = [[0, 0.0416], [0.365079, 1], [1, 1]];
const HOT_GREEN: ChannelStops = [[0, 0], [0.365079, 0], [0.746032, 1], [1, 1]];
const HOT_BLUE: ChannelStops = [[0, 0], [0.746032, 0], [1, 1]];

function channelLevel(stops: ChannelStops, frac: number): number {
  // Find the two surrounding stops
  let lo = stops[0];
  let hi = stops[stops.length - 1];
  for (let i = 1; i < stops.length; i++) {
    if (frac <= stops[i][0]) {
      lo = stops[i - 1];
      hi = stops[i];
      break;
    }
  }
  const span = hi[0] - lo[0];
  const s = span > 0 ? (frac - lo[0]) / span : 0;
  return Math.round(255 * (lo[1] + s * (hi[1] - lo[1])));
}

/** Maps a normalized intensity in [0, 1] to a 0xRRGGBB color on the hot scale. */
export function hotToColor(intensity: number): number {
  const frac = Math.max(0, Math.min(1, intensity));
  const r = channelLevel(HOT_RED, frac);
  const g = channelLevel(HOT_GREEN, frac);
  const b = channelLevel(HOT_BLUE, frac);
  return r * 65536 + g * 256 + b;
}

/** Convert a 0xRRGGBB integer to [r, g, b] in 0..255. */
export function intToRGB(c: number): [number, number, number] {
  // eslint-disable-next-line no-bitwise
  return [(c >> 16) & 0xff, (c >> 8) & 0xff, c & 0xff];
}

/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function hexColor(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}

/**
 * Write the field into an RGBA byte buffer of size² pixels.
 * The first field row is drawn at the bottom, so the image origin sits at the lower left.
 */
export function fieldToRGBA(field: IField, pixels: Uint8Array): void {
  const { size, values } = field;
  if (pixels.length < size * size * 4) {
    throw new RangeError(`Pixel buffer holds ${pixels.length} bytes, need ${size * size * 4}`);
  }
  for (let r = 0; r < size; r++) {
    const displayRow = size - 1 - r;
    for (let c = 0; c < size; c++) {
      const [red, green, blue] = intToRGB(hotToColor(values[r * size + c]));
      const p = (displayRow * size + c) * 4;
      pixels[p] = red;
      pixels[p + 1] = green;
      pixels[p + 2] = blue;
      pixels[p + 3] = 255;
    }
  }
}
