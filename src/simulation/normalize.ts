/**
 * Rescale a field in place by its own maximum, so the peak becomes exactly 1.
 *
 * Each pattern model calls this on its own values; fields are never scaled
 * against one another. A field whose maximum is not a positive finite number
 * is returned unchanged.
 */
export function normalizeByMax(values: Float64Array): Float64Array {
  let max = -Infinity;
  for (let i = 0; i < values.length; i++) {
    if (values[i] > max) max = values[i];
  }
  if (!(max > 0) || !Number.isFinite(max)) return values;

  for (let i = 0; i < values.length; i++) {
    values[i] /= max;
  }
  return values;
}
