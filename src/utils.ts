// Shared numeric helpers for the face metrics pipeline.

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Round a metric value to the specified number of decimal places. */
export function roundMetric(value: number, precision: number = 4): number {
  const factor = Math.pow(10, precision);
  return Math.round(value * factor) / factor;
}

/**
 * Arithmetic mean, computed as an offset from the first value so that a run
 * of identical inputs returns that input bit-for-bit. Returns 0 for an empty
 * list.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const base = values[0];
  let drift = 0;
  for (let i = 1; i < values.length; i++) {
    drift += values[i] - base;
  }
  return drift === 0 ? base : base + drift / values.length;
}

/** Linear blend: `weight` of `a` plus `1 - weight` of `b`. Equal inputs come back unchanged. */
export function blend(a: number, b: number, weight: number): number {
  return a === b ? a : b + (a - b) * weight;
}

export function sumsToOne(values: readonly number[], tolerance = 1e-9): boolean {
  const total = values.reduce((sum, v) => sum + v, 0);
  return Math.abs(total - 1) <= tolerance;
}

/** `value` when it is a finite number, otherwise `fallback`. */
export function finiteOr(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isFinite(value) ? value : fallback;
}
