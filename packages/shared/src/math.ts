/** Arithmetic mean; null for an empty input. */
export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let total = 0;
  for (const v of values) total += v;
  return total / values.length;
}

/**
 * Linearly interpolated quantile, q in [0, 1]; null for an empty input.
 * q = 0 and q = 1 are exactly the minimum and maximum.
 */
export function quantile(values: readonly number[], q: number): number | null {
  if (values.length === 0) return null;
  const sorted = values.toSorted((a, b) => a - b);
  const pos = (sorted.length - 1) * Math.min(1, Math.max(0, q));
  const lo = Math.floor(pos);
  const hi = Math.ceil(pos);
  const a = sorted[lo] ?? 0;
  const b = sorted[hi] ?? a;
  return a + (b - a) * (pos - lo);
}

export function median(values: readonly number[]): number | null {
  return quantile(values, 0.5);
}

export function roundTo(value: number, digits: number): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

/** Keeps only the present values of a nullable series. */
export function present(values: Iterable<number | null>): number[] {
  const out: number[] = [];
  for (const v of values) {
    if (v !== null) out.push(v);
  }
  return out;
}
