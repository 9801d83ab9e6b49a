/**
 * Small vector helpers shared by the kernels and the significance tests
 */

export function mean(x: ArrayLike<number>): number {
  if (x.length === 0) return 0;
  let sum = 0;
  for (let i = 0; i < x.length; i++) sum += x[i] ?? 0;
  return sum / x.length;
}

export function centered(x: Float64Array): Float64Array {
  const m = mean(x);
  return x.map((v) => v - m);
}

export function norm(x: Float64Array): number {
  let sum = 0;
  for (const v of x) sum += v * v;
  return Math.sqrt(sum);
}

export function variance(x: Float64Array): number {
  if (x.length === 0) return 0;
  const m = mean(x);
  let sum = 0;
  for (const v of x) sum += (v - m) ** 2;
  return sum / x.length;
}

export function dot(a: Float64Array, b: Float64Array): number {
  const n = Math.min(a.length, b.length);
  let sum = 0;
  for (let i = 0; i < n; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
  return sum;
}

/**
 * Pearson correlation; 0 when either side is constant
 */
export function pearson(a: Float64Array, b: Float64Array): number {
  const ac = centered(a);
  const bc = centered(b);
  const denominator = norm(ac) * norm(bc);
  return denominator === 0 ? 0 : dot(ac, bc) / denominator;
}

/**
 * Index of the largest absolute value; the first one wins a tie
 */
export function argMaxAbs(values: Float64Array, from = 0): number {
  let best = from;
  for (let i = from + 1; i < values.length; i++) {
    if (Math.abs(values[i] ?? 0) > Math.abs(values[best] ?? 0)) best = i;
  }
  return best;
}

export function clampUnit(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Keep the last `count` samples */
export function tail(x: Float64Array, count: number): Float64Array {
  return x.length <= count ? x : x.subarray(x.length - count);
}
