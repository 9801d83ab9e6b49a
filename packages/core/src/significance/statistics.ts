/**
 * Statistical helpers: histogram entropy, least squares and the F distribution
 */

import type { LaggedPair } from './types.js';

/**
 * Overlap of a and b with b advanced by `lag` samples, so x[i] pairs with
 * the original b[i + lag]
 */
export function alignAtLag(a: Float64Array, b: Float64Array, lag: number): LaggedPair {
  const n = Math.min(a.length, b.length);
  const shift = Math.min(Math.abs(Math.trunc(lag)), n);
  if (lag >= 0) {
    return { x: a.subarray(0, n - shift), y: b.subarray(shift, n), lag };
  }
  return { x: a.subarray(shift, n), y: b.subarray(0, n - shift), lag };
}

// ===========================================
// Entropy
// ===========================================

export function histogramBins(length: number, maxBins: number): number {
  return Math.max(4, Math.min(maxBins, Math.floor(Math.cbrt(length))));
}

/** Equal-width bin index of every value over [min, max] */
export function quantize(x: Float64Array, bins: number): Uint16Array {
  let min = Infinity;
  let max = -Infinity;
  for (const v of x) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  const width = (max - min) / bins;
  return Uint16Array.from(x, (v) => (width === 0 ? 0 : Math.min(bins - 1, Math.floor((v - min) / width))));
}

/** Shannon entropy in bits of a list of symbols */
export function entropy(symbols: ArrayLike<number>): number {
  const counts = new Map<number, number>();
  for (let i = 0; i < symbols.length; i++) {
    const s = symbols[i] ?? 0;
    counts.set(s, (counts.get(s) ?? 0) + 1);
  }
  let h = 0;
  for (const count of counts.values()) {
    const p = count / symbols.length;
    h -= p * Math.log2(p);
  }
  return h;
}

// ===========================================
// Least squares
// ===========================================

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting. Returns null
 * when A is singular.
 */
export function solveLinear(matrix: number[][], rhs: number[]): number[] | null {
  const n = rhs.length;
  const m = matrix.map((row, i) => [...row, rhs[i] ?? 0]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r]?.[col] ?? 0) > Math.abs(m[pivot]?.[col] ?? 0)) pivot = r;
    }
    const pivotRow = m[pivot];
    const current = m[col];
    if (!pivotRow || !current || Math.abs(pivotRow[col] ?? 0) < 1e-12) return null;
    m[pivot] = current;
    m[col] = pivotRow;

    for (let r = col + 1; r < n; r++) {
      const row = m[r];
      if (!row) continue;
      const factor = (row[col] ?? 0) / (pivotRow[col] ?? 1);
      for (let c = col; c <= n; c++) row[c] = (row[c] ?? 0) - factor * (pivotRow[c] ?? 0);
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    const row = m[r];
    if (!row) return null;
    let sum = row[n] ?? 0;
    for (let c = r + 1; c < n; c++) sum -= (row[c] ?? 0) * (x[c] ?? 0);
    x[r] = sum / (row[r] ?? 1);
  }
  return x;
}

/**
 * Residual sum of squares of an ordinary least-squares fit with intercept.
 * `columns[j][t]` is regressor j at observation t.
 */
export function residualSumOfSquares(columns: Float64Array[], y: Float64Array): number | null {
  const k = columns.length + 1;
  const regressor = (j: number, t: number): number => (j === 0 ? 1 : columns[j - 1]?.[t] ?? 0);

  const xtx = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  const xty = new Array<number>(k).fill(0);
  for (let t = 0; t < y.length; t++) {
    for (let i = 0; i < k; i++) {
      const xi = regressor(i, t);
      xty[i] = (xty[i] ?? 0) + xi * (y[t] ?? 0);
      const row = xtx[i];
      if (!row) continue;
      for (let j = 0; j < k; j++) row[j] = (row[j] ?? 0) + xi * regressor(j, t);
    }
  }

  const beta = solveLinear(xtx, xty);
  if (!beta) return null;

  let rss = 0;
  for (let t = 0; t < y.length; t++) {
    let fitted = 0;
    for (let j = 0; j < k; j++) fitted += (beta[j] ?? 0) * regressor(j, t);
    rss += ((y[t] ?? 0) - fitted) ** 2;
  }
  return rss;
}

// ===========================================
// F distribution
// ===========================================

const LANCZOS = [
  676.5203681218851, -1259.1392167224028, 771.32342877765313, -176.61502916214059, 12.507343278686905,
  -0.13857109526572012, 9.9843695780195716e-6, 1.5056327351493116e-7,
];

export function logGamma(x: number): number {
  if (x < 0.5) {
    return Math.log(Math.PI / Math.abs(Math.sin(Math.PI * x))) - logGamma(1 - x);
  }
  const z = x - 1;
  let a = 0.99999999999980993;
  const t = z + 7.5;
  LANCZOS.forEach((c, i) => {
    a += c / (z + i + 1);
  });
  return 0.5 * Math.log(2 * Math.PI) + (z + 0.5) * Math.log(t) - t + Math.log(a);
}

function betaContinuedFraction(x: number, a: number, b: number): number {
  const maxIterations = 300;
  const epsilon = 3e-14;
  const tiny = 1e-300;

  let c = 1;
  let d = 1 - ((a + b) * x) / (a + 1);
  if (Math.abs(d) < tiny) d = tiny;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= maxIterations; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((a + m2 - 1) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (a + b + m) * x) / ((a + m2) * (a + m2 + 1));
    d = 1 + aa * d;
    if (Math.abs(d) < tiny) d = tiny;
    c = 1 + aa / c;
    if (Math.abs(c) < tiny) c = tiny;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < epsilon) break;
  }
  return h;
}

/**
 * Regularized incomplete beta function I_x(a, b)
 */
export function incompleteBeta(x: number, a: number, b: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(
    logGamma(a + b) - logGamma(a) - logGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  );
  return x < (a + 1) / (a + b + 2)
    ? (front * betaContinuedFraction(x, a, b)) / a
    : 1 - (front * betaContinuedFraction(1 - x, b, a)) / b;
}

/**
 * P(F > f) for an F(d1, d2) variable
 */
export function fSurvival(f: number, d1: number, d2: number): number {
  if (!(f > 0)) return 1;
  return incompleteBeta(d2 / (d2 + d1 * f), d2 / 2, d1 / 2);
}
