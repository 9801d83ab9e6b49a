/**
 * Temporal stability: the correlation at the peak lag should hold across
 * consecutive windows of the observation
 */

import { pearson } from '../../correlation/signal-math.js';
import type { LaggedPair, TestOutcome } from '../types.js';

const MIN_WINDOW = 4;

export function windowCorrelations(pair: LaggedPair, windows: number): number[] {
  const size = Math.floor(pair.x.length / windows);
  if (size < MIN_WINDOW) return [];
  return Array.from({ length: windows }, (_, w) =>
    pearson(pair.x.subarray(w * size, (w + 1) * size), pair.y.subarray(w * size, (w + 1) * size))
  );
}

export function coefficientOfVariation(values: readonly number[]): number {
  if (values.length === 0) return Infinity;
  const m = values.reduce((s, v) => s + v, 0) / values.length;
  const sd = Math.sqrt(values.reduce((s, v) => s + (v - m) ** 2, 0) / values.length);
  return m === 0 ? Infinity : sd / Math.abs(m);
}

export function testTemporalStability(pair: LaggedPair, windows: number, maxCv: number): TestOutcome {
  const correlations = windowCorrelations(pair, windows);
  if (correlations.length === 0) {
    return {
      status: 'fail',
      value: Infinity,
      threshold: maxCv,
      detail: `fewer than ${MIN_WINDOW} samples per window`,
    };
  }

  const cv = coefficientOfVariation(correlations);
  return {
    status: cv < maxCv ? 'pass' : 'fail',
    value: cv,
    threshold: maxCv,
    detail: `window correlations ${correlations.map((r) => r.toFixed(2)).join(', ')}`,
  };
}
