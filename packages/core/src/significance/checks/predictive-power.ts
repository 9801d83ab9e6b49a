/**
 * Predictive power: does one signal's history improve the prediction of the
 * other beyond its own history? Nested least-squares models per order and
 * direction, F-tested, Bonferroni-corrected over every test run.
 */

import { fSurvival, residualSumOfSquares } from '../statistics.js';
import type { TestOutcome } from '../types.js';

export interface GrangerOutcome {
  order: number;
  direction: 'a->b' | 'b->a';
  fStatistic: number;
  pValue: number;
}

function lagged(series: Float64Array, k: number, order: number): Float64Array {
  return series.subarray(order - k, series.length - k);
}

/**
 * F test of "x Granger-causes y" at one order
 */
export function grangerTest(x: Float64Array, y: Float64Array, order: number): { fStatistic: number; pValue: number } | null {
  const n = Math.min(x.length, y.length);
  const observations = n - order;
  const df2 = observations - 2 * order - 1;
  if (order < 1 || df2 < 1) return null;

  const target = y.subarray(order, n);
  const own = Array.from({ length: order }, (_, i) => lagged(y.subarray(0, n), i + 1, order));
  const cross = Array.from({ length: order }, (_, i) => lagged(x.subarray(0, n), i + 1, order));

  const restricted = residualSumOfSquares(own, target);
  const unrestricted = residualSumOfSquares([...own, ...cross], target);
  if (restricted === null || unrestricted === null) return null;

  const improvement = Math.max(0, restricted - unrestricted);
  if (unrestricted <= Number.EPSILON * restricted) {
    return improvement > 0 ? { fStatistic: Infinity, pValue: 0 } : { fStatistic: 0, pValue: 1 };
  }

  const fStatistic = improvement / order / (unrestricted / df2);
  return { fStatistic, pValue: fSurvival(fStatistic, order, df2) };
}

export function testPredictivePower(
  a: Float64Array,
  b: Float64Array,
  alpha: number,
  maxOrder: number
): TestOutcome {
  const outcomes: GrangerOutcome[] = [];
  for (let order = 1; order <= maxOrder; order++) {
    const forward = grangerTest(a, b, order);
    if (forward) outcomes.push({ order, direction: 'a->b', ...forward });
    const backward = grangerTest(b, a, order);
    if (backward) outcomes.push({ order, direction: 'b->a', ...backward });
  }

  const corrected = alpha / Math.max(1, 2 * maxOrder);
  const best = outcomes.reduce<GrangerOutcome | null>(
    (acc, o) => (acc === null || o.pValue < acc.pValue ? o : acc),
    null
  );

  if (!best) {
    return { status: 'fail', value: 1, threshold: corrected, detail: 'series too short for any lag order' };
  }
  return {
    status: best.pValue < corrected ? 'pass' : 'fail',
    value: best.pValue,
    threshold: corrected,
    detail: `best ${best.direction} at order ${best.order} (F=${best.fStatistic.toFixed(2)})`,
  };
}
