/**
 * Information gain: plug-in mutual information from equal-width histograms
 */

import { entropy, histogramBins, quantize } from '../statistics.js';
import type { LaggedPair, TestOutcome } from '../types.js';

export function testInformationGain(pair: LaggedPair, ratio: number, maxBins: number): TestOutcome {
  const bins = histogramBins(pair.x.length, maxBins);
  const qa = quantize(pair.x, bins);
  const qb = quantize(pair.y, bins);
  const joint = Uint32Array.from(qa, (a, i) => a * bins + (qb[i] ?? 0));

  const ha = entropy(qa);
  const hb = entropy(qb);
  const gain = ha + hb - entropy(joint);
  const reference = Math.max(ha, hb);
  const value = reference === 0 ? 0 : gain / reference;

  return {
    status: value > ratio ? 'pass' : 'fail',
    value,
    threshold: ratio,
    detail: `H(a)=${ha.toFixed(3)} H(b)=${hb.toFixed(3)} gain=${gain.toFixed(3)} bits over ${bins} bins`,
  };
}
