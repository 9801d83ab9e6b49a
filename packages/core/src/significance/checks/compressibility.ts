/**
 * Compressibility: shared structure lets the pair compress below the sum of
 * its parts. The second signal enters the mixed stream as its residual
 * after a least-squares fit on the first.
 */

import { deflateSync } from 'node:zlib';
import { centered, dot } from '../../correlation/signal-math.js';
import type { LaggedPair, TestOutcome } from '../types.js';

const LEVELS = 255;

interface Quantizer {
  min: number;
  step: number;
}

function quantizerFor(x: Float64Array): Quantizer {
  let min = Infinity;
  let max = -Infinity;
  for (const v of x) {
    if (v < min) min = v;
    if (v > max) max = v;
  }
  return { min, step: max > min ? (max - min) / LEVELS : 1 };
}

function toBytes(x: Float64Array, q: Quantizer): Uint8Array {
  return Uint8Array.from(x, (v) => Math.max(0, Math.min(LEVELS, Math.round((v - q.min) / q.step))));
}

export function compressedSize(bytes: Uint8Array): number {
  return deflateSync(bytes, { level: 9 }).length;
}

export function testCompressibility(pair: LaggedPair, ratio: number): TestOutcome {
  const { x, y } = pair;
  const qb = quantizerFor(y);
  const a = toBytes(x, quantizerFor(x));
  const b = toBytes(y, qb);

  const xc = centered(x);
  const yc = centered(y);
  const denominator = dot(xc, xc);
  const beta = denominator === 0 ? 0 : dot(xc, yc) / denominator;
  const residual = yc.map((v, i) => v - beta * (xc[i] ?? 0));

  // residual keeps b's step so a good fit collapses onto few levels
  let residualMin = Infinity;
  for (const v of residual) residualMin = Math.min(residualMin, v);
  const r = toBytes(residual, { min: residualMin, step: qb.step });

  const mixed = new Uint8Array(a.length + r.length);
  mixed.set(a);
  mixed.set(r, a.length);

  const separate = compressedSize(a) + compressedSize(b);
  const joint = compressedSize(mixed);
  const value = separate === 0 ? 1 : joint / separate;

  return {
    status: value < ratio ? 'pass' : 'fail',
    value,
    threshold: ratio,
    detail: `C(mixed)=${joint} C(a)+C(b)=${separate} beta=${beta.toFixed(3)}`,
  };
}
