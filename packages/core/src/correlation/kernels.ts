/**
 * Plaintext correlation kernels
 *
 * Every kernel removes the mean of both inputs and normalizes by the product
 * of their norms, so peak magnitudes compare across operations and lengths.
 */

import type { CorrelationOperation } from '@sensorlink/shared';
import { InsufficientDataError, ValidationError } from '@sensorlink/shared';
import {
  convolve,
  crossCorrelate,
  crossSpectrumMagnitude,
  hilbertEnvelope,
  nextPowerOfTwo,
  previousPowerOfTwo,
  welchCoherence,
} from './fft.js';
import { argMaxAbs, centered, clampUnit, dot, norm } from './signal-math.js';
import type { CustomOperation, KernelOutput } from './types.js';

export interface KernelOptions {
  sampleRateHz: number;
  maxLag: number;
  coherenceSegment: number;
  custom?: CustomOperation;
  checkpoint?: () => void;
}

const noop = (): void => undefined;

export function maxLagFor(length: number, fraction: number): number {
  return Math.max(0, Math.min(length - 1, Math.floor(length * fraction)));
}

function scale(values: Float64Array, divisor: number): Float64Array {
  return divisor === 0 ? new Float64Array(values.length) : values.map((v) => v / divisor);
}

export function crossCorrelationKernel(
  a: Float64Array,
  b: Float64Array,
  maxLag: number,
  checkpoint: () => void = noop
): KernelOutput {
  const ac = centered(a);
  const bc = centered(b);
  checkpoint();
  const raw = crossCorrelate(ac, bc, maxLag);
  checkpoint();

  const values = scale(raw, norm(ac) * norm(bc));
  const peak = argMaxAbs(values);
  return {
    output: { kind: 'lag', values, minLag: -maxLag },
    peakLag: peak - maxLag,
    peakMagnitude: clampUnit(Math.abs(values[peak] ?? 0)),
  };
}

export function convolutionKernel(a: Float64Array, b: Float64Array, checkpoint: () => void = noop): KernelOutput {
  const ac = centered(a);
  const bc = centered(b);
  checkpoint();
  const values = scale(convolve(ac, bc), norm(ac) * norm(bc));
  checkpoint();

  const peak = argMaxAbs(values);
  return {
    output: { kind: 'series', values },
    // offset from the centre of the full convolution
    peakLag: peak - (Math.min(a.length, b.length) - 1),
    peakMagnitude: clampUnit(Math.abs(values[peak] ?? 0)),
  };
}

export function multiplicationKernel(a: Float64Array, b: Float64Array): KernelOutput {
  const ac = centered(a);
  const bc = centered(b);
  const denominator = norm(ac) * norm(bc);
  const value = denominator === 0 ? 0 : dot(ac, bc) / denominator;
  return {
    output: { kind: 'scalar', value },
    peakLag: 0,
    peakMagnitude: clampUnit(Math.abs(value)),
  };
}

export function coherenceKernel(
  a: Float64Array,
  b: Float64Array,
  sampleRateHz: number,
  maxSegment: number,
  checkpoint: () => void = noop
): KernelOutput {
  const n = Math.min(a.length, b.length);
  const segment = Math.min(previousPowerOfTwo(maxSegment), previousPowerOfTwo(Math.floor(n / 2)));
  if (segment < 4) {
    throw new InsufficientDataError(`coherence needs at least 8 samples, got ${n}`);
  }

  const values = welchCoherence(centered(a), centered(b), segment);
  checkpoint();

  const binHz = sampleRateHz / segment;
  const peak = argMaxAbs(values, 1);
  return {
    output: { kind: 'frequency', values, binHz },
    peakLag: 0,
    peakMagnitude: clampUnit(values[peak] ?? 0),
    peakFrequencyHz: peak * binHz,
  };
}

export function envelopeKernel(
  a: Float64Array,
  b: Float64Array,
  maxLag: number,
  checkpoint: () => void = noop
): KernelOutput {
  const ea = hilbertEnvelope(centered(a));
  const eb = hilbertEnvelope(centered(b));
  checkpoint();
  return crossCorrelationKernel(ea, eb, maxLag, checkpoint);
}

export function spectralKernel(
  a: Float64Array,
  b: Float64Array,
  sampleRateHz: number,
  checkpoint: () => void = noop
): KernelOutput {
  const n = Math.min(a.length, b.length);
  const ac = centered(a);
  const bc = centered(b);
  const size = nextPowerOfTwo(n);
  const values = scale(crossSpectrumMagnitude(ac, bc, size), n * norm(ac) * norm(bc));
  checkpoint();

  const binHz = sampleRateHz / size;
  const peak = argMaxAbs(values, 1);
  return {
    output: { kind: 'frequency', values, binHz },
    peakLag: 0,
    peakMagnitude: clampUnit(values[peak] ?? 0),
    peakFrequencyHz: peak * binHz,
  };
}

export function customKernel(fn: CustomOperation, a: Float64Array, b: Float64Array): KernelOutput {
  const result = fn(a, b);
  if (typeof result === 'number') {
    return {
      output: { kind: 'scalar', value: result },
      peakLag: 0,
      peakMagnitude: clampUnit(Math.abs(result)),
    };
  }
  const peak = argMaxAbs(result);
  return {
    output: { kind: 'series', values: result },
    peakLag: peak,
    peakMagnitude: clampUnit(Math.abs(result[peak] ?? 0)),
  };
}

/**
 * Run any plaintext operation
 */
export function runKernel(
  operation: CorrelationOperation,
  a: Float64Array,
  b: Float64Array,
  options: KernelOptions
): KernelOutput {
  const checkpoint = options.checkpoint ?? noop;

  switch (operation) {
    case 'cross_correlation':
      return crossCorrelationKernel(a, b, options.maxLag, checkpoint);
    case 'convolution':
      return convolutionKernel(a, b, checkpoint);
    case 'multiplication':
      return multiplicationKernel(a, b);
    case 'coherence':
      return coherenceKernel(a, b, options.sampleRateHz, options.coherenceSegment, checkpoint);
    case 'hilbert_envelope':
      return envelopeKernel(a, b, options.maxLag, checkpoint);
    case 'spectral_transform':
      return spectralKernel(a, b, options.sampleRateHz, checkpoint);
    case 'custom':
      if (!options.custom) {
        throw new ValidationError('custom operation requires a callback');
      }
      return customKernel(options.custom, a, b);
  }
}
