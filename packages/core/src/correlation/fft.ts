/**
 * Radix-2 FFT and the spectral kernels built on it
 */

export interface Complex {
  re: Float64Array;
  im: Float64Array;
}

export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

export function previousPowerOfTwo(n: number): number {
  let p = 1;
  while (p * 2 <= n) p *= 2;
  return p;
}

/**
 * In-place iterative FFT. The inverse is scaled by 1/n.
 */
export function fftInPlace(re: Float64Array, im: Float64Array, inverse = false): void {
  const n = re.length;
  if (n !== im.length || n === 0 || (n & (n - 1)) !== 0) {
    throw new RangeError(`FFT length must be a power of two, got ${n}`);
  }

  for (let i = 1, j = 0; i < n; i++) {
    let bit = n >> 1;
    for (; j & bit; bit >>= 1) j ^= bit;
    j ^= bit;
    if (i < j) {
      [re[i], re[j]] = [re[j] ?? 0, re[i] ?? 0];
      [im[i], im[j]] = [im[j] ?? 0, im[i] ?? 0];
    }
  }

  const sign = inverse ? 1 : -1;
  const cos = new Float64Array(n / 2);
  const sin = new Float64Array(n / 2);
  for (let k = 0; k < n / 2; k++) {
    cos[k] = Math.cos((2 * Math.PI * k) / n);
    sin[k] = sign * Math.sin((2 * Math.PI * k) / n);
  }

  for (let len = 2; len <= n; len *= 2) {
    const half = len / 2;
    const stride = n / len;
    for (let start = 0; start < n; start += len) {
      for (let k = 0; k < half; k++) {
        const wr = cos[k * stride] ?? 1;
        const wi = sin[k * stride] ?? 0;
        const p = start + k;
        const q = p + half;
        const xr = re[q] ?? 0;
        const xi = im[q] ?? 0;
        const vr = xr * wr - xi * wi;
        const vi = xr * wi + xi * wr;
        const ur = re[p] ?? 0;
        const ui = im[p] ?? 0;
        re[p] = ur + vr;
        im[p] = ui + vi;
        re[q] = ur - vr;
        im[q] = ui - vi;
      }
    }
  }

  if (inverse) {
    for (let i = 0; i < n; i++) {
      re[i] = (re[i] ?? 0) / n;
      im[i] = (im[i] ?? 0) / n;
    }
  }
}

/** Forward transform of a real signal zero-padded to `size` */
export function fftReal(x: Float64Array, size: number): Complex {
  const re = new Float64Array(size);
  const im = new Float64Array(size);
  re.set(x.subarray(0, Math.min(x.length, size)));
  fftInPlace(re, im);
  return { re, im };
}

/**
 * r[k] = sum_i a[i]·b[i+k] for k in [-maxLag, maxLag], through conj(A)·B.
 * Index maxLag + k of the result holds r[k].
 */
export function crossCorrelate(a: Float64Array, b: Float64Array, maxLag: number): Float64Array {
  const size = nextPowerOfTwo(a.length + b.length - 1);
  const A = fftReal(a, size);
  const B = fftReal(b, size);

  const re = new Float64Array(size);
  const im = new Float64Array(size);
  for (let f = 0; f < size; f++) {
    const ar = A.re[f] ?? 0;
    const ai = A.im[f] ?? 0;
    const br = B.re[f] ?? 0;
    const bi = B.im[f] ?? 0;
    re[f] = ar * br + ai * bi;
    im[f] = ar * bi - ai * br;
  }
  fftInPlace(re, im, true);

  const out = new Float64Array(2 * maxLag + 1);
  for (let k = -maxLag; k <= maxLag; k++) {
    out[maxLag + k] = k >= 0 ? re[k] ?? 0 : re[size + k] ?? 0;
  }
  return out;
}

/** Full linear convolution, length a.length + b.length - 1 */
export function convolve(a: Float64Array, b: Float64Array): Float64Array {
  const length = a.length + b.length - 1;
  const size = nextPowerOfTwo(length);
  const A = fftReal(a, size);
  const B = fftReal(b, size);

  const re = new Float64Array(size);
  const im = new Float64Array(size);
  for (let f = 0; f < size; f++) {
    const ar = A.re[f] ?? 0;
    const ai = A.im[f] ?? 0;
    const br = B.re[f] ?? 0;
    const bi = B.im[f] ?? 0;
    re[f] = ar * br - ai * bi;
    im[f] = ar * bi + ai * br;
  }
  fftInPlace(re, im, true);
  return re.slice(0, length);
}

/**
 * Magnitude of the analytic signal
 */
export function hilbertEnvelope(x: Float64Array): Float64Array {
  const size = nextPowerOfTwo(x.length);
  const { re, im } = fftReal(x, size);

  for (let f = 1; f < size; f++) {
    const gain = f < size / 2 ? 2 : f === size / 2 ? 1 : 0;
    re[f] = (re[f] ?? 0) * gain;
    im[f] = (im[f] ?? 0) * gain;
  }
  fftInPlace(re, im, true);

  const envelope = new Float64Array(x.length);
  for (let i = 0; i < x.length; i++) {
    envelope[i] = Math.hypot(re[i] ?? 0, im[i] ?? 0);
  }
  return envelope;
}

export function hannWindow(length: number): Float64Array {
  const w = new Float64Array(length);
  if (length === 1) {
    w[0] = 1;
    return w;
  }
  for (let i = 0; i < length; i++) {
    w[i] = 0.5 - 0.5 * Math.cos((2 * Math.PI * i) / (length - 1));
  }
  return w;
}

/**
 * Welch magnitude-squared coherence for bins 0..segment/2, Hann window with
 * 50% overlap. Bins where either auto-spectrum vanishes read 0.
 */
export function welchCoherence(a: Float64Array, b: Float64Array, segment: number): Float64Array {
  const bins = segment / 2 + 1;
  const hop = segment / 2;
  const window = hannWindow(segment);

  const pxx = new Float64Array(bins);
  const pyy = new Float64Array(bins);
  const pxyRe = new Float64Array(bins);
  const pxyIm = new Float64Array(bins);
  const length = Math.min(a.length, b.length);

  for (let start = 0; start + segment <= length; start += hop) {
    const xs = new Float64Array(segment);
    const ys = new Float64Array(segment);
    for (let i = 0; i < segment; i++) {
      const w = window[i] ?? 0;
      xs[i] = (a[start + i] ?? 0) * w;
      ys[i] = (b[start + i] ?? 0) * w;
    }
    const X = fftReal(xs, segment);
    const Y = fftReal(ys, segment);

    for (let f = 0; f < bins; f++) {
      const xr = X.re[f] ?? 0;
      const xi = X.im[f] ?? 0;
      const yr = Y.re[f] ?? 0;
      const yi = Y.im[f] ?? 0;
      pxx[f] = (pxx[f] ?? 0) + xr * xr + xi * xi;
      pyy[f] = (pyy[f] ?? 0) + yr * yr + yi * yi;
      pxyRe[f] = (pxyRe[f] ?? 0) + xr * yr + xi * yi;
      pxyIm[f] = (pxyIm[f] ?? 0) + xr * yi - xi * yr;
    }
  }

  const coherence = new Float64Array(bins);
  for (let f = 0; f < bins; f++) {
    const denominator = (pxx[f] ?? 0) * (pyy[f] ?? 0);
    if (denominator <= Number.EPSILON) continue;
    const cross = (pxyRe[f] ?? 0) ** 2 + (pxyIm[f] ?? 0) ** 2;
    coherence[f] = Math.min(1, cross / denominator);
  }
  return coherence;
}

/**
 * |A(f)|·|B(f)| for bins 0..size/2 of the zero-padded transforms
 */
export function crossSpectrumMagnitude(a: Float64Array, b: Float64Array, size: number): Float64Array {
  const A = fftReal(a, size);
  const B = fftReal(b, size);
  const out = new Float64Array(size / 2 + 1);
  for (let f = 0; f < out.length; f++) {
    out[f] = Math.hypot(A.re[f] ?? 0, A.im[f] ?? 0) * Math.hypot(B.re[f] ?? 0, B.im[f] ?? 0);
  }
  return out;
}
