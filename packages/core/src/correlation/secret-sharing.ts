/**
 * Additive secret sharing over GF(2^127 - 1)
 *
 * Reals are carried as fixed-point field elements; negative values wrap to
 * the upper half of the field.
 */

import { randomBytes } from 'crypto';

export const FIELD_PRIME = (1n << 127n) - 1n;
export const FIXED_POINT_BITS = 20n;
export const FIXED_POINT_SCALE = 1n << FIXED_POINT_BITS;

const HALF_FIELD = FIELD_PRIME >> 1n;

export function mod(value: bigint): bigint {
  const r = value % FIELD_PRIME;
  return r < 0n ? r + FIELD_PRIME : r;
}

export function fieldAdd(a: bigint, b: bigint): bigint {
  return mod(a + b);
}

export function fieldSub(a: bigint, b: bigint): bigint {
  return mod(a - b);
}

export function fieldMul(a: bigint, b: bigint): bigint {
  return mod(a * b);
}

export function randomFieldElement(): bigint {
  // 16 bytes reduced mod p; the bias is below 2^-126
  return mod(BigInt(`0x${randomBytes(16).toString('hex')}`));
}

export function encodeFixed(value: number): bigint {
  return mod(BigInt(Math.round(value * Number(FIXED_POINT_SCALE))));
}

/**
 * Decode a field element carrying `scalePower` fixed-point factors
 */
export function decodeFixed(element: bigint, scalePower = 1): number {
  const signed = element > HALF_FIELD ? element - FIELD_PRIME : element;
  return Number(signed) / Number(FIXED_POINT_SCALE) ** scalePower;
}

export function splitSecret(secret: bigint, parties: number): bigint[] {
  if (parties < 2) {
    throw new RangeError(`secret sharing needs at least 2 parties, got ${parties}`);
  }
  const shares: bigint[] = [];
  let sum = 0n;
  for (let i = 0; i < parties - 1; i++) {
    const share = randomFieldElement();
    shares.push(share);
    sum += share;
  }
  shares.push(mod(secret - sum));
  return shares;
}

export function reconstruct(shares: readonly bigint[]): bigint {
  let sum = 0n;
  for (const share of shares) sum += share;
  return mod(sum);
}

/** One party's shares of `count` Beaver triples (a, b, c = a·b) */
export interface TripleShares {
  a: bigint[];
  b: bigint[];
  c: bigint[];
}

/**
 * Trusted dealer for multiplication triples. It never sees any input.
 */
export class TripleDealer {
  private issued = 0;

  deal(count: number, parties: number): TripleShares[] {
    const out: TripleShares[] = Array.from({ length: parties }, () => ({ a: [], b: [], c: [] }));

    for (let t = 0; t < count; t++) {
      const a = randomFieldElement();
      const b = randomFieldElement();
      const as = splitSecret(a, parties);
      const bs = splitSecret(b, parties);
      const cs = splitSecret(fieldMul(a, b), parties);
      out.forEach((party, i) => {
        party.a.push(as[i] ?? 0n);
        party.b.push(bs[i] ?? 0n);
        party.c.push(cs[i] ?? 0n);
      });
    }

    this.issued += count;
    return out;
  }

  get triplesIssued(): number {
    return this.issued;
  }
}
