/**
 * Privacy-preserving execution
 *
 * Each data owner normalizes its own segment and deals additive shares of it
 * straight to the share holders. Per lag, the holders multiply through Beaver
 * triples: the coordinator only relays masked differences, which it opens,
 * and per-holder result shares, which only the reconstructor combines.
 */

import type { CorrelationOperation } from '@sensorlink/shared';
import { CorrelationCancelledError, ModeUnavailableError, createChildLogger } from '@sensorlink/shared';
import { maxLagFor } from '../kernels.js';
import {
  TripleDealer,
  decodeFixed,
  encodeFixed,
  fieldAdd,
  fieldMul,
  fieldSub,
  reconstruct,
  splitSecret,
  type TripleShares,
} from '../secret-sharing.js';
import { argMaxAbs, centered, clampUnit, norm } from '../signal-math.js';
import type {
  CorrelationConfig,
  CorrelationSource,
  CorrelationStrategy,
  ExecutionContext,
  KernelOutput,
} from '../types.js';

export const PRIVACY_OPERATIONS: ReadonlySet<CorrelationOperation> = new Set(['cross_correlation', 'multiplication']);

/**
 * Everything the coordinator handles. None of it is plaintext.
 */
export type CoordinatorMessage =
  | { kind: 'masked_share'; lag: number; holderId: string; d: bigint[]; e: bigint[] }
  | { kind: 'opening'; lag: number; d: bigint[]; e: bigint[] }
  | { kind: 'result_share'; lag: number; holderId: string; share: bigint };

export type CoordinatorObserver = (message: CoordinatorMessage) => void;

/**
 * Holds a data owner's segment; only shares of it ever leave
 */
export class DataOwner {
  constructor(
    readonly ownerId: string,
    private readonly samples: Float64Array
  ) {}

  /** Unit-norm, zero-mean segment dealt to `parties` holders */
  deal(parties: number): bigint[][] {
    const x = centered(this.samples);
    const length = norm(x);
    const out: bigint[][] = Array.from({ length: parties }, () => []);
    for (const v of x) {
      const shares = splitSecret(encodeFixed(length === 0 ? 0 : v / length), parties);
      shares.forEach((share, i) => out[i]?.push(share));
    }
    return out;
  }
}

export class ShareHolder {
  private x: bigint[] = [];
  private y: bigint[] = [];

  constructor(
    readonly id: string,
    readonly leader: boolean
  ) {}

  load(x: bigint[], y: bigint[]): void {
    this.x = x;
    this.y = y;
  }

  /** Pairs (i, i + lag) inside both segments */
  private pairs(lag: number): Array<[number, number]> {
    const out: Array<[number, number]> = [];
    for (let i = Math.max(0, -lag); i < this.x.length && i + lag < this.y.length; i++) {
      out.push([i, i + lag]);
    }
    return out;
  }

  pairCount(lag: number): number {
    return this.pairs(lag).length;
  }

  /** Shares of x - a and y - b for every pair */
  mask(lag: number, triples: TripleShares): { d: bigint[]; e: bigint[] } {
    const d: bigint[] = [];
    const e: bigint[] = [];
    this.pairs(lag).forEach(([i, j], t) => {
      d.push(fieldSub(this.x[i] ?? 0n, triples.a[t] ?? 0n));
      e.push(fieldSub(this.y[j] ?? 0n, triples.b[t] ?? 0n));
    });
    return { d, e };
  }

  /** This holder's share of sum x[i]·y[i+lag] */
  productShare(lag: number, d: readonly bigint[], e: readonly bigint[], triples: TripleShares): bigint {
    let acc = 0n;
    const count = this.pairs(lag).length;
    for (let t = 0; t < count; t++) {
      const dt = d[t] ?? 0n;
      const et = e[t] ?? 0n;
      let z = fieldAdd(triples.c[t] ?? 0n, fieldMul(dt, triples.b[t] ?? 0n));
      z = fieldAdd(z, fieldMul(et, triples.a[t] ?? 0n));
      if (this.leader) z = fieldAdd(z, fieldMul(dt, et));
      acc = fieldAdd(acc, z);
    }
    return acc;
  }
}

export interface PrivacyStrategyOptions {
  config: Pick<CorrelationConfig, 'maxLagFraction' | 'privacyMaxLag' | 'privacyMinParties'>;
  /** Independent parties available to hold shares */
  shareHolders: readonly string[];
  observer?: CoordinatorObserver;
  dealer?: TripleDealer;
}

export class PrivacyStrategy implements CorrelationStrategy {
  readonly mode = 'privacy_preserving' as const;
  private config: PrivacyStrategyOptions['config'];
  private holderIds: readonly string[];
  private observer?: CoordinatorObserver;
  private dealer: TripleDealer;
  private logger = createChildLogger({ component: 'PrivacyStrategy' });

  constructor(options: PrivacyStrategyOptions) {
    this.config = options.config;
    this.holderIds = options.shareHolders;
    this.observer = options.observer;
    this.dealer = options.dealer ?? new TripleDealer();
  }

  supports(operation: CorrelationOperation): boolean {
    return PRIVACY_OPERATIONS.has(operation);
  }

  get parties(): number {
    return new Set(this.holderIds).size;
  }

  hasEnoughParties(): boolean {
    return this.parties >= this.config.privacyMinParties;
  }

  async execute(a: CorrelationSource, b: CorrelationSource, context: ExecutionContext): Promise<KernelOutput> {
    const { operation, requestId } = context.request;
    if (!this.supports(operation)) {
      throw new ModeUnavailableError('privacy_preserving', `operation '${operation}' cannot run on shared data`, {
        requestId,
      });
    }
    if (!this.hasEnoughParties()) {
      throw new ModeUnavailableError(
        'privacy_preserving',
        `${this.parties} share holders available, ${this.config.privacyMinParties} required`,
        { requestId }
      );
    }

    const holderIds = [...new Set(this.holderIds)];
    const holders = holderIds.map((id, i) => new ShareHolder(id, i === 0));
    const n = Math.min(a.samples.length, b.samples.length);
    const xs = new DataOwner(a.ref.owner, a.samples.subarray(a.samples.length - n)).deal(holders.length);
    const ys = new DataOwner(b.ref.owner, b.samples.subarray(b.samples.length - n)).deal(holders.length);
    holders.forEach((holder, i) => holder.load(xs[i] ?? [], ys[i] ?? []));

    const maxLag =
      operation === 'multiplication'
        ? 0
        : Math.min(this.config.privacyMaxLag, maxLagFor(n, this.config.maxLagFraction));
    const values = new Float64Array(2 * maxLag + 1);

    for (let lag = -maxLag; lag <= maxLag; lag++) {
      await this.yieldRound(context);
      values[lag + maxLag] = this.round(lag, holders);
    }

    this.logger.debug({ requestId, rounds: values.length, parties: holders.length }, 'Shared computation finished');

    if (operation === 'multiplication') {
      const value = values[0] ?? 0;
      return { output: { kind: 'scalar', value }, peakLag: 0, peakMagnitude: clampUnit(Math.abs(value)) };
    }
    const peak = argMaxAbs(values);
    return {
      output: { kind: 'lag', values, minLag: -maxLag },
      peakLag: peak - maxLag,
      peakMagnitude: clampUnit(Math.abs(values[peak] ?? 0)),
    };
  }

  /** One multiplication round for one lag; returns the reconstructed aggregate */
  private round(lag: number, holders: ShareHolder[]): number {
    const pairs = holders[0]?.pairCount(lag) ?? 0;
    const triples = this.dealer.deal(pairs, holders.length);

    const masked = holders.map((holder, i) => {
      const shares = holder.mask(lag, triples[i] ?? { a: [], b: [], c: [] });
      this.observer?.({ kind: 'masked_share', lag, holderId: holder.id, ...shares });
      return shares;
    });

    const d = Array.from({ length: pairs }, (_, t) => reconstruct(masked.map((m) => m.d[t] ?? 0n)));
    const e = Array.from({ length: pairs }, (_, t) => reconstruct(masked.map((m) => m.e[t] ?? 0n)));
    this.observer?.({ kind: 'opening', lag, d, e });

    const resultShares = holders.map((holder, i) => {
      const share = holder.productShare(lag, d, e, triples[i] ?? { a: [], b: [], c: [] });
      this.observer?.({ kind: 'result_share', lag, holderId: holder.id, share });
      return share;
    });

    return decodeFixed(reconstruct(resultShares), 2);
  }

  private async yieldRound(context: ExecutionContext): Promise<void> {
    if (context.signal?.aborted) {
      throw new CorrelationCancelledError({ requestId: context.request.requestId });
    }
    await new Promise<void>((resolve) => setImmediate(resolve));
    context.checkpoint();
  }
}
