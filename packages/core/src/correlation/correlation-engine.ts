/**
 * Correlation Engine
 * Runs one operation over aligned segments under the mode the router picks
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import type { ResolvedMode } from '@sensorlink/shared';
import {
  CorrelationCancelledError,
  InsufficientDataError,
  ValidationError,
  createChildLogger,
  logCorrelationComputed,
  wrapError,
} from '@sensorlink/shared';
import { ModeRouter } from './mode-router.js';
import { centered, norm, tail } from './signal-math.js';
import { LocalStrategy } from './strategies/local-strategy.js';
import { PrivacyStrategy, type CoordinatorObserver } from './strategies/privacy-strategy.js';
import { InProcessComputeNode, RemoteStrategy, type ComputeNode } from './strategies/remote-strategy.js';
import type {
  CorrelationConfig,
  CorrelationEngineEvents,
  CorrelationRequest,
  CorrelationResult,
  CorrelationSource,
  CorrelationStrategy,
  ExecutionContext,
  PairResult,
  RouteDecision,
} from './types.js';

const DEFAULT_CONFIG: CorrelationConfig = {
  localLatencyThresholdMs: 10,
  localDeadlineMs: 10,
  localMaxSamples: 4096,
  minSamples: 8,
  maxLagFraction: 0.25,
  privacyMaxLag: 16,
  privacyMinParties: 2,
  coherenceSegment: 256,
};

const DEFAULT_SHARE_HOLDERS = ['share-holder-1', 'share-holder-2'];

export interface CorrelationEngineOptions {
  config?: Partial<CorrelationConfig>;
  computeNode?: ComputeNode;
  /** Independent parties that hold shares in privacy-preserving mode */
  shareHolders?: string[];
  /** Sees every message the privacy coordinator handles */
  coordinatorObserver?: CoordinatorObserver;
  /** Millisecond clock for budgets and latency */
  now?: () => number;
}

interface PreparedInput {
  sources: CorrelationSource[];
  sampleRateHz: number;
  sampleCount: number;
}

export class CorrelationEngine extends EventEmitter<CorrelationEngineEvents> {
  private config: CorrelationConfig;
  private strategies: Record<ResolvedMode, CorrelationStrategy>;
  private router: ModeRouter;
  private now: () => number;
  private logger = createChildLogger({ component: 'CorrelationEngine' });

  constructor(options: CorrelationEngineOptions = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.now = options.now ?? (() => performance.now());

    const local = new LocalStrategy(this.config, this.now);
    const remote = new RemoteStrategy(
      options.computeNode ?? new InProcessComputeNode(this.config.coherenceSegment),
      this.config
    );
    const privacy = new PrivacyStrategy({
      config: this.config,
      shareHolders: options.shareHolders ?? DEFAULT_SHARE_HOLDERS,
      observer: options.coordinatorObserver,
    });

    this.strategies = { local, remote, privacy_preserving: privacy };
    this.router = new ModeRouter(this.config, {
      localSupports: (operation) => local.supports(operation),
      privacySupports: (operation) => privacy.supports(operation),
      privacyParties: () => privacy.parties,
    });
  }

  /**
   * Resolve the mode a request would run under, without running it
   */
  route(request: CorrelationRequest): RouteDecision {
    return this.router.route(request);
  }

  /**
   * Correlate every pair of sources. The strongest pair is the primary
   * result; all pairs are listed when there are more than two sources.
   */
  async compute(request: CorrelationRequest): Promise<CorrelationResult> {
    const requestId = request.requestId ?? randomUUID();
    const tagged: CorrelationRequest = { ...request, requestId };
    const started = this.now();

    try {
      const input = this.prepare(tagged);
      const decision = this.router.route(tagged);
      this.emit('correlation:routed', { requestId, decision });
      this.logger.debug({ requestId, mode: decision.mode, reason: decision.reason }, 'Routed correlation');

      const context: ExecutionContext = {
        request: tagged,
        sampleRateHz: input.sampleRateHz,
        signal: tagged.signal,
        checkpoint: () => {
          if (tagged.signal?.aborted) throw new CorrelationCancelledError({ requestId });
        },
      };

      const strategy = this.strategies[decision.mode];
      const pairs: PairResult[] = [];
      for (let i = 0; i < input.sources.length; i++) {
        for (let j = i + 1; j < input.sources.length; j++) {
          const a = input.sources[i];
          const b = input.sources[j];
          if (!a || !b) continue;
          const output = await strategy.execute(a, b, context);
          pairs.push({
            ...output,
            sources: [a.ref, b.ref],
            peakLagMs: (output.peakLag * 1000) / input.sampleRateHz,
          });
        }
      }

      const primary = pairs.reduce((best, pair) => (pair.peakMagnitude > best.peakMagnitude ? pair : best));
      const latencyMs = this.now() - started;
      const result: CorrelationResult = {
        ...primary,
        requestId,
        operation: tagged.operation,
        requestedMode: tagged.mode,
        mode: decision.mode,
        routeReason: decision.reason,
        sampleRateHz: input.sampleRateHz,
        sampleCount: input.sampleCount,
        latencyMs,
        pairs: pairs.length > 1 ? pairs : undefined,
      };

      logCorrelationComputed(requestId, tagged.operation, decision.mode, latencyMs);
      this.emit('correlation:computed', { result });
      return result;
    } catch (error) {
      const err = wrapError(error, { category: 'CORRELATION', requestId });
      this.logger.warn({ requestId, error: err.message }, 'Correlation failed');
      this.emit('correlation:failed', { requestId, error: err });
      throw err;
    }
  }

  getConfig(): Readonly<CorrelationConfig> {
    return this.config;
  }

  /**
   * Check the segments and cut them to a common length, keeping the most
   * recent samples
   */
  private prepare(request: CorrelationRequest): PreparedInput {
    const { requestId, sources } = request;
    const [first] = sources;
    if (!first || sources.length < 2) {
      throw new InsufficientDataError(`need at least 2 sources, got ${sources.length}`, { requestId });
    }
    if (request.operation === 'custom' && !request.custom) {
      throw new ValidationError('custom operation requires a callback', { requestId });
    }

    const sampleRateHz = first.ref.sampleRateHz;
    if (!(sampleRateHz > 0)) {
      throw new ValidationError(`invalid sample rate ${sampleRateHz}`, { requestId });
    }
    const mismatched = sources.find((s) => s.ref.sampleRateHz !== sampleRateHz);
    if (mismatched) {
      throw new ValidationError(
        `stream '${mismatched.ref.streamId}' runs at ${mismatched.ref.sampleRateHz} Hz, expected ${sampleRateHz} Hz; align streams first`,
        { requestId, streamId: mismatched.ref.streamId }
      );
    }

    const sampleCount = Math.min(...sources.map((s) => s.samples.length));
    if (sampleCount < this.config.minSamples) {
      throw new InsufficientDataError(`segment has ${sampleCount} samples, need ${this.config.minSamples}`, {
        requestId,
      });
    }

    const trimmed = sources.map((s) => ({ ref: s.ref, samples: tail(s.samples, sampleCount) }));
    for (const source of trimmed) {
      if (!source.samples.every(Number.isFinite)) {
        throw new ValidationError(`stream '${source.ref.streamId}' contains non-finite samples`, {
          requestId,
          streamId: source.ref.streamId,
        });
      }
      if (norm(centered(source.samples)) === 0) {
        throw new InsufficientDataError(`stream '${source.ref.streamId}' has zero variance`, {
          requestId,
          streamId: source.ref.streamId,
        });
      }
    }

    if (request.signal?.aborted) {
      throw new CorrelationCancelledError({ requestId });
    }
    return { sources: trimmed, sampleRateHz, sampleCount };
  }
}
