/**
 * Correlation Engine Types
 */

import type {
  CorrelationOperation,
  ExecutionMode,
  ResolvedMode,
  SensingDomain,
} from '@sensorlink/shared';

// ===========================================
// Requests
// ===========================================

/**
 * Where a segment came from. Two sources are co-located when they share a
 * host (the bridge id stands in when none is known) and an owner.
 */
export interface StreamRef {
  bridgeId: string;
  streamId: string;
  domain: SensingDomain;
  owner: string;
  hostId?: string;
  sampleRateHz: number;
}

export interface CorrelationSource {
  ref: StreamRef;
  samples: Float64Array;
}

export type PrivacyLevel = 'none' | 'sensitive' | 'critical';
export type ComputeBudget = 'low' | 'normal' | 'high';

export interface CorrelationConstraints {
  latencyMs?: number;
  /** A hard bound is never traded for another mode */
  latencyHard?: boolean;
  privacy?: PrivacyLevel;
  computeBudget?: ComputeBudget;
}

export type CustomOperation = (a: Float64Array, b: Float64Array) => Float64Array | number;

export interface CorrelationRequest {
  requestId?: string;
  sources: CorrelationSource[];
  operation: CorrelationOperation;
  mode: ExecutionMode;
  constraints?: CorrelationConstraints;
  /** Required when operation is 'custom' */
  custom?: CustomOperation;
  signal?: AbortSignal;
}

// ===========================================
// Results
// ===========================================

export type CorrelationOutput =
  /** values[i] is the correlation at lag minLag + i */
  | { kind: 'lag'; values: Float64Array; minLag: number }
  /** values[i] is bin i, binHz apart */
  | { kind: 'frequency'; values: Float64Array; binHz: number }
  | { kind: 'series'; values: Float64Array }
  | { kind: 'scalar'; value: number };

export interface KernelOutput {
  output: CorrelationOutput;
  /** Samples; positive when the second source trails the first */
  peakLag: number;
  /** Normalized to [0, 1] */
  peakMagnitude: number;
  peakFrequencyHz?: number;
}

export interface PairResult extends KernelOutput {
  sources: [StreamRef, StreamRef];
  peakLagMs: number;
}

export interface CorrelationResult extends PairResult {
  requestId: string;
  operation: CorrelationOperation;
  requestedMode: ExecutionMode;
  mode: ResolvedMode;
  routeReason: string;
  sampleRateHz: number;
  sampleCount: number;
  latencyMs: number;
  /** One entry per source pair when more than two sources were correlated */
  pairs?: PairResult[];
}

// ===========================================
// Strategies
// ===========================================

export interface CorrelationConfig {
  localLatencyThresholdMs: number;
  localDeadlineMs: number;
  localMaxSamples: number;
  minSamples: number;
  maxLagFraction: number;
  privacyMaxLag: number;
  privacyMinParties: number;
  coherenceSegment: number;
}

export interface ExecutionContext {
  request: CorrelationRequest;
  sampleRateHz: number;
  /** Throws once the budget or the cancel token says stop */
  checkpoint: () => void;
  signal?: AbortSignal;
}

/**
 * One execution mode. `supports` is consulted by the router before dispatch.
 */
export interface CorrelationStrategy {
  readonly mode: ResolvedMode;
  supports(operation: CorrelationOperation): boolean;
  execute(a: CorrelationSource, b: CorrelationSource, context: ExecutionContext): Promise<KernelOutput>;
}

export interface RouteDecision {
  mode: ResolvedMode;
  reason: string;
}

export interface CorrelationEngineEvents {
  'correlation:routed': { requestId: string; decision: RouteDecision };
  'correlation:computed': { result: CorrelationResult };
  'correlation:failed': { requestId: string; error: Error };
}
