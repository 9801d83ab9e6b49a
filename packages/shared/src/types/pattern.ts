/**
 * Pattern Library types
 */

import type { CorrelationOperation, SensingDomain } from './index.js';

export type PatternStatus = 'candidate' | 'established' | 'retired';

/** Domain pair, always stored sorted */
export type DomainPair = [SensingDomain, SensingDomain];

export interface PatternCriterion {
  name: string;
  description: string;
}

export interface PatternExample {
  description: string;
  signalA: string;
  signalB: string;
  expectedResult: string;
}

/** Curation record carried by patterns seeded from the literature */
export interface PatternProvenance {
  name: string;
  criteria: PatternCriterion[];
  examples: PatternExample[];
  citations: string[];
}

/**
 * Replicated pattern state. Every field other than `contributions` and
 * `falsePositiveReporters` is fixed when the pattern is first created.
 */
export interface PatternState {
  id: string;
  domains: DomainPair;
  operation: CorrelationOperation;
  lagMs: number;
  mechanism: string;
  originAgent: string;
  /** Epoch milliseconds */
  discoveredAt: number;
  /** agent id -> confidence the agent reported */
  contributions: Record<string, number>;
  falsePositiveReporters: string[];
  /** Present on seeded patterns, which count as established from the start */
  provenance?: PatternProvenance;
}

export interface Pattern extends PatternState {
  replicationCount: number;
  falsePositiveCount: number;
  confidence: number;
  status: PatternStatus;
}

export interface PatternCandidate {
  domains: [SensingDomain, SensingDomain];
  operation: CorrelationOperation;
  lagMs: number;
  mechanism: string;
}

export interface PatternEvidence {
  agentId: string;
  confidence: number;
  requestId?: string;
  peakMagnitude?: number;
}
