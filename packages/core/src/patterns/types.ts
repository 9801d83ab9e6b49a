/**
 * Pattern Library Types
 */

import type { Pattern, PatternCandidate, PatternEvidence, PatternProvenance, PatternStatus } from '@sensorlink/shared';

export interface PatternConfig {
  /** Distinct confirming agents needed for 'established' */
  establishedReplications: number;
  /** Retire once false positives exceed this fraction of replications */
  retireFraction: number;
  /** Confidence factor applied per false-positive report */
  falsePositiveDecay: number;
  lagBucketMs: number;
  lagToleranceMs: number;
}

/** A literature-backed pattern the library can start from */
export interface SeedPattern extends PatternCandidate {
  confidence: number;
  provenance: PatternProvenance;
}

export interface PatternLibraryEvents {
  'pattern:published': { pattern: Pattern; created: boolean; agentId: string; evidence: PatternEvidence };
  'pattern:seeded': { pattern: Pattern };
  'pattern:false_positive': { pattern: Pattern; agentId: string };
  'pattern:merged': { pattern: Pattern };
  'pattern:status_changed': { pattern: Pattern; from: PatternStatus | null; to: PatternStatus };
}
