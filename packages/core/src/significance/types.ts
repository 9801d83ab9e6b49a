/**
 * Significance Evaluator Types
 */

import type { CorrelationOperation, Pattern, SensingDomain } from '@sensorlink/shared';

export const SIGNIFICANCE_TESTS = [
  'causation',
  'information_gain',
  'predictive_power',
  'temporal_stability',
  'compressibility',
] as const;

export type SignificanceTest = (typeof SIGNIFICANCE_TESTS)[number];

export type TestStatus = 'pass' | 'fail' | 'skipped';

export interface TestOutcome {
  status: TestStatus;
  /** The test statistic */
  value: number;
  /** What `value` is compared against */
  threshold: number;
  detail?: string;
}

export interface SignificanceScore {
  requestId: string;
  tests: Record<SignificanceTest, TestOutcome>;
  passCount: number;
  meaningful: boolean;
  /** 0..1 */
  confidence: number;
  mechanism?: string;
  matchedPatternId?: string;
  /** An established pattern settled the verdict without the statistical tests */
  shortCircuited: boolean;
}

export interface SignificanceConfig {
  passThreshold: number;
  minSamples: number;
  informationGainRatio: number;
  maxHistogramBins: number;
  predictiveAlpha: number;
  maxPredictiveLag: number;
  stabilityWindows: number;
  maxStabilityCv: number;
  compressionRatio: number;
  /** Live patterns the domain pair needs before a match is credited */
  minPatternMatches: number;
}

export interface KnownMechanism {
  id: string;
  domains: [SensingDomain, SensingDomain];
  mechanism: string;
  /** The peak lag must be strictly below this */
  maxLagMs: number;
  minMagnitude: number;
}

/**
 * Read side of the pattern library
 */
export interface PatternLookup {
  findMatches(
    domains: readonly [SensingDomain, SensingDomain],
    operation: CorrelationOperation,
    lagMs?: number
  ): Promise<Pattern[]>;
}

/** Two equal-length series, the second read `lag` samples later */
export interface LaggedPair {
  x: Float64Array;
  y: Float64Array;
  lag: number;
}
