/**
 * Significance Evaluator
 * Separates physically meaningful correlations from numerical coincidence
 * with five independent tests. Established library patterns settle the
 * verdict without running the statistics.
 */

import type { Pattern, SensingDomain } from '@sensorlink/shared';
import { InsufficientSamplesError, createChildLogger } from '@sensorlink/shared';
import type { CorrelationResult } from '../correlation/types.js';
import { loadKnownMechanisms, testCausation } from './checks/causation.js';
import { testCompressibility } from './checks/compressibility.js';
import { testInformationGain } from './checks/information-gain.js';
import { testPredictivePower } from './checks/predictive-power.js';
import { testTemporalStability } from './checks/temporal-stability.js';
import { alignAtLag } from './statistics.js';
import { SIGNIFICANCE_TESTS } from './types.js';
import type {
  KnownMechanism,
  PatternLookup,
  SignificanceConfig,
  SignificanceScore,
  SignificanceTest,
  TestOutcome,
} from './types.js';

const DEFAULT_CONFIG: SignificanceConfig = {
  passThreshold: 2,
  minSamples: 64,
  informationGainRatio: 0.1,
  maxHistogramBins: 16,
  predictiveAlpha: 0.05,
  maxPredictiveLag: 8,
  stabilityWindows: 8,
  maxStabilityCv: 0.3,
  compressionRatio: 0.9,
  minPatternMatches: 2,
};

// A known mechanism counts double in the weighted pass fraction
const TEST_WEIGHTS: Record<SignificanceTest, number> = {
  causation: 2,
  information_gain: 1,
  predictive_power: 1,
  temporal_stability: 1,
  compressibility: 1,
};

export interface SignificanceEvaluatorOptions {
  config?: Partial<SignificanceConfig>;
  /** Defaults to the bundled known-mechanism table */
  mechanisms?: KnownMechanism[];
  patterns?: PatternLookup;
}

export class SignificanceEvaluator {
  private config: SignificanceConfig;
  private mechanisms: KnownMechanism[];
  private patterns?: PatternLookup;
  private logger = createChildLogger({ component: 'SignificanceEvaluator' });

  constructor(options: SignificanceEvaluatorOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.mechanisms = options.mechanisms ?? loadKnownMechanisms();
    this.patterns = options.patterns;
  }

  /**
   * Score a result against the two signals it was computed from
   */
  async evaluate(result: CorrelationResult, a: Float64Array, b: Float64Array): Promise<SignificanceScore> {
    const { requestId } = result;
    const pair = alignAtLag(a, b, result.peakLag);
    if (pair.x.length < this.config.minSamples) {
      throw new InsufficientSamplesError(pair.x.length, this.config.minSamples, { requestId });
    }

    const domains: [SensingDomain, SensingDomain] = [result.sources[0].domain, result.sources[1].domain];
    const causation = testCausation(domains, result.peakLagMs, result.peakMagnitude, this.mechanisms);
    const causal = causation.outcome.status === 'pass';

    const related = await this.findLivePatterns(domains, result);
    const matches = await this.findLivePatterns(domains, result, result.peakLagMs);
    const established = matches.find((p) => p.status === 'established');

    if (established) {
      const skipped = (threshold: number): TestOutcome => ({
        status: 'skipped',
        value: 0,
        threshold,
        detail: `settled by established pattern ${established.id}`,
      });
      const score: SignificanceScore = {
        requestId,
        tests: {
          causation: causation.outcome,
          information_gain: skipped(this.config.informationGainRatio),
          predictive_power: skipped(this.config.predictiveAlpha),
          temporal_stability: skipped(this.config.maxStabilityCv),
          compressibility: skipped(this.config.compressionRatio),
        },
        passCount: causal ? 1 : 0,
        meaningful: true,
        confidence: Math.min(1, established.confidence),
        mechanism: causation.mechanism?.mechanism ?? established.mechanism,
        matchedPatternId: established.id,
        shortCircuited: true,
      };
      this.logger.info({ requestId, patternId: established.id }, 'Significance settled by established pattern');
      return score;
    }

    const tests: Record<SignificanceTest, TestOutcome> = {
      causation: causation.outcome,
      information_gain: testInformationGain(pair, this.config.informationGainRatio, this.config.maxHistogramBins),
      predictive_power: testPredictivePower(a, b, this.config.predictiveAlpha, this.config.maxPredictiveLag),
      temporal_stability: testTemporalStability(pair, this.config.stabilityWindows, this.config.maxStabilityCv),
      compressibility: testCompressibility(pair, this.config.compressionRatio),
    };

    const passed = SIGNIFICANCE_TESTS.filter((t) => tests[t].status === 'pass');
    const passCount = passed.length;
    const meaningful = passCount >= this.config.passThreshold;

    // One pattern for the pair is an anecdote; crediting a match takes corroboration
    const corroborated = related.length >= this.config.minPatternMatches;
    const matched = meaningful && corroborated
      ? matches.reduce<Pattern | undefined>((best, p) => (!best || p.confidence > best.confidence ? p : best), undefined)
      : undefined;

    const totalWeight = Object.values(TEST_WEIGHTS).reduce((s, w) => s + w, 0);
    const passWeight = passed.reduce((s, t) => s + TEST_WEIGHTS[t], 0);
    const confidence = Math.min(1, 0.8 * (passWeight / totalWeight) + (causal ? 0.1 : 0) + (matched ? 0.1 : 0));

    this.logger.info(
      { requestId, passCount, meaningful, passed, relatedPatterns: related.length },
      'Significance evaluated'
    );

    return {
      requestId,
      tests,
      passCount,
      meaningful,
      confidence,
      mechanism: causation.mechanism?.mechanism,
      matchedPatternId: matched?.id,
      shortCircuited: false,
    };
  }

  getConfig(): Readonly<SignificanceConfig> {
    return this.config;
  }

  /** Non-retired patterns for the pair and operation, near `lagMs` when given */
  private async findLivePatterns(
    domains: [SensingDomain, SensingDomain],
    result: CorrelationResult,
    lagMs?: number
  ): Promise<Pattern[]> {
    if (!this.patterns) return [];
    const matches = await this.patterns.findMatches(domains, result.operation, lagMs);
    return matches.filter((p) => p.status !== 'retired');
  }
}
