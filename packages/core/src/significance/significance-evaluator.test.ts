/**
 * SignificanceEvaluator Tests
 */
import { describe, it, expect, vi } from 'vitest';
import type { Pattern, SensingDomain } from '@sensorlink/shared';
import { InsufficientSamplesError } from '@sensorlink/shared';
import { add, whiteNoise } from '../../../../tests/mocks/signals.js';
import type { CorrelationResult } from '../correlation/types.js';
import { PatternLibrary } from '../patterns/pattern-library.js';
import { patternId } from '../patterns/pattern-state.js';
import { SignificanceEvaluator } from './significance-evaluator.js';
import type { PatternLookup } from './types.js';

function createResult(
  domains: [SensingDomain, SensingDomain],
  overrides: Partial<CorrelationResult> = {}
): CorrelationResult {
  const ref = (id: string, domain: SensingDomain) => ({
    bridgeId: id,
    streamId: id,
    domain,
    owner: 'owner-a',
    hostId: 'host-1',
    sampleRateHz: 1000,
  });
  return {
    requestId: 'req-1',
    operation: 'cross_correlation',
    requestedMode: 'adaptive',
    mode: 'local',
    routeReason: 'test',
    output: { kind: 'scalar', value: 0 },
    sources: [ref('a', domains[0]), ref('b', domains[1])],
    peakLag: 0,
    peakLagMs: 0,
    peakMagnitude: 0.95,
    sampleRateHz: 1000,
    sampleCount: 1024,
    latencyMs: 1,
    ...overrides,
  };
}

function createPattern(overrides: Partial<Pattern> = {}): Pattern {
  return {
    id: 'pattern-1',
    domains: ['acoustic', 'vibration'],
    operation: 'cross_correlation',
    lagMs: 0,
    mechanism: 'mechanical coupling',
    originAgent: 'agent-1',
    discoveredAt: 0,
    contributions: { 'agent-1': 0.9 },
    falsePositiveReporters: [],
    replicationCount: 1,
    falsePositiveCount: 0,
    confidence: 0.9,
    status: 'candidate',
    ...overrides,
  };
}

const lookup = (patterns: Pattern[]) => {
  const findMatches = vi.fn(async () => patterns);
  const stub: PatternLookup = { findMatches };
  return { stub, findMatches };
};

describe('SignificanceEvaluator', () => {
  const coupledA = whiteNoise(1024, 1);
  const coupledB = add(coupledA, whiteNoise(1024, 2, 0.05));

  it('finds acoustic-vibration coupling meaningful', async () => {
    const evaluator = new SignificanceEvaluator();
    const score = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);

    expect(score.tests.causation.status).toBe('pass');
    expect(score.tests.information_gain.status).toBe('pass');
    expect(score.tests.temporal_stability.status).toBe('pass');
    expect(score.tests.compressibility.status).toBe('pass');
    expect(score.passCount).toBeGreaterThanOrEqual(4);
    expect(score.meaningful).toBe(true);
    expect(score.mechanism).toBe('mechanical coupling');
    expect(score.shortCircuited).toBe(false);
    expect(score.confidence).toBeGreaterThan(0.7);
  });

  it('finds independent noise meaningless', async () => {
    const evaluator = new SignificanceEvaluator();
    const score = await evaluator.evaluate(
      createResult(['thermal', 'magnetic'], { peakMagnitude: 0.1, peakLag: 3, peakLagMs: 3 }),
      whiteNoise(1024, 3),
      whiteNoise(1024, 4)
    );

    expect(score.tests.causation.status).toBe('fail');
    expect(score.tests.temporal_stability.status).toBe('fail');
    expect(score.tests.compressibility.status).toBe('fail');
    expect(score.passCount).toBeLessThanOrEqual(1);
    expect(score.meaningful).toBe(false);
    expect(score.matchedPatternId).toBeUndefined();
  });

  it('needs minSamples aligned samples', async () => {
    const evaluator = new SignificanceEvaluator();
    await expect(
      evaluator.evaluate(createResult(['acoustic', 'vibration']), whiteNoise(32, 5), whiteNoise(32, 6))
    ).rejects.toThrow(InsufficientSamplesError);
    await expect(
      evaluator.evaluate(createResult(['acoustic', 'vibration']), whiteNoise(32, 5), whiteNoise(32, 6))
    ).rejects.toThrow('Need at least 64 aligned samples, got 32');
  });

  it('honours a configured pass threshold', async () => {
    const strict = new SignificanceEvaluator({ config: { passThreshold: 5, predictiveAlpha: 0 } });
    const score = await strict.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);

    expect(score.tests.predictive_power.status).toBe('fail');
    expect(score.meaningful).toBe(false);
  });

  describe('pattern feedback', () => {
    it('short-circuits on an established pattern', async () => {
      const { stub, findMatches } = lookup([createPattern({ status: 'established', confidence: 0.95 })]);
      const evaluator = new SignificanceEvaluator({ patterns: stub });

      const score = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);

      expect(findMatches).toHaveBeenCalledWith(['acoustic', 'vibration'], 'cross_correlation', 0);
      expect(score.shortCircuited).toBe(true);
      expect(score.meaningful).toBe(true);
      expect(score.matchedPatternId).toBe('pattern-1');
      expect(score.confidence).toBe(0.95);
      expect(score.tests.information_gain.status).toBe('skipped');
      expect(score.tests.causation.status).toBe('pass');
      expect(score.passCount).toBe(1);
    });

    it('ignores retired patterns', async () => {
      const { stub } = lookup([createPattern({ status: 'retired' })]);
      const evaluator = new SignificanceEvaluator({ patterns: stub });

      const score = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);

      expect(score.shortCircuited).toBe(false);
      expect(score.matchedPatternId).toBeUndefined();
    });

    it('references a matching candidate and adds the match bonus', async () => {
      const plain = await new SignificanceEvaluator().evaluate(
        createResult(['acoustic', 'vibration']),
        coupledA,
        coupledB
      );
      const { stub } = lookup([createPattern({ id: 'weak', confidence: 0.4 }), createPattern({ id: 'strong' })]);

      const score = await new SignificanceEvaluator({ patterns: stub }).evaluate(
        createResult(['acoustic', 'vibration']),
        coupledA,
        coupledB
      );

      expect(score.matchedPatternId).toBe('strong');
      expect(score.confidence).toBeCloseTo(Math.min(1, plain.confidence + 0.1), 10);
    });

    it('credits a match only once a second pattern covers the domain pair', async () => {
      const plain = await new SignificanceEvaluator().evaluate(
        createResult(['acoustic', 'vibration']),
        coupledA,
        coupledB
      );
      const library = new PatternLibrary();
      const evaluator = new SignificanceEvaluator({ patterns: library });
      const near = await library.publish(
        { domains: ['acoustic', 'vibration'], operation: 'cross_correlation', lagMs: 0, mechanism: 'mechanical coupling' },
        { agentId: 'agent-1', confidence: 0.8 }
      );

      const lone = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);
      expect(lone.meaningful).toBe(true);
      expect(lone.matchedPatternId).toBeUndefined();
      expect(lone.confidence).toBeCloseTo(plain.confidence, 10);

      await library.publish(
        { domains: ['acoustic', 'vibration'], operation: 'cross_correlation', lagMs: 40, mechanism: 'reflection' },
        { agentId: 'agent-2', confidence: 0.7 }
      );

      const corroborated = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);
      expect(corroborated.matchedPatternId).toBe(near.id);
      expect(corroborated.confidence).toBeCloseTo(Math.min(1, plain.confidence + 0.1), 10);
    });

    it('honours a configured minimum of related patterns', async () => {
      const { stub } = lookup([createPattern({ id: 'only' })]);
      const evaluator = new SignificanceEvaluator({ patterns: stub, config: { minPatternMatches: 1 } });

      const score = await evaluator.evaluate(createResult(['acoustic', 'vibration']), coupledA, coupledB);

      expect(score.matchedPatternId).toBe('only');
    });

    it('settles a seeded coupling without running the statistics', async () => {
      const library = new PatternLibrary();
      await library.seed();
      const evaluator = new SignificanceEvaluator({ patterns: library });

      const score = await evaluator.evaluate(createResult(['vibration', 'acoustic']), coupledA, coupledB);

      expect(score.shortCircuited).toBe(true);
      expect(score.meaningful).toBe(true);
      expect(score.matchedPatternId).toBe(patternId(['acoustic', 'vibration'], 'cross_correlation', 0, 1));
      expect(score.confidence).toBe(0.9);
      expect(score.mechanism).toBe('mechanical coupling');
    });
  });
});
