/**
 * Replicated pattern state
 *
 * Contributions merge by keeping each agent's highest confidence and false
 * positive reporters form a grow-only set, so merge is commutative,
 * associative and idempotent. Everything else on a Pattern is derived.
 */

import type { CorrelationOperation, DomainPair, Pattern, PatternState, PatternStatus, SensingDomain } from '@sensorlink/shared';
import { ValidationError } from '@sensorlink/shared';
import { contentHash } from '../registry/content-address.js';
import type { PatternConfig } from './types.js';

export function sortDomains(domains: readonly [SensingDomain, SensingDomain]): DomainPair {
  const [a, b] = domains;
  return a <= b ? [a, b] : [b, a];
}

export function lagBucket(lagMs: number, bucketMs: number): number {
  return Math.round(lagMs / bucketMs);
}

/**
 * Content address of (sorted domain pair, operation, lag bucket)
 */
export function patternId(
  domains: readonly [SensingDomain, SensingDomain],
  operation: CorrelationOperation,
  lagMs: number,
  bucketMs: number
): string {
  const key = { domains: sortDomains(domains), operation, lagBucket: lagBucket(lagMs, bucketMs) };
  return `pat_${contentHash(key).slice(0, 24)}`;
}

/** Earlier discovery wins the fixed fields; ties go to the smaller origin agent */
function older(a: PatternState, b: PatternState): PatternState {
  if (a.discoveredAt !== b.discoveredAt) return a.discoveredAt < b.discoveredAt ? a : b;
  return a.originAgent <= b.originAgent ? a : b;
}

export function mergeStates(a: PatternState, b: PatternState): PatternState {
  if (a.id !== b.id) {
    throw new ValidationError(`Cannot merge pattern '${a.id}' with '${b.id}'`);
  }

  const contributions = new Map(Object.entries(a.contributions));
  for (const [agent, confidence] of Object.entries(b.contributions)) {
    contributions.set(agent, Math.max(contributions.get(agent) ?? 0, confidence));
  }
  const reporters = [...new Set([...a.falsePositiveReporters, ...b.falsePositiveReporters])].sort();

  const base = older(a, b);
  const other = base === a ? b : a;
  const merged: PatternState = {
    id: base.id,
    domains: base.domains,
    operation: base.operation,
    lagMs: base.lagMs,
    mechanism: base.mechanism,
    originAgent: base.originAgent,
    discoveredAt: base.discoveredAt,
    contributions: Object.fromEntries([...contributions].sort(([x], [y]) => (x < y ? -1 : x > y ? 1 : 0))),
    falsePositiveReporters: reporters,
  };
  const provenance = base.provenance ?? other.provenance;
  if (provenance) merged.provenance = provenance;
  return merged;
}

export function deriveStatus(
  replications: number,
  falsePositives: number,
  config: PatternConfig,
  curated = false
): PatternStatus {
  if (falsePositives > config.retireFraction * replications) return 'retired';
  if (curated || replications >= config.establishedReplications) return 'established';
  return 'candidate';
}

/**
 * Confidence is the mean over confirming agents, so folding two replicas
 * together weighs each by its replication count.
 */
export function derivePattern(state: PatternState, config: PatternConfig): Pattern {
  const confidences = Object.values(state.contributions);
  const replicationCount = confidences.length;
  const falsePositiveCount = state.falsePositiveReporters.length;
  const meanConfidence = replicationCount === 0 ? 0 : confidences.reduce((s, c) => s + c, 0) / replicationCount;

  return {
    ...state,
    domains: [state.domains[0], state.domains[1]],
    contributions: { ...state.contributions },
    falsePositiveReporters: [...state.falsePositiveReporters],
    replicationCount,
    falsePositiveCount,
    confidence: meanConfidence * config.falsePositiveDecay ** falsePositiveCount,
    status: deriveStatus(replicationCount, falsePositiveCount, config, state.provenance !== undefined),
  };
}
