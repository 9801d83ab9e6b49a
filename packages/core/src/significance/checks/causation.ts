/**
 * Causation: is there a known physical mechanism for this domain pair, and
 * does the observed lag fit it?
 */

import { z } from 'zod';
import { ConfigurationError, sensingDomainSchema } from '@sensorlink/shared';
import type { SensingDomain } from '@sensorlink/shared';
import type { KnownMechanism, TestOutcome } from '../types.js';
import knownMechanismTable from '../known-mechanisms.json' with { type: 'json' };

const knownMechanismSchema = z.object({
  id: z.string().min(1),
  domains: z.tuple([sensingDomainSchema, sensingDomainSchema]),
  mechanism: z.string().min(1),
  maxLagMs: z.number().positive(),
  minMagnitude: z.number().min(0).max(1),
});

const mechanismFileSchema = z.object({
  mechanisms: z.array(knownMechanismSchema),
});

let defaultMechanisms: KnownMechanism[] | null = null;

export function parseKnownMechanisms(raw: unknown): KnownMechanism[] {
  const parsed = mechanismFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid known-mechanism table: ${parsed.error.message}`);
  }
  return parsed.data.mechanisms;
}

/**
 * The table shipped beside this module
 */
export function loadKnownMechanisms(): KnownMechanism[] {
  if (!defaultMechanisms) {
    defaultMechanisms = parseKnownMechanisms(knownMechanismTable);
  }
  return defaultMechanisms;
}

function samePair(a: readonly [SensingDomain, SensingDomain], b: readonly [SensingDomain, SensingDomain]): boolean {
  return (a[0] === b[0] && a[1] === b[1]) || (a[0] === b[1] && a[1] === b[0]);
}

export interface CausationResult {
  outcome: TestOutcome;
  mechanism?: KnownMechanism;
}

export function testCausation(
  domains: readonly [SensingDomain, SensingDomain],
  peakLagMs: number,
  peakMagnitude: number,
  mechanisms: readonly KnownMechanism[]
): CausationResult {
  const candidates = mechanisms.filter((m) => samePair(m.domains, domains));
  if (candidates.length === 0) {
    return {
      outcome: { status: 'fail', value: Math.abs(peakLagMs), threshold: 0, detail: `no known mechanism for ${domains.join('+')}` },
    };
  }

  const lag = Math.abs(peakLagMs);
  const mechanism = candidates.find((m) => lag < m.maxLagMs && peakMagnitude >= m.minMagnitude);
  if (mechanism) {
    return {
      outcome: { status: 'pass', value: lag, threshold: mechanism.maxLagMs, detail: mechanism.mechanism },
      mechanism,
    };
  }

  const closest = candidates.reduce((best, m) => (m.maxLagMs > best.maxLagMs ? m : best));
  return {
    outcome: {
      status: 'fail',
      value: lag,
      threshold: closest.maxLagMs,
      detail: `lag ${lag}ms or magnitude ${peakMagnitude.toFixed(3)} outside ${closest.mechanism}`,
    },
  };
}
