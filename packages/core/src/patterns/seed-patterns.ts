/**
 * Seed patterns
 * Well-documented cross-domain couplings shipped with the library
 */

import { z } from 'zod';
import {
  ConfigurationError,
  correlationOperationSchema,
  formatIssues,
  patternProvenanceSchema,
  sensingDomainSchema,
} from '@sensorlink/shared';
import type { SeedPattern } from './types.js';
import seedPatternTable from './seed-patterns.json' with { type: 'json' };

/** Agent id credited with seeded patterns */
export const SEED_AGENT = 'seed';

const seedPatternSchema: z.ZodType<SeedPattern> = z.object({
  domains: z.tuple([sensingDomainSchema, sensingDomainSchema]),
  operation: correlationOperationSchema,
  lagMs: z.number().finite(),
  mechanism: z.string().min(1),
  confidence: z.number().min(0).max(1),
  provenance: patternProvenanceSchema,
});

const seedFileSchema = z.object({
  patterns: z.array(seedPatternSchema),
});

let defaultSeeds: SeedPattern[] | null = null;

export function parseSeedPatterns(raw: unknown): SeedPattern[] {
  const parsed = seedFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid seed pattern table: ${formatIssues(parsed.error)}`);
  }
  return parsed.data.patterns;
}

export function loadSeedPatterns(): SeedPattern[] {
  if (!defaultSeeds) {
    defaultSeeds = parseSeedPatterns(seedPatternTable);
  }
  return defaultSeeds;
}
