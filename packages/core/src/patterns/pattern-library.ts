/**
 * Pattern Library
 * Eventually consistent store of domain-pair correlation patterns. Concurrent
 * publishes from independent agents merge instead of overwriting.
 */

import { EventEmitter } from 'eventemitter3';
import {
  ValidationError,
  createChildLogger,
  formatIssues,
  patternCandidateSchema,
  patternEvidenceSchema,
  patternStateSchema,
  type CorrelationOperation,
  type Pattern,
  type PatternCandidate,
  type PatternEvidence,
  type PatternState,
  type PatternStore,
  type SensingDomain,
} from '@sensorlink/shared';
import { KeyedMutex } from '../lock/keyed-mutex.js';
import { InMemoryPatternStore } from './in-memory-pattern-store.js';
import { derivePattern, mergeStates, patternId, sortDomains } from './pattern-state.js';
import { SEED_AGENT, loadSeedPatterns } from './seed-patterns.js';
import type { PatternLookup } from '../significance/types.js';
import type { PatternConfig, PatternLibraryEvents, SeedPattern } from './types.js';

const DEFAULT_CONFIG: PatternConfig = {
  establishedReplications: 10,
  retireFraction: 0.5,
  falsePositiveDecay: 0.9,
  lagBucketMs: 1,
  lagToleranceMs: 1,
};

// Matching reads every pattern, so writers share one key
const LIBRARY_LOCK = 'library';

export interface PatternLibraryOptions {
  store?: PatternStore;
  config?: Partial<PatternConfig>;
  now?: () => number;
}

export class PatternLibrary extends EventEmitter<PatternLibraryEvents> implements PatternLookup {
  private store: PatternStore;
  private config: PatternConfig;
  private now: () => number;
  private mutex = new KeyedMutex();
  private logger = createChildLogger({ component: 'PatternLibrary' });

  constructor(options: PatternLibraryOptions = {}) {
    super();
    this.store = options.store ?? new InMemoryPatternStore();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a confirmation. A matching pattern (same domain pair and operation,
   * lag within tolerance) gains the agent's contribution; otherwise a new
   * pattern is created. Republishing from the same agent never adds a
   * replication.
   */
  async publish(candidate: PatternCandidate, evidence: PatternEvidence): Promise<Pattern> {
    const parsedCandidate = patternCandidateSchema.safeParse(candidate);
    if (!parsedCandidate.success) {
      throw new ValidationError(`Invalid pattern: ${formatIssues(parsedCandidate.error)}`);
    }
    const parsedEvidence = patternEvidenceSchema.safeParse(evidence);
    if (!parsedEvidence.success) {
      throw new ValidationError(`Invalid evidence: ${formatIssues(parsedEvidence.error)}`);
    }
    const { domains, operation, lagMs, mechanism } = parsedCandidate.data;
    const parsed = parsedEvidence.data;
    const { agentId, confidence } = parsed;

    return this.mutex.runExclusive(LIBRARY_LOCK, async () => {
      const existing = await this.closestMatch(domains, operation, lagMs);
      const id = existing?.id ?? patternId(domains, operation, lagMs, this.config.lagBucketMs);
      const stored = await this.store.get(id);
      const incoming: PatternState = {
        id,
        domains: sortDomains(domains),
        operation,
        lagMs,
        mechanism,
        originAgent: agentId,
        discoveredAt: this.now(),
        contributions: { [agentId]: confidence },
        falsePositiveReporters: [],
      };

      const next = stored ? mergeStates(stored, incoming) : incoming;
      const pattern = await this.save(stored, next);

      this.logger.info(
        {
          patternId: id,
          agentId,
          requestId: parsed.requestId,
          peakMagnitude: parsed.peakMagnitude,
          created: !stored,
          replications: pattern.replicationCount,
        },
        stored ? 'Pattern confirmed' : 'Pattern discovered'
      );
      this.emit('pattern:published', { pattern, created: !stored, agentId, evidence: parsed });
      return pattern;
    });
  }

  /**
   * Merge the literature-backed seed patterns into the store. Seeding twice
   * changes nothing.
   */
  async seed(seeds: readonly SeedPattern[] = loadSeedPatterns()): Promise<Pattern[]> {
    return this.mutex.runExclusive(LIBRARY_LOCK, async () => {
      const seeded: Pattern[] = [];
      for (const seed of seeds) {
        const id = patternId(seed.domains, seed.operation, seed.lagMs, this.config.lagBucketMs);
        const state: PatternState = {
          id,
          domains: sortDomains(seed.domains),
          operation: seed.operation,
          lagMs: seed.lagMs,
          mechanism: seed.mechanism,
          originAgent: SEED_AGENT,
          discoveredAt: 0,
          contributions: { [SEED_AGENT]: seed.confidence },
          falsePositiveReporters: [],
          provenance: seed.provenance,
        };
        const stored = await this.store.get(id);
        const pattern = await this.save(stored, stored ? mergeStates(stored, state) : state);
        this.emit('pattern:seeded', { pattern });
        seeded.push(pattern);
      }
      this.logger.info({ count: seeded.length }, 'Pattern library seeded');
      return seeded;
    });
  }

  /**
   * Count one agent's false-positive report; repeats from the same agent are
   * ignored
   */
  async reportFalsePositive(id: string, agentId: string): Promise<Pattern> {
    if (!agentId) {
      throw new ValidationError('agentId is required', { patternId: id });
    }

    return this.mutex.runExclusive(LIBRARY_LOCK, async () => {
      const stored = await this.store.get(id);
      if (!stored) {
        throw new ValidationError(`Unknown pattern '${id}'`, { patternId: id });
      }

      const next = mergeStates(stored, { ...stored, contributions: {}, falsePositiveReporters: [agentId] });
      const pattern = await this.save(stored, next);

      this.logger.info(
        { patternId: id, agentId, falsePositives: pattern.falsePositiveCount, status: pattern.status },
        'False positive reported'
      );
      this.emit('pattern:false_positive', { pattern, agentId });
      return pattern;
    });
  }

  /**
   * Fold in state received from another replica
   */
  async mergeReplica(state: PatternState): Promise<Pattern> {
    const parsed = patternStateSchema.safeParse(state);
    if (!parsed.success) {
      throw new ValidationError(`Invalid pattern replica: ${formatIssues(parsed.error)}`, { patternId: state.id });
    }
    const remote = { ...parsed.data, domains: sortDomains(parsed.data.domains) };

    return this.mutex.runExclusive(LIBRARY_LOCK, async () => {
      const stored = await this.store.get(remote.id);
      const pattern = await this.save(stored, stored ? mergeStates(stored, remote) : remote);
      this.emit('pattern:merged', { pattern });
      return pattern;
    });
  }

  async get(id: string): Promise<Pattern | null> {
    const state = await this.store.get(id);
    return state ? derivePattern(state, this.config) : null;
  }

  async list(): Promise<Pattern[]> {
    const states = await this.store.list();
    return states.map((s) => derivePattern(s, this.config)).sort((a, b) => b.confidence - a.confidence);
  }

  /**
   * Patterns for a domain pair (either order) and operation, optionally
   * within the lag tolerance, most confident first
   */
  async findMatches(
    domains: readonly [SensingDomain, SensingDomain],
    operation: CorrelationOperation,
    lagMs?: number
  ): Promise<Pattern[]> {
    const [d0, d1] = sortDomains(domains);
    const all = await this.list();
    return all.filter(
      (p) =>
        p.domains[0] === d0 &&
        p.domains[1] === d1 &&
        p.operation === operation &&
        (lagMs === undefined || Math.abs(p.lagMs - lagMs) <= this.config.lagToleranceMs)
    );
  }

  getConfig(): Readonly<PatternConfig> {
    return this.config;
  }

  private async closestMatch(
    domains: readonly [SensingDomain, SensingDomain],
    operation: CorrelationOperation,
    lagMs: number
  ): Promise<Pattern | undefined> {
    const matches = await this.findMatches(domains, operation, lagMs);
    return matches.reduce<Pattern | undefined>(
      (best, p) =>
        !best ||
        Math.abs(p.lagMs - lagMs) < Math.abs(best.lagMs - lagMs) ||
        (Math.abs(p.lagMs - lagMs) === Math.abs(best.lagMs - lagMs) && p.id < best.id)
          ? p
          : best,
      undefined
    );
  }

  private async save(previous: PatternState | null, next: PatternState): Promise<Pattern> {
    await this.store.put(next);
    const pattern = derivePattern(next, this.config);
    const from = previous ? derivePattern(previous, this.config).status : null;
    if (from !== pattern.status) {
      this.logger.info({ patternId: pattern.id, from, to: pattern.status }, 'Pattern status changed');
      this.emit('pattern:status_changed', { pattern, from, to: pattern.status });
    }
    return pattern;
  }
}
