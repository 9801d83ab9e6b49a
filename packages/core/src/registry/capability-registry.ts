/**
 * Capability Registry
 * Advertises bridge capabilities and answers scored discovery queries.
 *
 * Every write appends a content-addressed event to the bridge's log; the
 * in-memory view of the bridge is then recomputed from that log. Writers are
 * serialized per bridge id, readers work off the current view and never wait.
 */

import { EventEmitter } from 'eventemitter3';
import {
  BridgeNotFoundError,
  AuthFailedError,
  RateLimitedError,
  ValidationError,
  capabilityRegistrationSchema,
  discoveryQuerySchema,
  streamDescriptorSchema,
  createChildLogger,
  formatIssues,
  logDiscoveryQuery,
  type BridgeCapability,
  type CapabilityEvent,
  type CapabilityEventBody,
  type CapabilityLedger,
  type CapabilityRegistration,
  type DiscoveryMatch,
  type DiscoveryQuery,
  type IdentityProvider,
  type SensingDomain,
  type StreamDescriptor,
} from '@sensorlink/shared';
import { KeyedMutex } from '../lock/keyed-mutex.js';
import { formatBridgeUri } from '../protocol/bridge-uri.js';
import { ChallengeAuthenticator } from './authenticator.js';
import { createCapabilityEvent } from './content-address.js';
import { InMemoryCapabilityLedger } from './in-memory-ledger.js';
import { RatingThrottle } from './rating-throttle.js';
import { frequencyBucket, frequencyBuckets, haversineKm, scoreCapability } from './scoring.js';
import type {
  AuthResult,
  CapabilityRegistryOptions,
  ChallengeSigner,
  RegistryConfig,
  RegistryEntry,
  RegistryEvents,
} from './types.js';

const DEFAULT_CONFIG: RegistryConfig = {
  heartbeatWindowMs: 60000,
  recencyHalfLifeMs: 3600000,
  initialReputation: 500,
  authTimeoutMs: 5000,
  ratingCooldownMs: 60000,
  maxRatingsPerWindow: 20,
  ratingWindowMs: 3600000,
};

const NO_IDENTITY: IdentityProvider = {
  getPublicKey: async () => null,
};

/**
 * Fold one bridge's event log into its materialized view
 */
export function foldEvents(
  events: readonly CapabilityEvent[],
  initialReputation: number
): RegistryEntry | null {
  let entry: RegistryEntry | null = null;

  for (const { body } of events) {
    if (body.type === 'registered') {
      entry = {
        capability: {
          ...body.capability,
          reputation: initialReputation,
          lastSeen: Math.max(entry?.capability.lastSeen ?? 0, body.at),
        },
        streams: entry?.streams ?? [],
        votes: entry?.votes ?? new Map(),
        active: true,
      };
      continue;
    }

    if (!entry) continue;

    switch (body.type) {
      case 'heartbeat':
        entry.capability.lastSeen = Math.max(entry.capability.lastSeen, body.at);
        break;
      case 'rated': {
        const previous = entry.votes.get(body.raterId);
        if (!previous || body.at >= previous.at) {
          entry.votes.set(body.raterId, { score: body.score, at: body.at });
        }
        break;
      }
      case 'stream_registered':
        entry.streams = [
          ...entry.streams.filter((s) => s.streamType !== body.descriptor.streamType),
          body.descriptor,
        ];
        break;
      case 'unregistered':
        entry.active = false;
        break;
    }
  }

  if (entry) {
    entry.capability.reputation = computeReputation(entry.votes, initialReputation);
  }
  return entry;
}

/**
 * Mean of the latest vote per rater, scaled from 0..100 to 0..1000
 */
export function computeReputation(
  votes: ReadonlyMap<string, { score: number }>,
  initialReputation: number
): number {
  if (votes.size === 0) return initialReputation;
  let sum = 0;
  for (const vote of votes.values()) sum += vote.score;
  return Math.round((sum / votes.size) * 10);
}

export class CapabilityRegistry extends EventEmitter<RegistryEvents> {
  private config: RegistryConfig;
  private ledger: CapabilityLedger;
  private authenticator: ChallengeAuthenticator;
  private throttle: RatingThrottle;
  private mutex = new KeyedMutex();
  private entries: Map<string, RegistryEntry> = new Map();
  private byDomain: Map<SensingDomain, Set<string>> = new Map();
  private byFrequency: Map<number, Set<string>> = new Map();
  private logger = createChildLogger({ component: 'CapabilityRegistry' });

  constructor(options: CapabilityRegistryOptions = {}) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.ledger = options.ledger ?? new InMemoryCapabilityLedger();
    this.authenticator = new ChallengeAuthenticator(
      options.identity ?? NO_IDENTITY,
      this.config.authTimeoutMs
    );
    this.throttle = new RatingThrottle({
      cooldownMs: this.config.ratingCooldownMs,
      maxRatingsPerWindow: this.config.maxRatingsPerWindow,
      windowMs: this.config.ratingWindowMs,
    });
  }

  // ===========================================
  // Writes
  // ===========================================

  /**
   * Register or re-register a bridge. Only the declared owner may do so.
   */
  async register(registration: CapabilityRegistration, caller: string): Promise<BridgeCapability> {
    const parsed = capabilityRegistrationSchema.safeParse(registration);
    if (!parsed.success) {
      throw new ValidationError(`Invalid capability: ${formatIssues(parsed.error)}`, {
        bridgeId: registration.bridgeId,
      });
    }
    const capability = parsed.data;

    if (capability.owner !== caller) {
      throw new AuthFailedError('caller is not the declared owner', { bridgeId: capability.bridgeId });
    }

    return this.mutex.runExclusive(capability.bridgeId, async () => {
      const existing = this.entries.get(capability.bridgeId);
      if (existing && existing.capability.owner !== caller) {
        throw new AuthFailedError('bridge id is owned by another identity', {
          bridgeId: capability.bridgeId,
        });
      }

      const entry = await this.appendAndRefresh(capability.bridgeId, {
        type: 'registered',
        at: Date.now(),
        capability,
      });

      this.logger.info(
        { bridgeId: capability.bridgeId, domain: capability.domain },
        'Bridge registered'
      );
      this.emit('bridge:registered', { capability: entry.capability });
      return { ...entry.capability };
    });
  }

  /**
   * Refresh last-seen. Retrying the same heartbeat is a no-op.
   */
  async heartbeat(bridgeId: string, caller: string): Promise<number> {
    return this.mutex.runExclusive(bridgeId, async () => {
      this.requireOwner(bridgeId, caller);
      const entry = await this.appendAndRefresh(bridgeId, { type: 'heartbeat', at: Date.now() });
      this.emit('bridge:heartbeat', { bridgeId, lastSeen: entry.capability.lastSeen });
      return entry.capability.lastSeen;
    });
  }

  async unregister(bridgeId: string, caller: string): Promise<void> {
    await this.mutex.runExclusive(bridgeId, async () => {
      this.requireOwner(bridgeId, caller);
      await this.appendAndRefresh(bridgeId, { type: 'unregistered', at: Date.now() });
      this.logger.info({ bridgeId }, 'Bridge unregistered');
      this.emit('bridge:unregistered', { bridgeId });
    });
  }

  async registerStream(bridgeId: string, caller: string, descriptor: StreamDescriptor): Promise<string> {
    const parsed = streamDescriptorSchema.safeParse(descriptor);
    if (!parsed.success) {
      throw new ValidationError(`Invalid stream descriptor: ${formatIssues(parsed.error)}`, { bridgeId });
    }

    return this.mutex.runExclusive(bridgeId, async () => {
      const entry = this.requireOwner(bridgeId, caller);
      if (parsed.data.sampleRate > entry.capability.maxSampleRate) {
        throw new ValidationError(
          `Stream rate ${parsed.data.sampleRate} exceeds bridge maximum ${entry.capability.maxSampleRate}`,
          { bridgeId }
        );
      }

      await this.appendAndRefresh(bridgeId, {
        type: 'stream_registered',
        at: Date.now(),
        descriptor: parsed.data,
      });
      this.emit('stream:registered', { bridgeId, descriptor: parsed.data });
      return this.streamUri(bridgeId, parsed.data);
    });
  }

  /**
   * Contribute a 0..100 score to a bridge's reputation
   */
  async rate(bridgeId: string, raterId: string, score: number): Promise<number> {
    if (!Number.isInteger(score) || score < 0 || score > 100) {
      throw new ValidationError(`Rating must be an integer in 0..100, got ${score}`, { bridgeId });
    }

    return this.mutex.runExclusive(bridgeId, async () => {
      const entry = this.requireActive(bridgeId);
      if (entry.capability.owner === raterId) {
        throw new ValidationError('Owners cannot rate their own bridges', { bridgeId, raterId });
      }

      const now = Date.now();
      this.throttle.cleanup(now);
      const check = this.throttle.canRate(raterId, bridgeId, now);
      if (!check.allowed) {
        throw new RateLimitedError(check.retryAfterMs ?? this.config.ratingCooldownMs, {
          bridgeId,
          raterId,
          reason: check.reason,
        });
      }

      const updated = await this.appendAndRefresh(bridgeId, { type: 'rated', at: now, raterId, score });
      this.throttle.recordRating(raterId, bridgeId, now);

      this.emit('bridge:rated', { bridgeId, raterId, reputation: updated.capability.reputation });
      return updated.capability.reputation;
    });
  }

  /**
   * Challenge the bridge to prove it holds its owner's key
   */
  async authenticate(bridgeId: string, requesterId: string, signer: ChallengeSigner): Promise<AuthResult> {
    const entry = this.requireActive(bridgeId);
    const result = await this.authenticator.authenticate(
      bridgeId,
      requesterId,
      entry.capability.owner,
      signer
    );
    this.logger.info({ bridgeId, requesterId }, 'Bridge authenticated');
    return result;
  }

  /**
   * Rebuild every materialized view and index from the ledger
   */
  async hydrate(): Promise<number> {
    const events = await this.ledger.listAll();
    const grouped = new Map<string, CapabilityEvent[]>();
    for (const event of events) {
      const list = grouped.get(event.bridgeId) ?? [];
      list.push(event);
      grouped.set(event.bridgeId, list);
    }

    this.entries.clear();
    this.byDomain.clear();
    this.byFrequency.clear();

    for (const [bridgeId, log] of grouped) {
      const entry = foldEvents(log, this.config.initialReputation);
      if (entry) this.install(bridgeId, entry);
    }

    this.logger.info({ bridges: this.entries.size, events: events.length }, 'Registry hydrated');
    return this.entries.size;
  }

  // ===========================================
  // Reads
  // ===========================================

  /**
   * Filter-then-score discovery over fresh, registered bridges
   */
  async discover(query: DiscoveryQuery = {}): Promise<DiscoveryMatch[]> {
    const parsed = discoveryQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ValidationError(`Invalid discovery query: ${formatIssues(parsed.error)}`);
    }
    const q = parsed.data;
    const now = Date.now();

    const matches: DiscoveryMatch[] = [];
    const candidates = this.candidateIds(q);

    for (const bridgeId of candidates) {
      const entry = this.entries.get(bridgeId);
      if (!entry || !entry.active) continue;

      const c = entry.capability;
      const ageMs = now - c.lastSeen;
      if (ageMs > this.config.heartbeatWindowMs) continue;

      if (q.domains && !q.domains.includes(c.domain)) continue;
      if (q.freqMin !== undefined && c.freqMax < q.freqMin) continue;
      if (q.freqMax !== undefined && c.freqMin > q.freqMax) continue;
      if (q.minSampleRate !== undefined && c.maxSampleRate < q.minSampleRate) continue;
      if (q.minReputation !== undefined && c.reputation < q.minReputation) continue;
      if (q.maxCost !== undefined && c.costPerKs > q.maxCost) continue;
      if (q.transports && !q.transports.every((t) => c.transports.includes(t))) continue;

      let distanceKm: number | undefined;
      if (q.geo) {
        if (!c.location) continue;
        distanceKm = haversineKm(q.geo.center, c.location);
        if (distanceKm > q.geo.radiusKm) continue;
      }

      matches.push({
        capability: { ...c },
        score: scoreCapability(c, now, this.config.recencyHalfLifeMs),
        ageMs,
        distanceKm,
      });
    }

    matches.sort((a, b) => b.score - a.score || compareIds(a.capability.bridgeId, b.capability.bridgeId));
    const results = q.limit !== undefined ? matches.slice(0, q.limit) : matches;

    logDiscoveryQuery(q.domains ?? [], candidates.size, results.length);
    return results;
  }

  /**
   * Current view of a bridge, stale or not
   */
  get(bridgeId: string): BridgeCapability {
    return { ...this.requireActive(bridgeId).capability };
  }

  isStale(bridgeId: string, now: number = Date.now()): boolean {
    const entry = this.requireActive(bridgeId);
    return now - entry.capability.lastSeen > this.config.heartbeatWindowMs;
  }

  getStreams(bridgeId: string): StreamDescriptor[] {
    return [...this.requireActive(bridgeId).streams];
  }

  /**
   * bridge:// URIs of every stream the bridge registered
   */
  listResources(bridgeId: string): string[] {
    return this.requireActive(bridgeId).streams.map((s) => this.streamUri(bridgeId, s));
  }

  /** Rater/bridge pairs and raters the rating throttle still remembers */
  getRatingStats(): { trackedPairs: number; trackedRaters: number } {
    return this.throttle.getStats();
  }

  get size(): number {
    return this.entries.size;
  }

  // ===========================================
  // Internals
  // ===========================================

  private async appendAndRefresh(bridgeId: string, body: CapabilityEventBody): Promise<RegistryEntry> {
    const appended = await this.ledger.append(createCapabilityEvent(bridgeId, body));
    if (!appended) {
      this.logger.debug({ bridgeId, type: body.type }, 'Duplicate event ignored');
    }

    const entry = foldEvents(await this.ledger.listByBridge(bridgeId), this.config.initialReputation);
    if (!entry) {
      throw new BridgeNotFoundError(bridgeId);
    }
    this.install(bridgeId, entry);
    return entry;
  }

  private install(bridgeId: string, entry: RegistryEntry): void {
    const previous = this.entries.get(bridgeId);
    if (previous) {
      this.byDomain.get(previous.capability.domain)?.delete(bridgeId);
      for (const bucket of frequencyBuckets(previous.capability.freqMin, previous.capability.freqMax)) {
        this.byFrequency.get(bucket)?.delete(bridgeId);
      }
    }

    this.entries.set(bridgeId, entry);
    if (!entry.active) return;

    const domainSet = this.byDomain.get(entry.capability.domain) ?? new Set<string>();
    domainSet.add(bridgeId);
    this.byDomain.set(entry.capability.domain, domainSet);

    for (const bucket of frequencyBuckets(entry.capability.freqMin, entry.capability.freqMax)) {
      const set = this.byFrequency.get(bucket) ?? new Set<string>();
      set.add(bridgeId);
      this.byFrequency.set(bucket, set);
    }
  }

  private candidateIds(query: DiscoveryQuery): Set<string> {
    let candidates: Set<string> | null = null;

    if (query.domains) {
      candidates = new Set();
      for (const domain of query.domains) {
        for (const id of this.byDomain.get(domain) ?? []) candidates.add(id);
      }
    }

    if (query.freqMin !== undefined || query.freqMax !== undefined) {
      const low = frequencyBucket(query.freqMin ?? 0);
      const high = query.freqMax !== undefined ? frequencyBucket(query.freqMax) : Infinity;
      const inRange = new Set<string>();
      for (const [bucket, ids] of this.byFrequency) {
        if (bucket < low || bucket > high) continue;
        for (const id of ids) inRange.add(id);
      }
      candidates = candidates ? intersect(candidates, inRange) : inRange;
    }

    return candidates ?? new Set(this.entries.keys());
  }

  private requireActive(bridgeId: string): RegistryEntry {
    const entry = this.entries.get(bridgeId);
    if (!entry || !entry.active) {
      throw new BridgeNotFoundError(bridgeId);
    }
    return entry;
  }

  private requireOwner(bridgeId: string, caller: string): RegistryEntry {
    const entry = this.requireActive(bridgeId);
    if (entry.capability.owner !== caller) {
      throw new AuthFailedError('caller is not the bridge owner', { bridgeId });
    }
    return entry;
  }

  private streamUri(bridgeId: string, descriptor: StreamDescriptor): string {
    return formatBridgeUri({
      bridgeId,
      resourceType: 'stream',
      streamSpec: descriptor.streamType,
      params: { rate: descriptor.sampleRate, format: descriptor.format },
    });
  }
}

function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function intersect(a: Set<string>, b: Set<string>): Set<string> {
  const result = new Set<string>();
  for (const id of a) {
    if (b.has(id)) result.add(id);
  }
  return result;
}
