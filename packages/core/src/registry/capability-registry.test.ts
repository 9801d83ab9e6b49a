/**
 * Capability Registry Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { generateKeyPairSync, sign, type KeyObject } from 'node:crypto';
import {
  AuthFailedError,
  BridgeNotFoundError,
  RateLimitedError,
  ValidationError,
  type CapabilityRegistration,
  type IdentityProvider,
} from '@sensorlink/shared';
import { CapabilityRegistry, computeReputation } from './capability-registry.js';
import { InMemoryCapabilityLedger } from './in-memory-ledger.js';
import { ChallengeAuthenticator, buildChallengeMessage } from './authenticator.js';
import type { ChallengeSigner } from './types.js';

const T0 = new Date('2026-03-01T12:00:00.000Z');

const createCapability = (overrides: Partial<CapabilityRegistration> = {}): CapabilityRegistration => ({
  bridgeId: 'mic-1',
  owner: 'owner-a',
  domain: 'acoustic',
  freqMin: 20,
  freqMax: 20000,
  maxSampleRate: 48000,
  bitDepth: 16,
  channels: 1,
  transports: ['usb3', 'udp'],
  mixingOps: ['cross_correlation'],
  costPerKs: 0,
  hostId: 'host-1',
  ...overrides,
});

const keysFor = (owners: Record<string, KeyObject>): IdentityProvider => ({
  getPublicKey: async (ownerId) => owners[ownerId] ?? null,
});

describe('CapabilityRegistry', () => {
  let ledger: InMemoryCapabilityLedger;
  let registry: CapabilityRegistry;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
    ledger = new InMemoryCapabilityLedger();
    registry = new CapabilityRegistry({ ledger });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('register()', () => {
    it('should reject a zero max sample rate and persist nothing', async () => {
      await expect(
        registry.register(createCapability({ maxSampleRate: 0 }), 'owner-a')
      ).rejects.toThrow(ValidationError);

      expect(registry.size).toBe(0);
      expect(ledger.size).toBe(0);
      expect(() => registry.get('mic-1')).toThrow(BridgeNotFoundError);
    });

    it('should reject callers other than the declared owner', async () => {
      const error = await registry.register(createCapability(), 'mallory').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AuthFailedError);
      expect(error).toMatchObject({ kind: 'AuthFailed' });
      expect(ledger.size).toBe(0);
    });

    it('should reject an inverted frequency range', async () => {
      await expect(
        registry.register(createCapability({ freqMin: 500, freqMax: 100 }), 'owner-a')
      ).rejects.toThrow('freqMin');
    });

    it('should start with the initial reputation and the current time', async () => {
      const capability = await registry.register(createCapability(), 'owner-a');

      expect(capability.reputation).toBe(500);
      expect(capability.lastSeen).toBe(T0.getTime());
    });

    it('should not let another identity take over a bridge id', async () => {
      await registry.register(createCapability(), 'owner-a');

      await expect(
        registry.register(createCapability({ owner: 'owner-b' }), 'owner-b')
      ).rejects.toThrow(AuthFailedError);
    });
  });

  describe('discover()', () => {
    it('should sort by descending score, preferring the more recent entry', async () => {
      await registry.register(createCapability({ bridgeId: 'older' }), 'owner-a');
      vi.advanceTimersByTime(10_000);
      await registry.register(createCapability({ bridgeId: 'newer' }), 'owner-a');

      const matches = await registry.discover();

      expect(matches.map((m) => m.capability.bridgeId)).toEqual(['newer', 'older']);
      expect(matches[0]!.score).toBeCloseTo(0.5, 10);
      expect(matches[0]!.score).toBeGreaterThanOrEqual(matches[1]!.score);
      expect(matches[1]!.score).toBeCloseTo(0.5 * Math.pow(0.5, 10_000 / 3_600_000), 10);
    });

    it('should break score ties by bridge id', async () => {
      await registry.register(createCapability({ bridgeId: 'b' }), 'owner-a');
      await registry.register(createCapability({ bridgeId: 'a' }), 'owner-a');

      const matches = await registry.discover();

      expect(matches.map((m) => m.capability.bridgeId)).toEqual(['a', 'b']);
    });

    it('should weigh cost as 1/(1+cost/1000)', async () => {
      await registry.register(createCapability({ costPerKs: 1000 }), 'owner-a');

      const [match] = await registry.discover();

      expect(match!.score).toBeCloseTo(0.25, 10);
    });

    it('should leave stale entries out without deleting them', async () => {
      await registry.register(createCapability(), 'owner-a');
      vi.advanceTimersByTime(60_001);

      expect(await registry.discover()).toEqual([]);
      expect(registry.get('mic-1').bridgeId).toBe('mic-1');
      expect(registry.isStale('mic-1')).toBe(true);

      await registry.heartbeat('mic-1', 'owner-a');
      expect(await registry.discover()).toHaveLength(1);
    });

    it('should filter by any of several domains', async () => {
      await registry.register(createCapability(), 'owner-a');
      await registry.register(
        createCapability({ bridgeId: 'accel-1', domain: 'vibration', freqMin: 0, freqMax: 500 }),
        'owner-a'
      );
      await registry.register(createCapability({ bridgeId: 'cam-1', domain: 'optical' }), 'owner-a');

      const matches = await registry.discover({ domains: ['acoustic', 'vibration'] });

      expect(matches.map((m) => m.capability.bridgeId)).toEqual(['accel-1', 'mic-1']);
    });

    it('should match overlapping frequency ranges through the decade index', async () => {
      await registry.register(createCapability(), 'owner-a');
      await registry.register(
        createCapability({ bridgeId: 'rf-1', domain: 'radio_frequency', freqMin: 1e8, freqMax: 1e9 }),
        'owner-a'
      );

      const audio = await registry.discover({ freqMin: 1000, freqMax: 5000 });
      const radio = await registry.discover({ freqMin: 5e8 });

      expect(audio.map((m) => m.capability.bridgeId)).toEqual(['mic-1']);
      expect(radio.map((m) => m.capability.bridgeId)).toEqual(['rf-1']);
    });

    it('should apply rate, cost, reputation and transport filters', async () => {
      await registry.register(createCapability(), 'owner-a');

      expect(await registry.discover({ minSampleRate: 96000 })).toEqual([]);
      expect(await registry.discover({ maxCost: 0 })).toHaveLength(1);
      expect(await registry.discover({ minReputation: 600 })).toEqual([]);
      expect(await registry.discover({ transports: ['usb3', 'udp'] })).toHaveLength(1);
      expect(await registry.discover({ transports: ['gige'] })).toEqual([]);
    });

    it('should use great-circle distance for the geographic radius', async () => {
      await registry.register(
        createCapability({ location: { latitude: 0, longitude: 1 } }),
        'owner-a'
      );
      await registry.register(createCapability({ bridgeId: 'nowhere' }), 'owner-a');

      const center = { latitude: 0, longitude: 0 };
      expect(await registry.discover({ geo: { center, radiusKm: 100 } })).toEqual([]);

      const matches = await registry.discover({ geo: { center, radiusKm: 200 } });
      expect(matches).toHaveLength(1);
      expect(matches[0]!.distanceKm).toBeCloseTo(111.2, 1);
    });

    it('should honor the limit', async () => {
      await registry.register(createCapability({ bridgeId: 'a' }), 'owner-a');
      await registry.register(createCapability({ bridgeId: 'b' }), 'owner-a');

      expect(await registry.discover({ limit: 1 })).toHaveLength(1);
    });
  });

  describe('heartbeat()', () => {
    it('should be idempotent for a retried heartbeat', async () => {
      await registry.register(createCapability(), 'owner-a');
      vi.advanceTimersByTime(1000);

      await registry.heartbeat('mic-1', 'owner-a');
      await registry.heartbeat('mic-1', 'owner-a');

      expect(ledger.size).toBe(2);
      expect(registry.get('mic-1').lastSeen).toBe(T0.getTime() + 1000);
    });

    it('should only accept heartbeats from the owner', async () => {
      await registry.register(createCapability(), 'owner-a');
      await expect(registry.heartbeat('mic-1', 'owner-b')).rejects.toThrow(AuthFailedError);
    });

    it('should fail for unknown bridges', async () => {
      await expect(registry.heartbeat('ghost', 'owner-a')).rejects.toThrow(BridgeNotFoundError);
    });
  });

  describe('rate()', () => {
    beforeEach(async () => {
      await registry.register(createCapability(), 'owner-a');
    });

    it('should scale the mean vote to 0..1000', async () => {
      expect(await registry.rate('mic-1', 'rater-1', 80)).toBe(800);
      expect(await registry.rate('mic-1', 'rater-2', 60)).toBe(700);
    });

    it('should count only the latest vote per rater', async () => {
      await registry.rate('mic-1', 'rater-1', 80);
      await registry.rate('mic-1', 'rater-2', 60);
      vi.advanceTimersByTime(60_000);

      expect(await registry.rate('mic-1', 'rater-1', 100)).toBe(800);
    });

    it('should refuse owners rating their own bridge', async () => {
      await expect(registry.rate('mic-1', 'owner-a', 100)).rejects.toThrow(ValidationError);
    });

    it('should refuse scores outside 0..100', async () => {
      await expect(registry.rate('mic-1', 'rater-1', 101)).rejects.toThrow(ValidationError);
      await expect(registry.rate('mic-1', 'rater-1', 50.5)).rejects.toThrow(ValidationError);
    });

    it('should rate-limit a rater re-rating the same bridge', async () => {
      await registry.rate('mic-1', 'rater-1', 80);
      vi.advanceTimersByTime(15_000);

      const error = await registry.rate('mic-1', 'rater-1', 10).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toMatchObject({ kind: 'RateLimited', retryAfterMs: 45_000 });
      expect(registry.get('mic-1').reputation).toBe(800);
    });

    it('should cap ratings per rater per window across bridges', async () => {
      const limited = new CapabilityRegistry({
        config: { maxRatingsPerWindow: 2, ratingCooldownMs: 0 },
      });
      for (const id of ['x', 'y', 'z']) {
        await limited.register(createCapability({ bridgeId: id }), 'owner-a');
      }

      await limited.rate('x', 'rater-1', 50);
      await limited.rate('y', 'rater-1', 50);

      await expect(limited.rate('z', 'rater-1', 50)).rejects.toThrow(RateLimitedError);
    });

    it('should forget rating history once it can no longer block', async () => {
      await registry.register(createCapability({ bridgeId: 'acc-1', domain: 'vibration' }), 'owner-a');
      await registry.rate('mic-1', 'rater-1', 80);
      await registry.rate('acc-1', 'rater-2', 40);
      expect(registry.getRatingStats()).toEqual({ trackedPairs: 2, trackedRaters: 2 });

      vi.advanceTimersByTime(3_600_000);
      await registry.rate('mic-1', 'rater-3', 60);

      expect(registry.getRatingStats()).toEqual({ trackedPairs: 1, trackedRaters: 1 });
    });

    it('should emit the new reputation', async () => {
      const spy = vi.fn();
      registry.on('bridge:rated', spy);

      await registry.rate('mic-1', 'rater-1', 30);

      expect(spy).toHaveBeenCalledWith({ bridgeId: 'mic-1', raterId: 'rater-1', reputation: 300 });
    });
  });

  describe('streams and resources', () => {
    beforeEach(async () => {
      await registry.register(createCapability(), 'owner-a');
    });

    it('should list a bridge:// URI per registered stream', async () => {
      const uri = await registry.registerStream('mic-1', 'owner-a', {
        streamType: 'audio',
        sampleRate: 48000,
        format: 'int16',
        bufferSize: 1024,
      });

      expect(uri).toBe('bridge://mic-1/stream/audio?rate=48000&format=int16');
      expect(registry.listResources('mic-1')).toEqual([uri]);
      expect(registry.getStreams('mic-1')).toHaveLength(1);
    });

    it('should replace a stream registered again under the same type', async () => {
      const descriptor = { streamType: 'audio', sampleRate: 48000, format: 'int16' as const, bufferSize: 1024 };
      await registry.registerStream('mic-1', 'owner-a', descriptor);
      await registry.registerStream('mic-1', 'owner-a', { ...descriptor, sampleRate: 16000 });

      expect(registry.getStreams('mic-1').map((s) => s.sampleRate)).toEqual([16000]);
    });

    it('should reject streams faster than the bridge', async () => {
      await expect(
        registry.registerStream('mic-1', 'owner-a', {
          streamType: 'audio',
          sampleRate: 96000,
          format: 'int16',
          bufferSize: 1024,
        })
      ).rejects.toThrow(ValidationError);
    });
  });

  describe('unregister() and hydrate()', () => {
    it('should hide an unregistered bridge but keep its log', async () => {
      await registry.register(createCapability(), 'owner-a');
      await registry.unregister('mic-1', 'owner-a');

      expect(await registry.discover()).toEqual([]);
      expect(() => registry.get('mic-1')).toThrow(BridgeNotFoundError);
      expect(ledger.size).toBe(2);
    });

    it('should rebuild the same view from the ledger', async () => {
      await registry.register(createCapability(), 'owner-a');
      await registry.rate('mic-1', 'rater-1', 90);

      const replica = new CapabilityRegistry({ ledger });
      expect(await replica.hydrate()).toBe(1);

      expect(replica.get('mic-1')).toEqual(registry.get('mic-1'));
      expect(replica.get('mic-1').reputation).toBe(900);
    });
  });

  describe('authenticate()', () => {
    const ownerKeys = generateKeyPairSync('ed25519');
    const otherKeys = generateKeyPairSync('ed25519');

    const signWith =
      (key: KeyObject): ChallengeSigner =>
      async (challenge) =>
        new Uint8Array(sign(null, challenge.message, key));

    beforeEach(async () => {
      registry = new CapabilityRegistry({
        ledger,
        identity: keysFor({ 'owner-a': ownerKeys.publicKey }),
      });
      await registry.register(createCapability(), 'owner-a');
    });

    it('should accept a signature from the owner key', async () => {
      const result = await registry.authenticate('mic-1', 'agent-7', signWith(ownerKeys.privateKey));

      expect(result).toEqual({
        bridgeId: 'mic-1',
        requesterId: 'agent-7',
        owner: 'owner-a',
        verifiedAt: T0.getTime(),
      });
    });

    it('should fail with AuthFailed for a signature from another key', async () => {
      await expect(
        registry.authenticate('mic-1', 'agent-7', signWith(otherKeys.privateKey))
      ).rejects.toThrow(AuthFailedError);
    });

    it('should fail when the bridge never answers', async () => {
      const pending = expect(
        registry.authenticate('mic-1', 'agent-7', () => new Promise<Uint8Array>(() => undefined))
      ).rejects.toThrow('no signature within 5000ms');

      await vi.advanceTimersByTimeAsync(5001);
      await pending;
    });

    it('should fail for unknown bridges', async () => {
      await expect(
        registry.authenticate('ghost', 'agent-7', signWith(ownerKeys.privateKey))
      ).rejects.toThrow(BridgeNotFoundError);
    });
  });
});

describe('ChallengeAuthenticator', () => {
  const keys = generateKeyPairSync('ed25519');
  const identity = keysFor({ 'owner-a': keys.publicKey });

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(T0);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should bind nonce, little-endian timestamp and requester into the message', () => {
    const message = buildChallengeMessage(new Uint8Array(32).fill(7), 1000, 'agent');

    expect(message.byteLength).toBe(45);
    expect(message[0]).toBe(7);
    expect(message[32]).toBe(0xe8);
    expect(message[33]).toBe(0x03);
    expect(message[34]).toBe(0);
    expect(new TextDecoder().decode(message.subarray(40))).toBe('agent');
  });

  it('should refuse a nonce redeemed twice', async () => {
    const auth = new ChallengeAuthenticator(identity, 5000);
    const challenge = auth.issue('mic-1', 'agent-7');
    const signature = new Uint8Array(sign(null, challenge.message, keys.privateKey));

    await auth.verify(challenge, signature, 'owner-a');

    await expect(auth.verify(challenge, signature, 'owner-a')).rejects.toThrow('already used');
  });

  it('should refuse an expired challenge', async () => {
    const auth = new ChallengeAuthenticator(identity, 5000);
    const challenge = auth.issue('mic-1', 'agent-7');
    const signature = new Uint8Array(sign(null, challenge.message, keys.privateKey));

    vi.setSystemTime(T0.getTime() + 6000);

    await expect(auth.verify(challenge, signature, 'owner-a')).rejects.toThrow('expired');
  });

  it('should refuse owners without a known key', async () => {
    const auth = new ChallengeAuthenticator(identity, 5000);
    const challenge = auth.issue('mic-1', 'agent-7');

    await expect(auth.verify(challenge, new Uint8Array(64), 'owner-z')).rejects.toThrow(
      "no public key for owner 'owner-z'"
    );
    expect(auth.pendingChallenges).toBe(0);
  });
});

describe('computeReputation()', () => {
  it('should fall back to the initial reputation when unrated', () => {
    expect(computeReputation(new Map(), 500)).toBe(500);
  });

  it('should round the scaled mean', () => {
    const votes = new Map([
      ['a', { score: 33 }],
      ['b', { score: 34 }],
    ]);
    expect(computeReputation(votes, 500)).toBe(335);
  });
});
