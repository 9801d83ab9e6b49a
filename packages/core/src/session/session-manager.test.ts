/**
 * Stream Session Manager Tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  BridgeNotFoundError,
  RejectedParamsError,
  SESSION_STATES,
  StreamOverrunError,
  SyncLostError,
  ValidationError,
  type BridgeCapability,
} from '@sensorlink/shared';
import { SimulatedBridgeConnector } from '../../../../tests/mocks/simulated-bridge.js';
import { encodePacket } from '../protocol/packet-codec.js';
import { StreamSessionManager } from './session-manager.js';
import { selectSyncSource, selectTransport } from './sync-selector.js';
import type { CapabilityLookup, SessionConfig } from './types.js';

const createCapability = (overrides: Partial<BridgeCapability> = {}): BridgeCapability => ({
  bridgeId: 'mic-1',
  owner: 'owner-a',
  domain: 'acoustic',
  freqMin: 20,
  freqMax: 20000,
  maxSampleRate: 48000,
  bitDepth: 16,
  channels: 2,
  transports: ['tcp', 'usb3'],
  mixingOps: ['cross_correlation'],
  costPerKs: 0,
  hostId: 'host-1',
  reputation: 500,
  lastSeen: 0,
  ...overrides,
});

const createLookup = (capabilities: BridgeCapability[]): CapabilityLookup => {
  const byId = new Map(capabilities.map((c) => [c.bridgeId, c] as const));
  return {
    get: (bridgeId) => {
      const capability = byId.get(bridgeId);
      if (!capability) throw new BridgeNotFoundError(bridgeId);
      return capability;
    },
  };
};

const TEST_CONFIG: Partial<SessionConfig> = {
  sequenceGapTolerance: 2,
  idleTimeoutMs: 1000,
  maxReconnectAttempts: 2,
  reconnectBaseDelayMs: 100,
  reconnectMaxDelayMs: 1000,
  channelCapacity: 8,
  highWatermark: 6,
  lowWatermark: 2,
};

const URI = 'bridge://mic-1/stream/audio';

describe('StreamSessionManager', () => {
  let connector: SimulatedBridgeConnector;
  let manager: StreamSessionManager;

  beforeEach(() => {
    vi.useFakeTimers();
    connector = new SimulatedBridgeConnector().add('mic-1', { domain: 'acoustic' });
    manager = new StreamSessionManager({
      registry: createLookup([createCapability()]),
      connector,
      config: TEST_CONFIG,
    });
  });

  afterEach(async () => {
    await manager.closeAll();
    vi.useRealTimers();
  });

  describe('subscribe()', () => {
    it('should negotiate defaults from the capability and open the session', async () => {
      const session = await manager.subscribe(URI);

      expect(session.getState()).toBe(SESSION_STATES.OPEN);
      expect(session.negotiation).toEqual({
        bridgeId: 'mic-1',
        streamSpec: 'audio',
        rate: 48000,
        format: 'int16',
        channels: 2,
        transport: 'usb3',
        window: undefined,
      });
      expect(manager.size).toBe(1);
    });

    it('should take parameters from the URI, overridden by explicit params', async () => {
      const session = await manager.subscribe(`${URI}?rate=16000&channels=1&format=uint8`, { rate: 8000 });

      expect(session.negotiation.rate).toBe(8000);
      expect(session.negotiation.channels).toBe(1);
      expect(session.negotiation.format).toBe('uint8');
    });

    it.each([
      ['a rate above the device maximum', `${URI}?rate=96000`],
      ['more channels than the device has', `${URI}?channels=3`],
      ['an integer format wider than the device', `${URI}?format=int32`],
      ['a transport the bridge does not advertise', `${URI}?transport=gige`],
      ['a snapshot resource', 'bridge://mic-1/snapshot/audio'],
    ])('should reject %s', async (_label, uri) => {
      await expect(manager.subscribe(uri)).rejects.toThrow(RejectedParamsError);
      expect(connector.links).toHaveLength(0);
    });

    it('should allow float formats regardless of bit depth', async () => {
      const session = await manager.subscribe(`${URI}?format=float64`);
      expect(session.negotiation.format).toBe('float64');
    });

    it('should fail for bridges the registry does not know', async () => {
      await expect(manager.subscribe('bridge://ghost/stream/audio')).rejects.toThrow(BridgeNotFoundError);
    });

    it('should surface a refused connection as RejectedParams and keep nothing', async () => {
      connector.refuse('mic-1', 1);

      await expect(manager.subscribe(URI)).rejects.toThrow(
        'Stream parameters rejected: bridge refused the stream: connection refused'
      );
      expect(manager.size).toBe(0);
    });

    it('should select the most preferred acceptable sync source', async () => {
      connector.add('mic-1', {
        domain: 'acoustic',
        handshake: {
          syncSources: {
            gps_pulse: { score: 0.3, driftNs: 0 },
            ntp: { score: 0.9, driftNs: 500 },
          },
        },
      });

      const opened = vi.fn();
      manager.on('session:opened', opened);
      const session = await manager.subscribe(URI);

      expect(session.getSync()).toEqual({ source: 'ntp', confidence: 90, driftNs: 500 });
      expect(opened).toHaveBeenCalledWith(
        expect.objectContaining({ sessionId: session.id, sync: { source: 'ntp', confidence: 90, driftNs: 500 } })
      );
    });
  });

  describe('packet delivery', () => {
    it('should deliver in sequence order and drop duplicates', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();

      link.sendPacket([1, 2], { sequence: 0n });
      link.sendPacket([3, 4], { sequence: 1n });
      link.sendPacket([3, 4], { sequence: 1n });
      link.sendPacket([1, 2], { sequence: 0n });
      link.sendPacket([5, 6], { sequence: 2n });

      const sequences: Array<bigint | undefined> = [];
      for (let i = 0; i < 3; i++) {
        const packet = await session.read();
        sequences.push(packet?.sequence);
      }

      expect(sequences).toEqual([0n, 1n, 2n]);
      expect(session.getStats()).toMatchObject({ received: 5, delivered: 3, duplicates: 2 });
    });

    it('should reassemble packets split across chunks', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();
      const bytes = encodePacket(link.sendPacket([7, 8], { sequence: 0n }));

      link.sendBytes(bytes.subarray(0, 10));
      link.sendBytes(bytes.subarray(10));

      expect(session.buffered).toBe(1);
      expect(session.getStats().duplicates).toBe(1);
    });

    it('should count a gap within tolerance as loss and stay open', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();
      const gap = vi.fn();
      session.on('sequence:gap', gap);

      link.sendPacket([0, 0], { sequence: 0n });
      link.sendPacket([0, 0], { sequence: 3n });

      expect(session.getState()).toBe(SESSION_STATES.OPEN);
      expect(session.getStats().lost).toBe(2);
      expect(gap).toHaveBeenCalledWith({ sessionId: session.id, expected: 1n, received: 3n, missing: 2n });
    });
  });

  describe('recovery', () => {
    it('should enter ERROR on the packet that opens a gap beyond tolerance', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();

      link.sendPacket([0, 0], { sequence: 0n });
      link.sendPacket([0, 0], { sequence: 4n });

      expect(session.getState()).toBe(SESSION_STATES.ERROR);
      expect(link.closed).toBe(true);
      expect(session.buffered).toBe(1);
    });

    it('should reconnect with backoff and resume after the gap', async () => {
      const session = await manager.subscribe(URI);
      const scheduled = vi.fn();
      session.on('reconnect:scheduled', scheduled);

      connector.lastLink().sendPacket([0, 0], { sequence: 0n });
      connector.lastLink().sendPacket([0, 0], { sequence: 9n });
      expect(scheduled).toHaveBeenCalledWith({ sessionId: session.id, attempt: 1, delayMs: 100 });

      await vi.advanceTimersByTimeAsync(100);
      await vi.waitFor(() => expect(session.getStats().reconnects).toBe(1));

      expect(session.getState()).toBe(SESSION_STATES.OPEN);
      expect(connector.links).toHaveLength(2);

      connector.lastLink().sendPacket([1, 1], { sequence: 20n });
      expect((await session.read())?.sequence).toBe(0n);
      expect((await session.read())?.sequence).toBe(20n);
    });

    it('should surface SyncLost once reconnect attempts are exhausted', async () => {
      const session = await manager.subscribe(URI);
      const errors = vi.fn();
      const delays: number[] = [];
      manager.on('session:error', errors);
      session.on('reconnect:scheduled', ({ delayMs }) => delays.push(delayMs));
      connector.refuse('mic-1', 10);

      connector.lastLink().sendPacket([0, 0], { sequence: 0n });
      connector.lastLink().sendPacket([0, 0], { sequence: 5n });

      await vi.advanceTimersByTimeAsync(100);
      await vi.advanceTimersByTimeAsync(200);
      await vi.waitFor(() => expect(session.getState()).toBe(SESSION_STATES.CLOSED));

      expect(delays).toEqual([100, 200]);
      expect(errors).toHaveBeenCalledWith({
        sessionId: session.id,
        error: expect.any(SyncLostError),
      });
      expect((await session.read())?.sequence).toBe(0n);
      await expect(session.read()).rejects.toThrow(SyncLostError);
      expect(manager.size).toBe(0);
    });

    it('should raise a Timeout when no packet arrives within the idle window', async () => {
      const session = await manager.subscribe(URI);
      const errors = vi.fn();
      session.on('error', errors);

      vi.advanceTimersByTime(600);
      connector.lastLink().sendPacket([0, 0], { sequence: 0n });
      vi.advanceTimersByTime(600);
      expect(session.getState()).toBe(SESSION_STATES.OPEN);

      vi.advanceTimersByTime(400);

      expect(session.getState()).toBe(SESSION_STATES.ERROR);
      expect(errors).toHaveBeenCalledWith({
        sessionId: session.id,
        error: expect.objectContaining({ kind: 'Timeout', code: 'E3001' }),
      });
    });

    it('should treat a dropped link like a broken stream', async () => {
      const session = await manager.subscribe(URI);

      connector.lastLink().drop(new Error('reset by peer'));

      expect(session.getState()).toBe(SESSION_STATES.ERROR);
    });
  });

  describe('flow control', () => {
    it('should pause the bridge at the high watermark and resume at the low one', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();
      const backpressure = vi.fn();
      session.on('backpressure', backpressure);

      for (let i = 0; i < 6; i++) link.sendPacket([i, i]);

      expect(session.getState()).toBe(SESSION_STATES.PAUSED);
      expect(link.controls).toEqual([{ type: 'pause' }]);
      expect(backpressure).toHaveBeenCalledWith({ sessionId: session.id, paused: true, buffered: 6 });

      for (let i = 0; i < 4; i++) await session.read();

      expect(session.getState()).toBe(SESSION_STATES.OPEN);
      expect(link.controls).toEqual([{ type: 'pause' }, { type: 'resume' }]);
      expect(backpressure).toHaveBeenLastCalledWith({ sessionId: session.id, paused: false, buffered: 2 });
    });

    it('should raise Overrun instead of dropping when a paused bridge keeps sending', async () => {
      const session = await manager.subscribe(URI);
      const link = connector.lastLink();
      const errors = vi.fn();
      session.on('error', errors);

      for (let i = 0; i < 9; i++) link.sendPacket([i, i]);

      expect(session.getState()).toBe(SESSION_STATES.CLOSED);
      expect(errors).toHaveBeenCalledWith({
        sessionId: session.id,
        error: expect.objectContaining({ kind: 'Overrun' }),
      });

      for (let i = 0; i < 8; i++) expect((await session.read())?.sequence).toBe(BigInt(i));
      await expect(session.read()).rejects.toThrow(StreamOverrunError);
    });

    it('should overwrite the oldest packets under drop_oldest and report it', async () => {
      const session = await manager.subscribe(URI, {}, { overflowPolicy: 'drop_oldest' });
      const link = connector.lastLink();
      const overrun = vi.fn();
      session.on('overrun', overrun);

      for (let i = 0; i < 10; i++) link.sendPacket([i, i]);

      expect(session.getState()).toBe(SESSION_STATES.OPEN);
      expect(link.controls).toEqual([]);
      expect(overrun).toHaveBeenLastCalledWith({ sessionId: session.id, overwritten: 2 });
      expect(session.getStats().overwritten).toBe(2);
      expect((await session.read())?.sequence).toBe(2n);
    });
  });

  describe('unsubscribe()', () => {
    it('should close the session, its link and release it', async () => {
      const session = await manager.subscribe(URI);
      const closed = vi.fn();
      manager.on('session:closed', closed);

      await manager.unsubscribe(session.id);

      expect(session.getState()).toBe(SESSION_STATES.CLOSED);
      expect(connector.lastLink().closed).toBe(true);
      expect(closed).toHaveBeenCalledWith({ sessionId: session.id });
      expect(manager.size).toBe(0);
      await expect(session.read()).resolves.toBeNull();
    });

    it('should reject unknown session ids', async () => {
      await expect(manager.unsubscribe('missing')).rejects.toThrow(ValidationError);
    });
  });
});

describe('StreamSessionManager.bundle()', () => {
  it('should align streams of different rates onto the slower timeline', async () => {
    const connector = new SimulatedBridgeConnector()
      .add('mic-1', { domain: 'acoustic', signal: (t) => t * 1000, durationMs: 200 })
      .add('acc-1', { domain: 'vibration', signal: (t) => -t * 1000, durationMs: 200 });
    const manager = new StreamSessionManager({
      registry: createLookup([
        createCapability({ maxSampleRate: 400, channels: 1 }),
        createCapability({ bridgeId: 'acc-1', domain: 'vibration', maxSampleRate: 100, channels: 1 }),
      ]),
      connector,
    });

    const mic = await manager.subscribe('bridge://mic-1/stream/audio');
    const acc = await manager.subscribe('bridge://acc-1/stream/accel');
    const bundle = await manager.bundle([mic.id, acc.id], 100);
    await manager.closeAll();

    expect(bundle.sampleRate).toBe(100);
    expect(bundle.timestampsNs).toHaveLength(10);
    expect(Array.from(bundle.streams[0]!.values)).toEqual([0, 10, 20, 30, 40, 50, 60, 70, 80, 90]);
    expect(Array.from(bundle.streams[1]!.values)).toEqual([0, -10, -20, -30, -40, -50, -60, -70, -80, -90]);
    expect(bundle.streams[0]!.provenance[1]).toEqual([bundle.startNs + 10_000_000n]);
    expect(bundle.streams[0]!.nativeRate).toBe(400);
  });

  it('should continue the next window from samples left over in the last packet', async () => {
    const connector = new SimulatedBridgeConnector().add('mic-1', {
      domain: 'acoustic',
      signal: (t) => t * 1000,
      durationMs: 200,
      samplesPerPacket: 3,
    });
    const manager = new StreamSessionManager({
      registry: createLookup([createCapability({ maxSampleRate: 100, channels: 1 })]),
      connector,
    });

    const mic = await manager.subscribe('bridge://mic-1/stream/audio');
    const first = await manager.bundle([mic.id], 40);
    const second = await manager.bundle([mic.id], 40);
    await manager.closeAll();

    expect(Array.from(first.streams[0]!.values)).toEqual([0, 10, 20, 30]);
    expect(Array.from(second.streams[0]!.values)).toEqual([40, 50, 60, 70]);
    expect(second.startNs - first.startNs).toBe(40_000_000n);
  });
});

describe('sync and transport selection', () => {
  const thresholds = { minSyncScore: 0.5, maxDriftNs: 1000 };

  it('should skip sources whose drift is too large', () => {
    expect(
      selectSyncSource(
        {
          syncSources: {
            gps_pulse: { score: 1, driftNs: 5000 },
            peer_clock: { score: 0.6, driftNs: -200 },
          },
        },
        thresholds
      )
    ).toEqual({ source: 'peer_clock', confidence: 60, driftNs: -200 });
  });

  it('should fall back to the local clock', () => {
    expect(selectSyncSource({ syncSources: {} }, thresholds)).toEqual({
      source: 'local',
      confidence: 0,
      driftNs: 0,
    });
  });

  it('should prefer transports in a fixed order', () => {
    expect(selectTransport(['usb_hid', 'zmq', 'udp'])).toBe('udp');
    expect(selectTransport([])).toBeNull();
  });
});
