/**
 * Stream Session Manager
 * Subscribes agents to bridge streams and bundles aligned samples for the
 * correlation engine.
 */

import { randomUUID } from 'crypto';
import { EventEmitter } from 'eventemitter3';
import {
  RejectedParamsError,
  StreamError,
  ValidationError,
  createChildLogger,
} from '@sensorlink/shared';
import { parseBridgeUri } from '../protocol/bridge-uri.js';
import type { StreamParams } from '../protocol/types.js';
import { negotiate } from './negotiation.js';
import { alignStreams, readSeries, type PacketRemainder } from './stream-aligner.js';
import { StreamSession } from './stream-session.js';
import type {
  AlignedBundle,
  BridgeConnector,
  CapabilityLookup,
  SessionConfig,
  SessionManagerEvents,
  SyncSelection,
} from './types.js';

const DEFAULT_CONFIG: SessionConfig = {
  sequenceGapTolerance: 8,
  idleTimeoutMs: 5000,
  maxReconnectAttempts: 3,
  reconnectBaseDelayMs: 100,
  reconnectMaxDelayMs: 5000,
  channelCapacity: 1024,
  highWatermark: 768,
  lowWatermark: 256,
  overflowPolicy: 'block',
  minSyncScore: 0.5,
  maxDriftNs: 1_000_000,
};

export interface StreamSessionManagerOptions {
  registry: CapabilityLookup;
  connector: BridgeConnector;
  config?: Partial<SessionConfig>;
}

export class StreamSessionManager extends EventEmitter<SessionManagerEvents> {
  private registry: CapabilityLookup;
  private connector: BridgeConnector;
  private config: SessionConfig;
  private sessions: Map<string, StreamSession> = new Map();
  private remainders: Map<string, PacketRemainder> = new Map();
  private logger = createChildLogger({ component: 'StreamSessionManager' });

  constructor(options: StreamSessionManagerOptions) {
    super();
    this.registry = options.registry;
    this.connector = options.connector;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
  }

  /**
   * Open a session to `bridge://<id>/stream/<spec>?...`. Explicit params
   * override the URI's query parameters.
   */
  async subscribe(
    uri: string,
    params: StreamParams = {},
    overrides: Partial<SessionConfig> = {}
  ): Promise<StreamSession> {
    const parsed = parseBridgeUri(uri);
    const capability = this.registry.get(parsed.bridgeId);
    const negotiation = negotiate(capability, parsed, params);

    const session = new StreamSession({
      id: randomUUID(),
      uri,
      negotiation,
      connector: this.connector,
      config: { ...this.config, ...overrides },
    });

    session.on('error', (event) => this.emit('session:error', event));
    session.on('closed', ({ sessionId }) => {
      this.remainders.delete(sessionId);
      if (this.sessions.delete(sessionId)) {
        this.emit('session:closed', { sessionId });
      }
    });
    this.sessions.set(session.id, session);

    let sync: SyncSelection;
    try {
      sync = await session.open();
    } catch (error) {
      this.sessions.delete(session.id);
      if (error instanceof StreamError) throw error;
      throw new RejectedParamsError(
        `bridge refused the stream: ${error instanceof Error ? error.message : String(error)}`,
        { bridgeId: parsed.bridgeId, sessionId: session.id }
      );
    }

    this.logger.info(
      { sessionId: session.id, bridgeId: parsed.bridgeId, transport: negotiation.transport, sync: sync.source },
      'Subscribed'
    );
    this.emit('session:opened', { sessionId: session.id, uri, negotiation, sync });
    return session;
  }

  async unsubscribe(sessionId: string): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new ValidationError(`Unknown session '${sessionId}'`, { sessionId });
    }
    await session.close();
    this.sessions.delete(sessionId);
    this.remainders.delete(sessionId);
  }

  async closeAll(): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.unsubscribe(id)));
  }

  get(sessionId: string): StreamSession | undefined {
    return this.sessions.get(sessionId);
  }

  list(): StreamSession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Read `windowMs` of samples from every session and align them
   */
  async bundle(sessionIds: readonly string[], windowMs: number, channel = 0): Promise<AlignedBundle> {
    const sessions = sessionIds.map((id) => {
      const session = this.sessions.get(id);
      if (!session) throw new ValidationError(`Unknown session '${id}'`, { sessionId: id });
      return session;
    });

    const series = await Promise.all(
      sessions.map((session) =>
        readSeries(
          session,
          Math.max(1, Math.ceil((session.negotiation.rate * windowMs) / 1000)),
          channel,
          this.remainders
        )
      )
    );

    const bundle = alignStreams(series);
    this.logger.debug(
      { sessions: sessionIds.length, rate: bundle.sampleRate, samples: bundle.timestampsNs.length },
      'Bundled aligned streams'
    );
    return bundle;
  }
}
