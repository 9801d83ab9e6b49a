/**
 * Stream Session
 * One subscription to one bridge stream: negotiation, packet intake,
 * sequence checks, idle watchdog, backpressure and reconnect.
 */

import { EventEmitter } from 'eventemitter3';
import {
  SESSION_STATES,
  StreamError,
  StreamOverrunError,
  StreamTimeoutError,
  SyncLostError,
  createChildLogger,
  logSessionTransition,
  type Logger,
  type SessionState,
} from '@sensorlink/shared';
import { PacketFramer } from '../protocol/packet-framer.js';
import type { SensorPacket } from '../protocol/types.js';
import { BoundedChannel } from './bounded-channel.js';
import { selectSyncSource } from './sync-selector.js';
import { sessionTransitions } from './transitions.js';
import type {
  BridgeConnector,
  BridgeLink,
  ControlSignal,
  Negotiation,
  SessionConfig,
  SessionStats,
  StreamSessionEvents,
  SyncSelection,
} from './types.js';

export interface StreamSessionOptions {
  id: string;
  uri: string;
  negotiation: Negotiation;
  connector: BridgeConnector;
  config: SessionConfig;
}

export class StreamSession extends EventEmitter<StreamSessionEvents> {
  readonly id: string;
  readonly uri: string;
  readonly negotiation: Negotiation;

  private connector: BridgeConnector;
  private config: SessionConfig;
  private state: SessionState = SESSION_STATES.CLOSED;
  private link: BridgeLink | null = null;
  // Bumped whenever a link is dropped; callbacks from older links are ignored
  private generation = 0;
  private framer: PacketFramer;
  private channel: BoundedChannel<SensorPacket>;
  private lastSequence: bigint | null = null;
  private resyncing = false;
  private watchdog: NodeJS.Timeout | null = null;
  private reconnectTimer: NodeJS.Timeout | null = null;
  private reconnectAttempt = 0;
  private failure: StreamError | null = null;
  private sync: SyncSelection | null = null;
  private stats: SessionStats = {
    received: 0,
    delivered: 0,
    duplicates: 0,
    lost: 0,
    overwritten: 0,
    reconnects: 0,
  };
  private logger: Logger;

  constructor(options: StreamSessionOptions) {
    super();
    this.id = options.id;
    this.uri = options.uri;
    this.negotiation = options.negotiation;
    this.connector = options.connector;
    this.config = options.config;
    this.framer = new PacketFramer(options.id);
    this.logger = createChildLogger({
      component: 'StreamSession',
      sessionId: options.id,
      bridgeId: options.negotiation.bridgeId,
    });

    this.channel = new BoundedChannel<SensorPacket>({
      capacity: this.config.channelCapacity,
      highWatermark: this.config.highWatermark,
      lowWatermark: this.config.lowWatermark,
      policy: this.config.overflowPolicy,
    });
    this.channel.on('watermark:high', ({ size }) => this.pauseBridge(size));
    this.channel.on('watermark:low', ({ size }) => this.resumeBridge(size));
    this.channel.on('overrun', ({ overwritten }) => {
      this.stats.overwritten = overwritten;
      this.emit('overrun', { sessionId: this.id, overwritten });
    });
  }

  // ===========================================
  // Lifecycle
  // ===========================================

  /**
   * CLOSED → NEGOTIATING → OPEN. A failed first connect closes the session
   * and rethrows; reconnects only apply to sessions that were open.
   */
  async open(): Promise<SyncSelection> {
    this.transition(SESSION_STATES.NEGOTIATING, 'subscribe');

    try {
      await this.connect();
    } catch (error) {
      if (this.state === SESSION_STATES.NEGOTIATING) {
        this.transition(SESSION_STATES.ERROR, 'connect_failed');
        this.transition(SESSION_STATES.CLOSED, 'connect_failed');
        this.channel.close();
      }
      throw error;
    }

    return this.getSync();
  }

  /**
   * Release the link, timers and channel. Buffered packets stay readable.
   */
  async close(reason = 'unsubscribe'): Promise<void> {
    this.clearWatchdog();
    this.clearReconnectTimer();
    if (this.state === SESSION_STATES.CLOSED) return;

    this.transition(SESSION_STATES.CLOSED, reason);
    this.channel.close();

    const link = this.detachLink();
    if (link) {
      try {
        await link.close();
      } catch (error) {
        this.logger.warn(
          { error: error instanceof Error ? error.message : String(error) },
          'Link close failed'
        );
      }
    }
    this.emit('closed', { sessionId: this.id });
  }

  // ===========================================
  // Consumer side
  // ===========================================

  /**
   * Next packet in sequence order; null once the session is closed and
   * drained. Throws the terminal stream error, if there was one, at the end.
   */
  async read(): Promise<SensorPacket | null> {
    const packet = await this.channel.take();
    if (packet === null) {
      if (this.failure) throw this.failure;
      return null;
    }
    this.stats.delivered += 1;
    return packet;
  }

  async *packets(): AsyncGenerator<SensorPacket, void, undefined> {
    for (;;) {
      const packet = await this.read();
      if (packet === null) return;
      yield packet;
    }
  }

  getState(): SessionState {
    return this.state;
  }

  getSync(): SyncSelection {
    return this.sync ?? { source: 'local', confidence: 0, driftNs: 0 };
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  get buffered(): number {
    return this.channel.size;
  }

  get failureReason(): StreamError | null {
    return this.failure;
  }

  // ===========================================
  // Link handling
  // ===========================================

  private async connect(): Promise<void> {
    const generation = ++this.generation;
    const link = await this.connector.open(this.uri, this.negotiation);

    if (generation !== this.generation || this.state !== SESSION_STATES.NEGOTIATING) {
      await link.close();
      return;
    }

    this.link = link;
    this.framer.reset();
    this.sync = selectSyncSource(link.handshake, this.config);

    link.onData((chunk) => this.handleData(generation, chunk));
    link.onClose((error) => this.handleLinkClosed(generation, error));

    this.transition(SESSION_STATES.OPEN, 'params_accepted');
    this.logger.info(
      { transport: this.negotiation.transport, sync: this.sync.source, rate: this.negotiation.rate },
      'Stream open'
    );

    if (this.channel.size >= this.config.highWatermark) {
      this.pauseBridge(this.channel.size);
    } else {
      this.armWatchdog();
    }
  }

  private handleData(generation: number, chunk: Uint8Array): void {
    if (generation !== this.generation || !sessionTransitions.isReceivingState(this.state)) return;

    for (const packet of this.framer.push(chunk)) {
      if (!sessionTransitions.isReceivingState(this.state)) return;
      this.ingest(packet);
    }
  }

  private handleLinkClosed(generation: number, error?: Error): void {
    if (generation !== this.generation || !sessionTransitions.isReceivingState(this.state)) return;
    this.logger.warn({ error: error?.message }, 'Bridge closed the link');
    this.enterError('link_closed');
  }

  private ingest(packet: SensorPacket): void {
    this.stats.received += 1;
    if (this.state === SESSION_STATES.OPEN) this.armWatchdog();

    const last = this.lastSequence;
    if (last !== null && packet.sequence <= last) {
      this.stats.duplicates += 1;
      return;
    }

    if (last !== null) {
      const missing = packet.sequence - last - 1n;
      if (missing > 0n) {
        this.emit('sequence:gap', {
          sessionId: this.id,
          expected: last + 1n,
          received: packet.sequence,
          missing,
        });

        if (!this.resyncing && missing > BigInt(this.config.sequenceGapTolerance)) {
          this.logger.warn({ missing: missing.toString() }, 'Sequence gap beyond tolerance');
          this.enterError('sequence_gap');
          return;
        }
        this.stats.lost += Number(missing);
      }
    }

    this.resyncing = false;
    this.lastSequence = packet.sequence;

    if (this.channel.push(packet) === 'full') {
      this.terminate(
        new StreamOverrunError(this.channel.capacity, { sessionId: this.id, streamId: packet.streamId }),
        'overrun'
      );
    }
  }

  // ===========================================
  // Backpressure
  // ===========================================

  private pauseBridge(buffered: number): void {
    // drop_oldest runs without backpressure; overwrites are reported instead
    if (this.config.overflowPolicy === 'drop_oldest') return;
    if (this.state !== SESSION_STATES.OPEN) return;
    this.clearWatchdog();
    this.transition(SESSION_STATES.PAUSED, 'high_watermark');
    this.sendControl({ type: 'pause' });
    this.emit('backpressure', { sessionId: this.id, paused: true, buffered });
  }

  private resumeBridge(buffered: number): void {
    if (this.state !== SESSION_STATES.PAUSED) return;
    this.transition(SESSION_STATES.OPEN, 'low_watermark');
    this.sendControl({ type: 'resume' });
    this.armWatchdog();
    this.emit('backpressure', { sessionId: this.id, paused: false, buffered });
  }

  private sendControl(signal: ControlSignal): void {
    const link = this.link;
    if (!link) return;
    link.control(signal).catch((error: unknown) => {
      this.logger.warn(
        { signal: signal.type, error: error instanceof Error ? error.message : String(error) },
        'Flow-control signal failed'
      );
    });
  }

  // ===========================================
  // Failure and recovery
  // ===========================================

  private armWatchdog(): void {
    this.clearWatchdog();
    this.watchdog = setTimeout(() => {
      this.watchdog = null;
      if (this.state !== SESSION_STATES.OPEN) return;
      const error = new StreamTimeoutError(this.config.idleTimeoutMs, { sessionId: this.id });
      this.emit('error', { sessionId: this.id, error });
      this.enterError('idle_timeout');
    }, this.config.idleTimeoutMs);
    this.watchdog.unref();
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = null;
    }
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private enterError(reason: string): void {
    this.clearWatchdog();
    this.transition(SESSION_STATES.ERROR, reason);
    this.dropLink();
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectAttempt >= this.config.maxReconnectAttempts) {
      this.terminate(
        new SyncLostError(
          `Stream lost after ${this.reconnectAttempt} reconnect attempts`,
          { sessionId: this.id, bridgeId: this.negotiation.bridgeId }
        ),
        'reconnect_exhausted'
      );
      return;
    }

    const attempt = this.reconnectAttempt;
    this.reconnectAttempt += 1;
    const delayMs = Math.min(
      this.config.reconnectBaseDelayMs * 2 ** attempt,
      this.config.reconnectMaxDelayMs
    );

    this.emit('reconnect:scheduled', { sessionId: this.id, attempt: attempt + 1, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.reconnect().catch((error: unknown) => {
        this.logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Reconnect loop failed'
        );
      });
    }, delayMs);
    this.reconnectTimer.unref();
  }

  private async reconnect(): Promise<void> {
    if (this.state !== SESSION_STATES.ERROR) return;

    this.transition(SESSION_STATES.NEGOTIATING, 'reconnect');
    this.resyncing = true;

    try {
      await this.connect();
    } catch (error) {
      this.logger.warn(
        { attempt: this.reconnectAttempt, error: error instanceof Error ? error.message : String(error) },
        'Reconnect attempt failed'
      );
      if (this.state === SESSION_STATES.NEGOTIATING) {
        this.transition(SESSION_STATES.ERROR, 'connect_failed');
        this.scheduleReconnect();
      }
      return;
    }

    if (this.state === SESSION_STATES.OPEN || this.state === SESSION_STATES.PAUSED) {
      this.stats.reconnects += 1;
      this.reconnectAttempt = 0;
    }
  }

  /**
   * Move to CLOSED through ERROR and surface the error to the consumer
   */
  private terminate(error: StreamError, reason: string): void {
    this.clearWatchdog();
    this.clearReconnectTimer();
    this.failure = error;

    if (this.state !== SESSION_STATES.ERROR) {
      this.transition(SESSION_STATES.ERROR, reason);
    }
    this.transition(SESSION_STATES.CLOSED, reason);
    this.dropLink();
    this.channel.close();

    this.logger.error({ code: error.code, kind: error.kind }, error.message);
    this.emit('error', { sessionId: this.id, error });
    this.emit('closed', { sessionId: this.id });
  }

  private detachLink(): BridgeLink | null {
    const link = this.link;
    this.link = null;
    this.generation += 1;
    this.framer.reset();
    return link;
  }

  private dropLink(): void {
    const link = this.detachLink();
    if (!link) return;
    link.close().catch((error: unknown) => {
      this.logger.warn(
        { error: error instanceof Error ? error.message : String(error) },
        'Link close failed'
      );
    });
  }

  private transition(to: SessionState, reason: string): void {
    const from = this.state;
    sessionTransitions.validateTransition(from, to, this.id);
    this.state = to;
    logSessionTransition(this.id, from, to, reason);
    this.emit('state:changed', { sessionId: this.id, from, to, reason });
  }
}
