/**
 * Stream session types
 */

import type {
  BridgeCapability,
  SampleFormat,
  SessionState,
  StreamError,
  SyncSource,
  Transport,
} from '@sensorlink/shared';
import type { SensorPacket } from '../protocol/types.js';

export type OverflowPolicy = 'block' | 'drop_oldest';

export interface SessionConfig {
  /** Largest sequence jump counted as loss rather than a broken stream */
  sequenceGapTolerance: number;
  idleTimeoutMs: number;
  maxReconnectAttempts: number;
  reconnectBaseDelayMs: number;
  reconnectMaxDelayMs: number;
  channelCapacity: number;
  highWatermark: number;
  lowWatermark: number;
  overflowPolicy: OverflowPolicy;
  minSyncScore: number;
  maxDriftNs: number;
}

/**
 * Parameters agreed with the bridge for one stream
 */
export interface Negotiation {
  bridgeId: string;
  streamSpec: string;
  rate: number;
  format: SampleFormat;
  channels: number;
  transport: Transport;
  window?: number;
}

export interface SyncQuality {
  /** 0..1 */
  score: number;
  driftNs: number;
}

/** What the bridge reports about itself when a link opens */
export interface BridgeHandshake {
  syncSources: Partial<Record<SyncSource, SyncQuality>>;
}

export type ControlSignal = { type: 'pause' } | { type: 'resume' };

/**
 * An open byte stream to a bridge, provided by the messaging layer
 */
export interface BridgeLink {
  readonly handshake: BridgeHandshake;
  onData(listener: (chunk: Uint8Array) => void): void;
  onClose(listener: (error?: Error) => void): void;
  control(signal: ControlSignal): Promise<void>;
  close(): Promise<void>;
}

export interface BridgeConnector {
  open(uri: string, negotiation: Negotiation): Promise<BridgeLink>;
}

/** The part of the registry the session manager reads */
export interface CapabilityLookup {
  get(bridgeId: string): BridgeCapability;
}

export interface SyncSelection {
  source: SyncSource;
  /** 0..100 */
  confidence: number;
  driftNs: number;
}

export interface SessionStats {
  received: number;
  delivered: number;
  duplicates: number;
  lost: number;
  overwritten: number;
  reconnects: number;
}

export interface StreamSessionEvents {
  'state:changed': { sessionId: string; from: SessionState; to: SessionState; reason: string };
  'backpressure': { sessionId: string; paused: boolean; buffered: number };
  'sequence:gap': { sessionId: string; expected: bigint; received: bigint; missing: bigint };
  'overrun': { sessionId: string; overwritten: number };
  'reconnect:scheduled': { sessionId: string; attempt: number; delayMs: number };
  'error': { sessionId: string; error: StreamError };
  'closed': { sessionId: string };
}

export interface SessionManagerEvents {
  'session:opened': { sessionId: string; uri: string; negotiation: Negotiation; sync: SyncSelection };
  'session:closed': { sessionId: string };
  'session:error': { sessionId: string; error: StreamError };
}

/**
 * Samples of one channel with the capture time of each sample
 */
export interface TimedSeries {
  streamId: string;
  sampleRate: number;
  timestampsNs: bigint[];
  values: Float64Array;
}

export interface AlignedStream {
  streamId: string;
  nativeRate: number;
  values: Float64Array;
  /** Original timestamps of the samples each aligned value was interpolated from */
  provenance: bigint[][];
}

export interface AlignedBundle {
  sampleRate: number;
  startNs: bigint;
  timestampsNs: bigint[];
  streams: AlignedStream[];
}

export type { SensorPacket };
