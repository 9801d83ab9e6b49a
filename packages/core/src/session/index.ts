/**
 * Stream Session Manager
 *
 * States: CLOSED → NEGOTIATING → OPEN → {PAUSED, ERROR} → CLOSED
 */

export { StreamSessionManager } from './session-manager.js';
export type { StreamSessionManagerOptions } from './session-manager.js';
export { StreamSession } from './stream-session.js';
export type { StreamSessionOptions } from './stream-session.js';
export { BoundedChannel } from './bounded-channel.js';
export type { BoundedChannelOptions, PushOutcome, ChannelEvents } from './bounded-channel.js';
export { SessionTransitionValidator, sessionTransitions } from './transitions.js';
export type { SessionTransition } from './transitions.js';
export { negotiate, defaultFormat } from './negotiation.js';
export { selectSyncSource, selectTransport } from './sync-selector.js';
export type { SyncThresholds } from './sync-selector.js';
export { alignStreams, readSeries, seriesFromPackets, sampleTimestamp } from './stream-aligner.js';
export type { PacketRemainder, PacketSource } from './stream-aligner.js';
export type {
  OverflowPolicy,
  SessionConfig,
  Negotiation,
  SyncQuality,
  BridgeHandshake,
  ControlSignal,
  BridgeLink,
  BridgeConnector,
  CapabilityLookup,
  SyncSelection,
  SessionStats,
  StreamSessionEvents,
  SessionManagerEvents,
  TimedSeries,
  AlignedStream,
  AlignedBundle,
} from './types.js';
