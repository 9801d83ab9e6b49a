/**
 * Bridge capability and registry event types
 */

import type {
  CorrelationOperation,
  SampleFormat,
  SensingDomain,
  Transport,
} from './index.js';

export interface GeoLocation {
  latitude: number;
  longitude: number;
}

/**
 * What a bridge owner submits on registration. Reputation and last-seen are
 * owned by the registry.
 */
export interface CapabilityRegistration {
  bridgeId: string;
  owner: string;
  domain: SensingDomain;
  freqMin: number;
  freqMax: number;
  maxSampleRate: number;
  bitDepth: number;
  channels: number;
  transports: Transport[];
  mixingOps: CorrelationOperation[];
  location?: GeoLocation;
  /** Cost per 1000 samples */
  costPerKs: number;
  /** Machine the bridge runs on; bridges without one are never co-located */
  hostId?: string;
}

export interface BridgeCapability extends CapabilityRegistration {
  /** 0..1000 */
  reputation: number;
  /** Epoch milliseconds */
  lastSeen: number;
}

export interface StreamDescriptor {
  streamType: string;
  sampleRate: number;
  format: SampleFormat;
  bufferSize: number;
}

export interface DiscoveryQuery {
  /** Any of these domains matches */
  domains?: SensingDomain[];
  freqMin?: number;
  freqMax?: number;
  minSampleRate?: number;
  minReputation?: number;
  maxCost?: number;
  /** All of these transports must be supported */
  transports?: Transport[];
  geo?: {
    center: GeoLocation;
    radiusKm: number;
  };
  limit?: number;
}

export interface DiscoveryMatch {
  capability: BridgeCapability;
  score: number;
  ageMs: number;
  distanceKm?: number;
}

// ===========================================
// Append-only capability event log
// ===========================================

export type CapabilityEventBody =
  | { type: 'registered'; at: number; capability: CapabilityRegistration }
  | { type: 'heartbeat'; at: number }
  | { type: 'rated'; at: number; raterId: string; score: number }
  | { type: 'stream_registered'; at: number; descriptor: StreamDescriptor }
  | { type: 'unregistered'; at: number };

export type CapabilityEventType = CapabilityEventBody['type'];

export interface CapabilityEvent {
  /** sha-256 of the canonical JSON of bridge id and body */
  hash: string;
  bridgeId: string;
  body: CapabilityEventBody;
}
