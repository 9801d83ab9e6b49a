/**
 * Capability Registry Types
 */

import type {
  BridgeCapability,
  CapabilityLedger,
  IdentityProvider,
  StreamDescriptor,
} from '@sensorlink/shared';

export interface RegistryConfig {
  /** Entries without a heartbeat for this long are left out of discovery */
  heartbeatWindowMs: number;
  /** Half-life of the recency weight */
  recencyHalfLifeMs: number;
  /** Reputation of a bridge nobody has rated yet */
  initialReputation: number;
  authTimeoutMs: number;
  ratingCooldownMs: number;
  maxRatingsPerWindow: number;
  ratingWindowMs: number;
}

export interface CapabilityRegistryOptions {
  ledger?: CapabilityLedger;
  identity?: IdentityProvider;
  config?: Partial<RegistryConfig>;
}

/**
 * Materialized view of one bridge, folded from its event log
 */
export interface RegistryEntry {
  capability: BridgeCapability;
  streams: StreamDescriptor[];
  /** rater id -> latest vote */
  votes: Map<string, { score: number; at: number }>;
  active: boolean;
}

export interface AuthChallenge {
  bridgeId: string;
  requesterId: string;
  nonce: Uint8Array;
  /** Epoch milliseconds, bound into the signed message */
  issuedAt: number;
  /** nonce ∥ u64le(issuedAt) ∥ utf8(requesterId) */
  message: Uint8Array;
}

/** The bridge side of the handshake, reached over the messaging layer */
export type ChallengeSigner = (challenge: AuthChallenge) => Promise<Uint8Array>;

export interface AuthResult {
  bridgeId: string;
  requesterId: string;
  owner: string;
  verifiedAt: number;
}

export interface RegistryEvents {
  'bridge:registered': { capability: BridgeCapability };
  'bridge:heartbeat': { bridgeId: string; lastSeen: number };
  'bridge:rated': { bridgeId: string; raterId: string; reputation: number };
  'bridge:unregistered': { bridgeId: string };
  'stream:registered': { bridgeId: string; descriptor: StreamDescriptor };
}
