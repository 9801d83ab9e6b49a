/**
 * External collaborators consumed as abstract capabilities
 */

import type { KeyObject } from 'node:crypto';
import type { CapabilityEvent } from './capability.js';
import type { PatternState } from './pattern.js';

/**
 * Append-only, content-addressed store for capability events
 */
export interface CapabilityLedger {
  /** Returns false when an event with the same hash is already stored */
  append(event: CapabilityEvent): Promise<boolean>;
  /** Events for one bridge in append order */
  listByBridge(bridgeId: string): Promise<CapabilityEvent[]>;
  /** Every event in append order */
  listAll(): Promise<CapabilityEvent[]>;
}

/**
 * Resolves an owner's ed25519 public key
 */
export interface IdentityProvider {
  getPublicKey(ownerId: string): Promise<KeyObject | null>;
}

/**
 * Durable storage for replicated pattern state
 */
export interface PatternStore {
  get(id: string): Promise<PatternState | null>;
  put(state: PatternState): Promise<void>;
  list(): Promise<PatternState[]>;
}
