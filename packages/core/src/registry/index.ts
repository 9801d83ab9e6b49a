/**
 * Capability registry exports
 */

export { CapabilityRegistry, foldEvents, computeReputation } from './capability-registry.js';
export { ChallengeAuthenticator, buildChallengeMessage, NONCE_BYTES } from './authenticator.js';
export { InMemoryCapabilityLedger } from './in-memory-ledger.js';
export { RatingThrottle, type RatingThrottleConfig } from './rating-throttle.js';
export {
  scoreCapability,
  reputationWeight,
  recencyWeight,
  costWeight,
  haversineKm,
  frequencyBucket,
  frequencyBuckets,
} from './scoring.js';
export { canonicalJson, contentHash, createCapabilityEvent } from './content-address.js';
export type {
  RegistryConfig,
  CapabilityRegistryOptions,
  RegistryEntry,
  AuthChallenge,
  AuthResult,
  ChallengeSigner,
  RegistryEvents,
} from './types.js';
