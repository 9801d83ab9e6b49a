/**
 * Challenge-response authentication of bridges against their owner's ed25519 key
 */

import { randomBytes, verify } from 'node:crypto';
import {
  AuthFailedError,
  createChildLogger,
  type IdentityProvider,
} from '@sensorlink/shared';
import type { AuthChallenge, AuthResult, ChallengeSigner } from './types.js';

export const NONCE_BYTES = 32;

/**
 * nonce ∥ u64le(timestamp) ∥ utf8(requesterId)
 */
export function buildChallengeMessage(
  nonce: Uint8Array,
  issuedAt: number,
  requesterId: string
): Uint8Array {
  const requester = Buffer.from(requesterId, 'utf8');
  const message = Buffer.alloc(nonce.byteLength + 8 + requester.byteLength);
  Buffer.from(nonce).copy(message, 0);
  message.writeBigUInt64LE(BigInt(issuedAt), nonce.byteLength);
  requester.copy(message, nonce.byteLength + 8);
  return new Uint8Array(message);
}

export class ChallengeAuthenticator {
  private pending: Map<string, AuthChallenge> = new Map();
  private logger = createChildLogger({ component: 'ChallengeAuthenticator' });

  constructor(
    private readonly identity: IdentityProvider,
    private readonly timeoutMs: number
  ) {}

  issue(bridgeId: string, requesterId: string): AuthChallenge {
    const nonce = new Uint8Array(randomBytes(NONCE_BYTES));
    const issuedAt = Date.now();
    const challenge: AuthChallenge = {
      bridgeId,
      requesterId,
      nonce,
      issuedAt,
      message: buildChallengeMessage(nonce, issuedAt, requesterId),
    };
    this.pending.set(Buffer.from(nonce).toString('hex'), challenge);
    return challenge;
  }

  /**
   * Verify a signature for a previously issued challenge. A nonce can be
   * redeemed once, successfully or not.
   */
  async verify(
    challenge: AuthChallenge,
    signature: Uint8Array,
    owner: string
  ): Promise<AuthResult> {
    const key = Buffer.from(challenge.nonce).toString('hex');
    const issued = this.pending.get(key);
    this.pending.delete(key);

    const context = { bridgeId: challenge.bridgeId, requesterId: challenge.requesterId };

    if (!issued || issued.requesterId !== challenge.requesterId || issued.bridgeId !== challenge.bridgeId) {
      throw new AuthFailedError('unknown or already used nonce', context);
    }

    const elapsed = Date.now() - issued.issuedAt;
    if (elapsed > this.timeoutMs) {
      throw new AuthFailedError(`challenge expired after ${elapsed}ms`, context);
    }

    const publicKey = await this.identity.getPublicKey(owner);
    if (!publicKey) {
      throw new AuthFailedError(`no public key for owner '${owner}'`, context);
    }

    let valid = false;
    try {
      valid = verify(null, issued.message, publicKey, signature);
    } catch (error) {
      this.logger.warn(
        { ...context, error: error instanceof Error ? error.message : String(error) },
        'Signature verification raised'
      );
      valid = false;
    }

    if (!valid) {
      throw new AuthFailedError('signature does not verify against owner key', context);
    }

    return {
      bridgeId: challenge.bridgeId,
      requesterId: challenge.requesterId,
      owner,
      verifiedAt: Date.now(),
    };
  }

  /**
   * Issue a challenge, wait for the bridge's signature and verify it
   */
  async authenticate(
    bridgeId: string,
    requesterId: string,
    owner: string,
    signer: ChallengeSigner
  ): Promise<AuthResult> {
    const challenge = this.issue(bridgeId, requesterId);
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new AuthFailedError(`no signature within ${this.timeoutMs}ms`, { bridgeId, requesterId })
        );
      }, this.timeoutMs);
      timer.unref();
    });

    try {
      const signature = await Promise.race([signer(challenge), timeout]);
      return await this.verify(challenge, signature, owner);
    } catch (error) {
      this.pending.delete(Buffer.from(challenge.nonce).toString('hex'));
      if (error instanceof AuthFailedError) throw error;
      throw new AuthFailedError(
        `bridge failed to sign: ${error instanceof Error ? error.message : String(error)}`,
        { bridgeId, requesterId }
      );
    } finally {
      clearTimeout(timer);
    }
  }

  get pendingChallenges(): number {
    return this.pending.size;
  }
}
