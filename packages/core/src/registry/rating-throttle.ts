/**
 * Rating Throttle
 * Limits how often one rater can move a bridge's reputation
 */

import { createChildLogger } from '@sensorlink/shared';

const logger = createChildLogger({ component: 'RatingThrottle' });

export interface RatingThrottleConfig {
  /** Minimum gap between two ratings of the same bridge by the same rater */
  cooldownMs: number;
  /** Maximum ratings per rater within a window, across all bridges */
  maxRatingsPerWindow: number;
  windowMs: number;
}

interface RaterWindow {
  count: number;
  windowStart: number;
}

const DEFAULT_CONFIG: RatingThrottleConfig = {
  cooldownMs: 60000,
  maxRatingsPerWindow: 20,
  windowMs: 3600000,
};

export class RatingThrottle {
  private config: RatingThrottleConfig;
  private lastRated: Map<string, number> = new Map();
  private windows: Map<string, RaterWindow> = new Map();

  constructor(config: Partial<RatingThrottleConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private pairKey(raterId: string, bridgeId: string): string {
    return `${raterId}/${bridgeId}`;
  }

  /**
   * Check whether a rating would be accepted now
   */
  canRate(
    raterId: string,
    bridgeId: string,
    now: number = Date.now()
  ): { allowed: boolean; reason?: string; retryAfterMs?: number } {
    const window = this.windows.get(raterId);
    if (
      window &&
      now - window.windowStart < this.config.windowMs &&
      window.count >= this.config.maxRatingsPerWindow
    ) {
      const retryAfterMs = this.config.windowMs - (now - window.windowStart);
      logger.warn({ raterId, count: window.count }, 'Rating window exhausted');
      return {
        allowed: false,
        reason: `Rater submitted ${window.count} ratings in the current window. Max: ${this.config.maxRatingsPerWindow}`,
        retryAfterMs,
      };
    }

    const last = this.lastRated.get(this.pairKey(raterId, bridgeId));
    if (last !== undefined && now - last < this.config.cooldownMs) {
      const retryAfterMs = this.config.cooldownMs - (now - last);
      logger.warn({ raterId, bridgeId, retryAfterMs }, 'Rating on cooldown');
      return {
        allowed: false,
        reason: `Bridge '${bridgeId}' was rated by this rater ${Math.round((now - last) / 1000)}s ago`,
        retryAfterMs,
      };
    }

    return { allowed: true };
  }

  recordRating(raterId: string, bridgeId: string, now: number = Date.now()): void {
    this.lastRated.set(this.pairKey(raterId, bridgeId), now);

    const window = this.windows.get(raterId);
    if (window && now - window.windowStart < this.config.windowMs) {
      window.count += 1;
    } else {
      this.windows.set(raterId, { count: 1, windowStart: now });
    }
  }

  /**
   * Drop entries that can no longer block anything
   */
  cleanup(now: number = Date.now()): void {
    for (const [key, at] of this.lastRated) {
      if (now - at >= this.config.cooldownMs) this.lastRated.delete(key);
    }
    for (const [raterId, window] of this.windows) {
      if (now - window.windowStart >= this.config.windowMs) this.windows.delete(raterId);
    }
  }

  getStats(): { trackedPairs: number; trackedRaters: number } {
    return { trackedPairs: this.lastRated.size, trackedRaters: this.windows.size };
  }
}
