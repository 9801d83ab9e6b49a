/**
 * Deterministic transport and time-source selection
 */

import { SYNC_SOURCES, TRANSPORTS, type Transport } from '@sensorlink/shared';
import type { BridgeHandshake, SyncSelection } from './types.js';

export interface SyncThresholds {
  minSyncScore: number;
  maxDriftNs: number;
}

/**
 * Most preferred transport the bridge advertises
 */
export function selectTransport(advertised: readonly Transport[]): Transport | null {
  return TRANSPORTS.find((t) => advertised.includes(t)) ?? null;
}

/**
 * First acceptable source in preference order: gps_pulse, ntp, peer_clock.
 * The local clock is always available as the fallback.
 */
export function selectSyncSource(handshake: BridgeHandshake, thresholds: SyncThresholds): SyncSelection {
  for (const source of SYNC_SOURCES) {
    if (source === 'local') break;
    const quality = handshake.syncSources[source];
    if (!quality) continue;
    if (quality.score < thresholds.minSyncScore) continue;
    if (Math.abs(quality.driftNs) > thresholds.maxDriftNs) continue;

    return {
      source,
      confidence: Math.round(Math.min(1, Math.max(0, quality.score)) * 100),
      driftNs: quality.driftNs,
    };
  }

  const local = handshake.syncSources.local;
  return {
    source: 'local',
    confidence: local ? Math.round(Math.min(1, Math.max(0, local.score)) * 100) : 0,
    driftNs: local?.driftNs ?? 0,
  };
}
