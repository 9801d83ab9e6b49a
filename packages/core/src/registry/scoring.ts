/**
 * Discovery scoring and spatial helpers
 */

import type { BridgeCapability, GeoLocation } from '@sensorlink/shared';

const EARTH_RADIUS_KM = 6371.0088;

export function reputationWeight(reputation: number): number {
  return Math.min(1000, Math.max(0, reputation)) / 1000;
}

/** Exponential decay; a future last-seen counts as age zero */
export function recencyWeight(ageMs: number, halfLifeMs: number): number {
  return Math.pow(0.5, Math.max(0, ageMs) / halfLifeMs);
}

export function costWeight(costPerKs: number): number {
  return 1 / (1 + costPerKs / 1000);
}

export function scoreCapability(
  capability: BridgeCapability,
  now: number,
  halfLifeMs: number
): number {
  return (
    reputationWeight(capability.reputation) *
    recencyWeight(now - capability.lastSeen, halfLifeMs) *
    costWeight(capability.costPerKs)
  );
}

/**
 * Great-circle distance (haversine)
 */
export function haversineKm(a: GeoLocation, b: GeoLocation): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.latitude - a.latitude);
  const dLon = toRad(b.longitude - a.longitude);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.latitude)) * Math.cos(toRad(b.latitude)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

/**
 * Decade bucket of a frequency; everything below 1 Hz shares bucket 0
 */
export function frequencyBucket(hz: number): number {
  return hz < 1 ? 0 : Math.floor(Math.log10(hz));
}

/** Every decade bucket a [min, max] range touches */
export function frequencyBuckets(min: number, max: number): number[] {
  const buckets: number[] = [];
  for (let b = frequencyBucket(min); b <= frequencyBucket(max); b++) {
    buckets.push(b);
  }
  return buckets;
}
