/**
 * Content addressing for ledger events
 */

import { createHash } from 'node:crypto';
import type { CapabilityEvent, CapabilityEventBody } from '@sensorlink/shared';

/**
 * JSON with object keys sorted at every level and undefined members dropped
 */
export function canonicalJson(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item: unknown) => canonicalJson(item)).join(',')}]`;
  }

  const members = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => `${JSON.stringify(key)}:${canonicalJson(member)}`);

  return `{${members.join(',')}}`;
}

export function contentHash(value: unknown): string {
  return createHash('sha256').update(canonicalJson(value)).digest('hex');
}

export function createCapabilityEvent(bridgeId: string, body: CapabilityEventBody): CapabilityEvent {
  return {
    hash: contentHash({ bridgeId, body }),
    bridgeId,
    body,
  };
}
