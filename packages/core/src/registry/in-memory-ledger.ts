/**
 * In-process capability ledger
 */

import type { CapabilityEvent, CapabilityLedger } from '@sensorlink/shared';

export class InMemoryCapabilityLedger implements CapabilityLedger {
  private events: CapabilityEvent[] = [];
  private hashes: Set<string> = new Set();

  async append(event: CapabilityEvent): Promise<boolean> {
    if (this.hashes.has(event.hash)) {
      return false;
    }
    this.hashes.add(event.hash);
    this.events.push(event);
    return true;
  }

  async listByBridge(bridgeId: string): Promise<CapabilityEvent[]> {
    return this.events.filter((e) => e.bridgeId === bridgeId);
  }

  async listAll(): Promise<CapabilityEvent[]> {
    return [...this.events];
  }

  get size(): number {
    return this.events.length;
  }
}
