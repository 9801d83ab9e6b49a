/**
 * Packet Framer
 * Reassembles packets from an arbitrary chunking of the byte stream
 */

import { createChildLogger } from '@sensorlink/shared';
import { decodePacket, hasMagicAt, type DecodeResult } from './packet-codec.js';
import type { SensorPacket } from './types.js';

export class PacketFramer {
  private buffer: Uint8Array = new Uint8Array(0);
  private discarded = 0;
  private logger = createChildLogger({ component: 'PacketFramer' });

  constructor(private readonly streamLabel: string = 'unknown') {}

  /**
   * Feed a chunk and return every packet completed by it
   */
  push(chunk: Uint8Array): SensorPacket[] {
    this.append(chunk);

    const packets: SensorPacket[] = [];
    let offset = 0;

    while (offset < this.buffer.byteLength) {
      if (!hasMagicAt(this.buffer, offset)) {
        // Partial magic at the tail: wait for more bytes
        if (this.buffer.byteLength - offset < 4) break;
        const next = this.findMagic(offset + 1);
        const skipped = (next < 0 ? this.buffer.byteLength - 3 : next) - offset;
        this.discarded += skipped;
        this.logger.warn({ stream: this.streamLabel, skipped }, 'Resynchronizing on packet magic');
        offset += skipped;
        continue;
      }

      let result: DecodeResult | null;
      try {
        result = decodePacket(this.buffer, offset);
      } catch (error) {
        this.logger.warn(
          { stream: this.streamLabel, error: error instanceof Error ? error.message : String(error) },
          'Dropping undecodable frame'
        );
        this.discarded += 1;
        offset += 1;
        continue;
      }

      if (!result) break;
      packets.push(result.packet);
      offset += result.bytesRead;
    }

    this.buffer = this.buffer.slice(offset);
    return packets;
  }

  /** Bytes held while waiting for the rest of a packet */
  get pendingBytes(): number {
    return this.buffer.byteLength;
  }

  /** Bytes skipped while resynchronizing */
  get discardedBytes(): number {
    return this.discarded;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }

  private append(chunk: Uint8Array): void {
    if (this.buffer.byteLength === 0) {
      this.buffer = chunk.slice();
      return;
    }
    const merged = new Uint8Array(this.buffer.byteLength + chunk.byteLength);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.byteLength);
    this.buffer = merged;
  }

  private findMagic(from: number): number {
    for (let i = from; i + 4 <= this.buffer.byteLength; i++) {
      if (hasMagicAt(this.buffer, i)) return i;
    }
    return -1;
  }
}
