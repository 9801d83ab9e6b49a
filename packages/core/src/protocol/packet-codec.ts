/**
 * Wire Packet Codec
 *
 * Layout (little-endian):
 *   magic "SLPK" (4) | version u8 | stream-id length u16 | stream-id utf-8
 *   | timestamp u64 ns | time-source u8 | sync-confidence u8 | domain u8
 *   | sample rate u32 | sample count u16 | format u8 | channels u8
 *   | sequence u64 | payload length u32 | payload
 */

import {
  SAMPLE_FORMATS,
  SENSING_DOMAINS,
  SYNC_SOURCES,
  ValidationError,
} from '@sensorlink/shared';
import { BYTES_PER_SAMPLE } from './samples.js';
import type { SensorPacket } from './types.js';

export const PACKET_MAGIC = new Uint8Array([0x53, 0x4c, 0x50, 0x4b]); // "SLPK"
export const PACKET_VERSION = 1;

/** Header bytes excluding the stream id */
export const FIXED_HEADER_BYTES = 38;

const MAX_U16 = 0xffff;
const MAX_U32 = 0xffffffff;
const MAX_U64 = 0xffffffffffffffffn;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function hasMagicAt(bytes: Uint8Array, offset: number): boolean {
  return (
    bytes[offset] === PACKET_MAGIC[0] &&
    bytes[offset + 1] === PACKET_MAGIC[1] &&
    bytes[offset + 2] === PACKET_MAGIC[2] &&
    bytes[offset + 3] === PACKET_MAGIC[3]
  );
}

function tagOf<T>(table: readonly T[], value: T, field: string): number {
  const index = table.indexOf(value);
  if (index < 0) {
    throw new ValidationError(`Unknown ${field} '${String(value)}'`, { field });
  }
  return index;
}

function valueOf<T>(table: readonly T[], tag: number, field: string): T {
  const value = table[tag];
  if (value === undefined) {
    throw new ValidationError(`Unknown ${field} tag ${tag}`, { field, tag });
  }
  return value;
}

function checkRange(field: string, value: number, min: number, max: number): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${field} out of range: ${value}`, { field, value });
  }
}

/**
 * Build a frozen packet, validating field ranges and payload size
 */
export function createPacket(fields: SensorPacket): SensorPacket {
  checkRange('syncConfidence', fields.syncConfidence, 0, 100);
  checkRange('sampleRate', fields.sampleRate, 1, MAX_U32);
  checkRange('sampleCount', fields.sampleCount, 0, MAX_U16);
  checkRange('channels', fields.channels, 1, 0xff);

  if (fields.timestampNs < 0n || fields.timestampNs > MAX_U64) {
    throw new ValidationError('timestampNs out of u64 range', { streamId: fields.streamId });
  }
  if (fields.sequence < 0n || fields.sequence > MAX_U64) {
    throw new ValidationError('sequence out of u64 range', { streamId: fields.streamId });
  }

  const expected = fields.sampleCount * fields.channels * BYTES_PER_SAMPLE[fields.format];
  if (fields.payload.byteLength !== expected) {
    throw new ValidationError(
      `Payload is ${fields.payload.byteLength} bytes, expected ${expected}`,
      { streamId: fields.streamId }
    );
  }

  return Object.freeze({ ...fields });
}

export function encodePacket(packet: SensorPacket): Uint8Array {
  const streamId = encoder.encode(packet.streamId);
  if (streamId.byteLength > MAX_U16) {
    throw new ValidationError('Stream id longer than 65535 bytes', { streamId: packet.streamId });
  }
  // Re-validate; callers may hand in plain objects
  createPacket(packet);

  const total = FIXED_HEADER_BYTES + streamId.byteLength + packet.payload.byteLength;
  const bytes = new Uint8Array(total);
  const view = new DataView(bytes.buffer);
  let offset = 0;

  bytes.set(PACKET_MAGIC, offset);
  offset += 4;
  view.setUint8(offset, PACKET_VERSION);
  offset += 1;
  view.setUint16(offset, streamId.byteLength, true);
  offset += 2;
  bytes.set(streamId, offset);
  offset += streamId.byteLength;
  view.setBigUint64(offset, packet.timestampNs, true);
  offset += 8;
  view.setUint8(offset, tagOf(SYNC_SOURCES, packet.timeSource, 'time source'));
  offset += 1;
  view.setUint8(offset, packet.syncConfidence);
  offset += 1;
  view.setUint8(offset, tagOf(SENSING_DOMAINS, packet.domain, 'domain'));
  offset += 1;
  view.setUint32(offset, packet.sampleRate, true);
  offset += 4;
  view.setUint16(offset, packet.sampleCount, true);
  offset += 2;
  view.setUint8(offset, tagOf(SAMPLE_FORMATS, packet.format, 'format'));
  offset += 1;
  view.setUint8(offset, packet.channels);
  offset += 1;
  view.setBigUint64(offset, packet.sequence, true);
  offset += 8;
  view.setUint32(offset, packet.payload.byteLength, true);
  offset += 4;
  bytes.set(packet.payload, offset);

  return bytes;
}

export interface DecodeResult {
  packet: SensorPacket;
  bytesRead: number;
}

/**
 * Decode one packet starting at `offset`. Returns null when the buffer does
 * not yet hold the whole packet.
 */
export function decodePacket(bytes: Uint8Array, offset = 0): DecodeResult | null {
  const available = bytes.byteLength - offset;
  if (available < 7) return null;

  if (!hasMagicAt(bytes, offset)) {
    throw new ValidationError('Bad packet magic', { offset });
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset + offset, available);
  const version = view.getUint8(4);
  if (version !== PACKET_VERSION) {
    throw new ValidationError(`Unsupported packet version ${version}`, { version });
  }

  const idLength = view.getUint16(5, true);
  const headerLength = FIXED_HEADER_BYTES + idLength;
  if (available < headerLength) return null;

  let cursor = 7;
  const streamId = decoder.decode(bytes.subarray(offset + cursor, offset + cursor + idLength));
  cursor += idLength;
  const timestampNs = view.getBigUint64(cursor, true);
  cursor += 8;
  const timeSource = valueOf(SYNC_SOURCES, view.getUint8(cursor), 'time source');
  cursor += 1;
  const syncConfidence = view.getUint8(cursor);
  cursor += 1;
  const domain = valueOf(SENSING_DOMAINS, view.getUint8(cursor), 'domain');
  cursor += 1;
  const sampleRate = view.getUint32(cursor, true);
  cursor += 4;
  const sampleCount = view.getUint16(cursor, true);
  cursor += 2;
  const format = valueOf(SAMPLE_FORMATS, view.getUint8(cursor), 'format');
  cursor += 1;
  const channels = view.getUint8(cursor);
  cursor += 1;
  const sequence = view.getBigUint64(cursor, true);
  cursor += 8;
  const payloadLength = view.getUint32(cursor, true);
  cursor += 4;

  // Checked before waiting on the payload so a corrupt length cannot stall the framer
  const expectedLength = sampleCount * channels * BYTES_PER_SAMPLE[format];
  if (payloadLength !== expectedLength) {
    throw new ValidationError(`Payload length ${payloadLength} does not match header, expected ${expectedLength}`, {
      streamId,
      sequence: sequence.toString(),
    });
  }

  if (available < cursor + payloadLength) return null;

  // Copy so the packet never aliases the framer's reassembly buffer
  const payload = bytes.slice(offset + cursor, offset + cursor + payloadLength);

  const packet = createPacket({
    streamId,
    timestampNs,
    timeSource,
    syncConfidence,
    domain,
    sampleRate,
    sampleCount,
    format,
    channels,
    sequence,
    payload,
  });

  return { packet, bytesRead: cursor + payloadLength };
}
