/**
 * Protocol Tests
 */
import { describe, it, expect } from 'vitest';
import { ValidationError } from '@sensorlink/shared';
import { parseBridgeUri, formatBridgeUri } from './bridge-uri.js';
import { encodeSamples, decodeSamples, deinterleave } from './samples.js';
import { createPacket, encodePacket, decodePacket, FIXED_HEADER_BYTES } from './packet-codec.js';
import { PacketFramer } from './packet-framer.js';
import type { SensorPacket } from './types.js';

const createTestPacket = (overrides: Partial<SensorPacket> = {}): SensorPacket => {
  const values = overrides.payload ? undefined : [1, -2, 3, -4];
  return createPacket({
    streamId: 's1',
    timestampNs: 1_700_000_000_123_456_789n,
    timeSource: 'ntp',
    syncConfidence: 87,
    domain: 'acoustic',
    sampleRate: 48000,
    sampleCount: 2,
    format: 'int16',
    channels: 2,
    sequence: 42n,
    payload: values ? encodeSamples(values, 'int16') : new Uint8Array(0),
    ...overrides,
  });
};

describe('bridge URIs', () => {
  it('should parse typed params and keep unknown ones', () => {
    const parsed = parseBridgeUri(
      'bridge://mic-1/stream/audio?rate=48000&format=int16&channels=2&window=1024&gain=3'
    );

    expect(parsed.bridgeId).toBe('mic-1');
    expect(parsed.resourceType).toBe('stream');
    expect(parsed.streamSpec).toBe('audio');
    expect(parsed.params).toEqual({ rate: 48000, format: 'int16', channels: 2, window: 1024 });
    expect(parsed.extra).toEqual({ gain: '3' });
  });

  it('should parse a URI without a query', () => {
    const parsed = parseBridgeUri('bridge://accel-7/snapshot/x-axis');
    expect(parsed.resourceType).toBe('snapshot');
    expect(parsed.params).toEqual({});
    expect(parsed.extra).toEqual({});
  });

  it('should reject unknown resource types', () => {
    expect(() => parseBridgeUri('bridge://mic-1/telemetry/audio')).toThrow(ValidationError);
  });

  it('should reject malformed URIs', () => {
    expect(() => parseBridgeUri('http://mic-1/stream/audio')).toThrow(ValidationError);
    expect(() => parseBridgeUri('bridge://mic-1/stream')).toThrow(ValidationError);
  });

  it('should reject invalid typed params', () => {
    expect(() => parseBridgeUri('bridge://mic-1/stream/audio?rate=0')).toThrow('rate');
    expect(() => parseBridgeUri('bridge://mic-1/stream/audio?channels=1.5')).toThrow('channels');
    expect(() => parseBridgeUri('bridge://mic-1/stream/audio?format=int24')).toThrow('int24');
  });

  it('should format typed params in a fixed order', () => {
    const uri = formatBridgeUri({
      bridgeId: 'mic-1',
      resourceType: 'stream',
      streamSpec: 'audio',
      params: { format: 'int16', rate: 48000 },
      extra: { gain: '3' },
    });

    expect(uri).toBe('bridge://mic-1/stream/audio?rate=48000&format=int16&gain=3');
  });

  it('should format without a query when there are no params', () => {
    expect(
      formatBridgeUri({ bridgeId: 'accel-7', resourceType: 'analysis', streamSpec: 'fft' })
    ).toBe('bridge://accel-7/analysis/fft');
  });
});

describe('sample payloads', () => {
  it('should clamp and round integer formats', () => {
    const decoded = decodeSamples(encodeSamples([40000, -40000, 1.6], 'int16'), 'int16');
    expect(Array.from(decoded)).toEqual([32767, -32768, 2]);
  });

  it('should keep float64 values exactly', () => {
    const decoded = decodeSamples(encodeSamples([0.1, -2.5e-9], 'float64'), 'float64');
    expect(Array.from(decoded)).toEqual([0.1, -2.5e-9]);
  });

  it('should reject payloads that are not a whole number of samples', () => {
    expect(() => decodeSamples(new Uint8Array(3), 'int16')).toThrow(ValidationError);
  });

  it('should split interleaved channels', () => {
    const [left, right] = deinterleave(new Float64Array([1, 10, 2, 20, 3, 30]), 2);
    expect(Array.from(left!)).toEqual([1, 2, 3]);
    expect(Array.from(right!)).toEqual([10, 20, 30]);
  });
});

describe('packet codec', () => {
  it('should produce frozen packets', () => {
    const packet = createTestPacket();
    expect(Object.isFrozen(packet)).toBe(true);
  });

  it('should reject a payload that does not match count x channels x width', () => {
    expect(() => createTestPacket({ payload: new Uint8Array(6) })).toThrow(ValidationError);
  });

  it('should reject sync confidence above 100', () => {
    expect(() => createTestPacket({ syncConfidence: 101 })).toThrow('syncConfidence');
  });

  it('should lay out the header little-endian', () => {
    const bytes = encodePacket(createTestPacket());

    expect(bytes.byteLength).toBe(FIXED_HEADER_BYTES + 2 + 8);
    expect(Array.from(bytes.subarray(0, 4))).toEqual([0x53, 0x4c, 0x50, 0x4b]);
    expect(bytes[4]).toBe(1);
    // stream id length
    expect(bytes[5]).toBe(2);
    expect(bytes[6]).toBe(0);
    expect(new TextDecoder().decode(bytes.subarray(7, 9))).toBe('s1');

    const view = new DataView(bytes.buffer);
    expect(view.getBigUint64(9, true)).toBe(1_700_000_000_123_456_789n);
    // time source 'ntp' is tag 1, confidence, domain 'acoustic' is tag 0
    expect(bytes[17]).toBe(1);
    expect(bytes[18]).toBe(87);
    expect(bytes[19]).toBe(0);
    expect(view.getUint32(20, true)).toBe(48000);
    expect(view.getUint16(24, true)).toBe(2);
    // format 'int16' is tag 1
    expect(bytes[26]).toBe(1);
    expect(bytes[27]).toBe(2);
    expect(view.getBigUint64(28, true)).toBe(42n);
    expect(view.getUint32(36, true)).toBe(8);
  });

  it('should decode what it encodes', () => {
    const packet = createTestPacket();
    const result = decodePacket(encodePacket(packet));

    expect(result).not.toBeNull();
    expect(result?.bytesRead).toBe(48);
    expect(result?.packet).toEqual(packet);
    expect(Array.from(decodeSamples(result!.packet.payload, 'int16'))).toEqual([1, -2, 3, -4]);
  });

  it('should return null for an incomplete packet', () => {
    const bytes = encodePacket(createTestPacket());
    expect(decodePacket(bytes.subarray(0, 20))).toBeNull();
    expect(decodePacket(bytes.subarray(0, 47))).toBeNull();
  });

  it('should reject a payload length that disagrees with the header before the payload arrives', () => {
    const bytes = encodePacket(createTestPacket());
    bytes[39] = 0x7f;

    expect(() => decodePacket(bytes.subarray(0, FIXED_HEADER_BYTES + 2))).toThrow(
      'Payload length 2130706440 does not match header, expected 8'
    );
  });

  it('should reject an unsupported version', () => {
    const bytes = encodePacket(createTestPacket());
    bytes[4] = 9;
    expect(() => decodePacket(bytes)).toThrow('version');
  });
});

describe('PacketFramer', () => {
  const first = createTestPacket({ sequence: 1n });
  const second = createTestPacket({ sequence: 2n, streamId: 'stream-two' });
  const wire = (() => {
    const a = encodePacket(first);
    const b = encodePacket(second);
    const joined = new Uint8Array(a.byteLength + b.byteLength);
    joined.set(a, 0);
    joined.set(b, a.byteLength);
    return joined;
  })();

  it('should reassemble packets split across arbitrary chunks', () => {
    const framer = new PacketFramer('test');
    const packets: SensorPacket[] = [];

    for (let i = 0; i < wire.byteLength; i += 5) {
      packets.push(...framer.push(wire.subarray(i, i + 5)));
    }

    expect(packets.map((p) => p.sequence)).toEqual([1n, 2n]);
    expect(packets[1]!.streamId).toBe('stream-two');
    expect(framer.pendingBytes).toBe(0);
  });

  it('should hold a partial packet until the rest arrives', () => {
    const framer = new PacketFramer();
    expect(framer.push(wire.subarray(0, 10))).toEqual([]);
    expect(framer.pendingBytes).toBe(10);

    const packets = framer.push(wire.subarray(10));
    expect(packets).toHaveLength(2);
  });

  it('should resynchronize on the magic after garbage bytes', () => {
    const framer = new PacketFramer();
    const noisy = new Uint8Array(3 + wire.byteLength);
    noisy.set([0, 1, 2], 0);
    noisy.set(wire, 3);

    const packets = framer.push(noisy);

    expect(packets).toHaveLength(2);
    expect(framer.discardedBytes).toBe(3);
  });

  it('should skip a frame with a corrupt payload length instead of waiting on it', () => {
    const framer = new PacketFramer();
    const corrupt = wire.slice();
    corrupt[39] = 0x7f;

    const packets = framer.push(corrupt);

    expect(packets.map((p) => p.sequence)).toEqual([2n]);
    expect(framer.discardedBytes).toBe(48);
    expect(framer.pendingBytes).toBe(0);
  });
});
