/**
 * Stream Aligner Tests
 */
import { describe, it, expect } from 'vitest';
import { InsufficientDataError } from '@sensorlink/shared';
import { createPacket } from '../protocol/packet-codec.js';
import { encodeSamples } from '../protocol/samples.js';
import { alignStreams, readSeries, seriesFromPackets, type PacketRemainder } from './stream-aligner.js';
import type { TimedSeries } from './types.js';

const MS = 1_000_000n;

const series = (streamId: string, sampleRate: number, startMs: bigint, values: number[]): TimedSeries => ({
  streamId,
  sampleRate,
  timestampsNs: values.map((_, i) => startMs * MS + BigInt(Math.round((i * 1e9) / sampleRate))),
  values: Float64Array.from(values),
});

describe('alignStreams()', () => {
  it('should resample to the lowest native rate', () => {
    const fast = series('fast', 4, 0n, [0, 1, 2, 3, 4]);
    const slow = series('slow', 2, 0n, [10, 20, 30]);

    const bundle = alignStreams([fast, slow]);

    expect(bundle.sampleRate).toBe(2);
    expect(bundle.timestampsNs).toEqual([0n, 500n * MS, 1000n * MS]);
    expect(Array.from(bundle.streams[0]!.values)).toEqual([0, 2, 4]);
    expect(Array.from(bundle.streams[1]!.values)).toEqual([10, 20, 30]);
  });

  it('should cover only the overlap and keep the timestamps each value came from', () => {
    const fast = series('fast', 4, 0n, [0, 1, 2, 3, 4]);
    const slow = series('slow', 2, 100n, [10, 20]);

    const bundle = alignStreams([fast, slow]);

    expect(bundle.startNs).toBe(100n * MS);
    expect(bundle.timestampsNs).toEqual([100n * MS, 600n * MS]);
    expect(bundle.streams[0]!.values[0]).toBeCloseTo(0.4, 12);
    expect(bundle.streams[0]!.provenance[0]).toEqual([0n, 250n * MS]);
    expect(bundle.streams[0]!.values[1]).toBeCloseTo(2.4, 12);
    expect(bundle.streams[0]!.provenance[1]).toEqual([500n * MS, 750n * MS]);
    expect(bundle.streams[1]!.provenance).toEqual([[100n * MS], [600n * MS]]);
  });

  it('should refuse streams that never overlap', () => {
    const early = series('early', 2, 0n, [1, 2]);
    const late = series('late', 2, 5000n, [1, 2]);

    expect(() => alignStreams([early, late])).toThrow(InsufficientDataError);
  });

  it('should refuse empty streams', () => {
    expect(() => alignStreams([series('empty', 2, 0n, [])])).toThrow(InsufficientDataError);
  });
});

describe('seriesFromPackets()', () => {
  const packet = (sequence: bigint, timestampNs: bigint, values: number[]) =>
    createPacket({
      streamId: 's',
      timestampNs,
      timeSource: 'ntp',
      syncConfidence: 90,
      domain: 'vibration',
      sampleRate: 1000,
      sampleCount: values.length / 2,
      format: 'int16',
      channels: 2,
      sequence,
      payload: encodeSamples(values, 'int16'),
    });

  it('should take one channel and timestamp every sample', () => {
    const result = seriesFromPackets('s', [packet(0n, 0n, [1, -1, 2, -2]), packet(1n, 2n * MS, [3, -3])], 1);

    expect(Array.from(result.values)).toEqual([-1, -2, -3]);
    expect(result.timestampsNs).toEqual([0n, 1n * MS, 2n * MS]);
    expect(result.sampleRate).toBe(1000);
  });

  it('should fail when the stream ends early', async () => {
    const queue = [packet(0n, 0n, [1, 1])];
    const source = { id: 'session-1', read: async () => queue.shift() ?? null };

    await expect(readSeries(source, 4)).rejects.toThrow('stream ended after 1 of 4 samples');
  });

  it('should start the next window where the last one stopped', async () => {
    const queue = [
      packet(0n, 0n, [1, -1, 2, -2, 3, -3]),
      packet(1n, 3n * MS, [4, -4, 5, -5, 6, -6]),
      packet(2n, 6n * MS, [7, -7, 8, -8, 9, -9]),
    ];
    const source = { id: 'session-1', read: async () => queue.shift() ?? null };
    const remainders = new Map<string, PacketRemainder>();

    const first = await readSeries(source, 4, 0, remainders);
    expect(Array.from(first.values)).toEqual([1, 2, 3, 4]);
    expect(first.timestampsNs).toEqual([0n, 1n * MS, 2n * MS, 3n * MS]);
    expect(remainders.get('session-1')?.consumed).toBe(1);

    const second = await readSeries(source, 4, 0, remainders);
    expect(Array.from(second.values)).toEqual([5, 6, 7, 8]);
    expect(second.timestampsNs).toEqual([4n * MS, 5n * MS, 6n * MS, 7n * MS]);

    const third = await readSeries(source, 1, 1, remainders);
    expect(Array.from(third.values)).toEqual([-9]);
    expect(third.timestampsNs).toEqual([8n * MS]);
    expect(remainders.size).toBe(0);
  });
});
