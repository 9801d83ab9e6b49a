/**
 * Multi-stream alignment
 * Puts streams with different native rates on one timeline at the lowest
 * native rate, over the span every stream covers.
 */

import { InsufficientDataError, ValidationError } from '@sensorlink/shared';
import { decodeSamples, deinterleave } from '../protocol/samples.js';
import type { SensorPacket } from '../protocol/types.js';
import type { AlignedBundle, AlignedStream, TimedSeries } from './types.js';

const NS_PER_SECOND = 1e9;

/** Anything packets can be read from in order; a StreamSession qualifies */
export interface PacketSource {
  readonly id: string;
  read(): Promise<SensorPacket | null>;
}

/**
 * Timestamp of sample `index` in a packet
 */
export function sampleTimestamp(packet: SensorPacket, index: number): bigint {
  return packet.timestampNs + BigInt(Math.round((index * NS_PER_SECOND) / packet.sampleRate));
}

/**
 * Flatten one channel of consecutive packets into a timed series
 */
export function seriesFromPackets(
  streamId: string,
  packets: readonly SensorPacket[],
  channel = 0
): TimedSeries {
  const timestampsNs: bigint[] = [];
  const values: number[] = [];
  let sampleRate = 0;

  for (const packet of packets) {
    if (channel >= packet.channels) {
      throw new ValidationError(`Channel ${channel} not present in a ${packet.channels}-channel stream`, {
        streamId,
      });
    }
    sampleRate = packet.sampleRate;
    const samples = deinterleave(decodeSamples(packet.payload, packet.format), packet.channels)[channel];
    if (!samples) continue;

    for (let i = 0; i < samples.length; i++) {
      timestampsNs.push(sampleTimestamp(packet, i));
      values.push(samples[i] ?? 0);
    }
  }

  return { streamId, sampleRate, timestampsNs, values: Float64Array.from(values) };
}

/** The tail of a packet a previous window did not use */
export interface PacketRemainder {
  packet: SensorPacket;
  /** Samples already handed out */
  consumed: number;
}

/**
 * Read packets until `sampleCount` samples of `channel` are in hand. With
 * `remainders`, the unread tail of the last packet is kept under the source
 * id and starts the next read, so consecutive windows lose no samples.
 */
export async function readSeries(
  source: PacketSource,
  sampleCount: number,
  channel = 0,
  remainders?: Map<string, PacketRemainder>
): Promise<TimedSeries> {
  const carried = remainders?.get(source.id);
  remainders?.delete(source.id);

  const packets: SensorPacket[] = carried ? [carried.packet] : [];
  const skip = carried?.consumed ?? 0;
  let collected = carried ? carried.packet.sampleCount - carried.consumed : 0;

  while (collected < sampleCount) {
    const packet = await source.read();
    if (packet === null) {
      throw new InsufficientDataError(
        `stream ended after ${collected} of ${sampleCount} samples`,
        { sessionId: source.id }
      );
    }
    packets.push(packet);
    collected += packet.sampleCount;
  }

  const last = packets[packets.length - 1];
  const excess = collected - sampleCount;
  if (remainders && last && excess > 0) {
    remainders.set(source.id, { packet: last, consumed: last.sampleCount - excess });
  }

  const series = seriesFromPackets(source.id, packets, channel);
  return {
    ...series,
    timestampsNs: series.timestampsNs.slice(skip, skip + sampleCount),
    values: series.values.slice(skip, skip + sampleCount),
  };
}

/**
 * Resample every series onto a shared grid. Each grid point is linearly
 * interpolated from the samples that bracket it, and keeps their timestamps.
 */
export function alignStreams(series: readonly TimedSeries[]): AlignedBundle {
  if (series.length === 0) {
    throw new InsufficientDataError('no streams to align');
  }

  let sampleRate = Infinity;
  let startNs: bigint | null = null;
  let endNs: bigint | null = null;

  for (const s of series) {
    const first = s.timestampsNs[0];
    const last = s.timestampsNs[s.timestampsNs.length - 1];
    if (first === undefined || last === undefined || s.values.length !== s.timestampsNs.length) {
      throw new InsufficientDataError(`stream '${s.streamId}' has no usable samples`, {
        streamId: s.streamId,
      });
    }
    sampleRate = Math.min(sampleRate, s.sampleRate);
    startNs = startNs === null || first > startNs ? first : startNs;
    endNs = endNs === null || last < endNs ? last : endNs;
  }

  if (startNs === null || endNs === null || endNs < startNs) {
    throw new InsufficientDataError('streams do not overlap in time');
  }

  const start = startNs;
  const spanNs = Number(endNs - start);
  const count = Math.floor((spanNs * sampleRate) / NS_PER_SECOND + 1e-9) + 1;
  const timestampsNs: bigint[] = [];
  for (let k = 0; k < count; k++) {
    timestampsNs.push(start + BigInt(Math.round((k * NS_PER_SECOND) / sampleRate)));
  }

  return {
    sampleRate,
    startNs: start,
    timestampsNs,
    streams: series.map((s) => resample(s, timestampsNs)),
  };
}

function resample(series: TimedSeries, grid: readonly bigint[]): AlignedStream {
  const { timestampsNs: ts, values } = series;
  const out = new Float64Array(grid.length);
  const provenance: bigint[][] = [];
  let j = 0;

  for (let k = 0; k < grid.length; k++) {
    const t = grid[k] ?? 0n;
    while (j + 1 < ts.length && (ts[j + 1] ?? t) <= t) j++;

    const left = ts[j] ?? t;
    const right = ts[j + 1];

    if (left === t || right === undefined) {
      out[k] = values[j] ?? 0;
      provenance.push([left]);
      continue;
    }

    const fraction = Number(t - left) / Number(right - left);
    const a = values[j] ?? 0;
    const b = values[j + 1] ?? 0;
    out[k] = a + (b - a) * fraction;
    provenance.push([left, right]);
  }

  return {
    streamId: series.streamId,
    nativeRate: series.sampleRate,
    values: out,
    provenance,
  };
}
