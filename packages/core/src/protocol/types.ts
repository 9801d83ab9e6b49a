/**
 * Protocol Types
 * Stream addressing and wire packet shapes
 */

import type {
  ResourceType,
  SampleFormat,
  SensingDomain,
  SyncSource,
  Transport,
} from '@sensorlink/shared';

/**
 * Unit of streamed data. Instances produced by the codec are frozen.
 */
export interface SensorPacket {
  readonly streamId: string;
  /** Nanoseconds since the Unix epoch, UTC */
  readonly timestampNs: bigint;
  readonly timeSource: SyncSource;
  /** 0..100 */
  readonly syncConfidence: number;
  readonly domain: SensingDomain;
  readonly sampleRate: number;
  /** Samples per channel */
  readonly sampleCount: number;
  readonly format: SampleFormat;
  readonly channels: number;
  readonly sequence: bigint;
  /** Raw little-endian samples, interleaved by channel */
  readonly payload: Uint8Array;
}

export interface StreamParams {
  rate?: number;
  format?: SampleFormat;
  channels?: number;
  /** Samples per analysis window */
  window?: number;
  transport?: Transport;
}

export interface BridgeUri {
  bridgeId: string;
  resourceType: ResourceType;
  streamSpec: string;
  params: StreamParams;
  /** Query parameters with no typed meaning, preserved verbatim */
  extra: Record<string, string>;
}
