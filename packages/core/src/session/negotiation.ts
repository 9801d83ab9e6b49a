/**
 * Stream parameter negotiation against an advertised capability
 */

import {
  RejectedParamsError,
  type BridgeCapability,
  type SampleFormat,
} from '@sensorlink/shared';
import { BYTES_PER_SAMPLE, isIntegerFormat } from '../protocol/samples.js';
import type { BridgeUri, StreamParams } from '../protocol/types.js';
import { selectTransport } from './sync-selector.js';
import type { Negotiation } from './types.js';

/**
 * Narrowest integer format holding the device's bit depth, else float64
 */
export function defaultFormat(bitDepth: number): SampleFormat {
  const bytes = Math.ceil(bitDepth / 8);
  if (bytes <= 1) return 'uint8';
  if (bytes <= 2) return 'int16';
  if (bytes <= 4) return 'int32';
  return 'float64';
}

/**
 * Merge URI and explicit params, validate them against the capability and
 * fill in defaults. Explicit params win over URI params.
 */
export function negotiate(
  capability: BridgeCapability,
  uri: BridgeUri,
  params: StreamParams = {}
): Negotiation {
  const merged: StreamParams = { ...uri.params, ...params };
  const context = { bridgeId: capability.bridgeId };

  if (uri.resourceType !== 'stream' && uri.resourceType !== 'mixed') {
    throw new RejectedParamsError(`resource type '${uri.resourceType}' cannot be subscribed`, context);
  }

  const rate = merged.rate ?? capability.maxSampleRate;
  if (!(rate > 0) || rate > capability.maxSampleRate) {
    throw new RejectedParamsError(
      `rate ${rate} outside (0, ${capability.maxSampleRate}]`,
      context
    );
  }

  const channels = merged.channels ?? capability.channels;
  if (!Number.isInteger(channels) || channels < 1 || channels > capability.channels) {
    throw new RejectedParamsError(
      `channels ${channels} outside [1, ${capability.channels}]`,
      context
    );
  }

  const format = merged.format ?? defaultFormat(capability.bitDepth);
  if (isIntegerFormat(format) && BYTES_PER_SAMPLE[format] > Math.ceil(capability.bitDepth / 8)) {
    throw new RejectedParamsError(
      `format ${format} is wider than the ${capability.bitDepth}-bit device`,
      context
    );
  }

  let transport = merged.transport;
  if (transport !== undefined) {
    if (!capability.transports.includes(transport)) {
      throw new RejectedParamsError(`transport ${transport} not advertised`, context);
    }
  } else {
    transport = selectTransport(capability.transports) ?? undefined;
    if (transport === undefined) {
      throw new RejectedParamsError('bridge advertises no usable transport', context);
    }
  }

  return {
    bridgeId: capability.bridgeId,
    streamSpec: uri.streamSpec,
    rate,
    format,
    channels,
    transport,
    window: merged.window,
  };
}
