/**
 * bridge:// resource addressing
 */

import {
  RESOURCE_TYPES,
  SAMPLE_FORMATS,
  TRANSPORTS,
  ValidationError,
  type ResourceType,
} from '@sensorlink/shared';
import type { BridgeUri, StreamParams } from './types.js';

const URI_PATTERN = /^bridge:\/\/([^/?#]+)\/([a-z]+)\/([^?#]+)(?:\?([^#]*))?$/;

const TYPED_PARAMS = new Set(['rate', 'format', 'channels', 'window', 'transport']);

function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.some((t) => t === value);
}

function parsePositive(name: string, raw: string, integer: boolean): number {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    throw new ValidationError(`Invalid '${name}' parameter: ${raw}`, { param: name });
  }
  return value;
}

/**
 * Parse `bridge://<bridge-id>/<resource-type>/<stream-spec>?<params>`
 */
export function parseBridgeUri(uri: string): BridgeUri {
  const match = URI_PATTERN.exec(uri);
  if (!match) {
    throw new ValidationError(`Malformed bridge URI: ${uri}`);
  }

  const [, rawBridgeId = '', resourceType = '', rawSpec = '', query = ''] = match;

  if (!isResourceType(resourceType)) {
    throw new ValidationError(`Unknown resource type '${resourceType}'`, { uri });
  }

  const params: StreamParams = {};
  const extra: Record<string, string> = {};

  for (const [key, value] of new URLSearchParams(query)) {
    switch (key) {
      case 'rate':
        params.rate = parsePositive(key, value, false);
        break;
      case 'channels':
        params.channels = parsePositive(key, value, true);
        break;
      case 'window':
        params.window = parsePositive(key, value, true);
        break;
      case 'format': {
        const format = SAMPLE_FORMATS.find((f) => f === value);
        if (!format) {
          throw new ValidationError(`Unknown sample format '${value}'`, { uri });
        }
        params.format = format;
        break;
      }
      case 'transport': {
        const transport = TRANSPORTS.find((t) => t === value);
        if (!transport) {
          throw new ValidationError(`Unknown transport '${value}'`, { uri });
        }
        params.transport = transport;
        break;
      }
      default:
        extra[key] = value;
    }
  }

  return {
    bridgeId: decodeURIComponent(rawBridgeId),
    resourceType,
    streamSpec: decodeURIComponent(rawSpec),
    params,
    extra,
  };
}

/**
 * Inverse of parseBridgeUri; typed params come first in a fixed order
 */
export function formatBridgeUri(parts: {
  bridgeId: string;
  resourceType: ResourceType;
  streamSpec: string;
  params?: StreamParams;
  extra?: Record<string, string>;
}): string {
  const search = new URLSearchParams();
  const { params = {}, extra = {} } = parts;

  if (params.rate !== undefined) search.set('rate', String(params.rate));
  if (params.format !== undefined) search.set('format', params.format);
  if (params.channels !== undefined) search.set('channels', String(params.channels));
  if (params.window !== undefined) search.set('window', String(params.window));
  if (params.transport !== undefined) search.set('transport', params.transport);

  for (const [key, value] of Object.entries(extra)) {
    if (!TYPED_PARAMS.has(key)) {
      search.set(key, value);
    }
  }

  const query = search.toString();
  const base = `bridge://${encodeURIComponent(parts.bridgeId)}/${parts.resourceType}/${encodeURIComponent(parts.streamSpec)}`;
  return query ? `${base}?${query}` : base;
}
