/**
 * Protocol Layer
 * bridge:// addressing, sample payloads and the wire packet codec
 */

export { parseBridgeUri, formatBridgeUri } from './bridge-uri.js';
export {
  BYTES_PER_SAMPLE,
  isIntegerFormat,
  encodeSamples,
  decodeSamples,
  deinterleave,
} from './samples.js';
export {
  PACKET_MAGIC,
  PACKET_VERSION,
  FIXED_HEADER_BYTES,
  createPacket,
  encodePacket,
  decodePacket,
} from './packet-codec.js';
export type { DecodeResult } from './packet-codec.js';
export { PacketFramer } from './packet-framer.js';
export type { SensorPacket, StreamParams, BridgeUri } from './types.js';
