/**
 * Sample payload encoding
 * Little-endian, interleaved by channel
 */

import { ValidationError, type SampleFormat } from '@sensorlink/shared';

export const BYTES_PER_SAMPLE: Record<SampleFormat, number> = {
  uint8: 1,
  int16: 2,
  int32: 4,
  float32: 4,
  float64: 8,
};

const INTEGER_RANGE: Partial<Record<SampleFormat, [number, number]>> = {
  uint8: [0, 255],
  int16: [-32768, 32767],
  int32: [-2147483648, 2147483647],
};

export function isIntegerFormat(format: SampleFormat): boolean {
  return INTEGER_RANGE[format] !== undefined;
}

function toInteger(value: number, format: SampleFormat): number {
  const range = INTEGER_RANGE[format];
  if (!range) return value;
  const rounded = Math.round(value);
  return Math.min(range[1], Math.max(range[0], rounded));
}

/**
 * Encode interleaved sample values; integer formats are rounded and clamped
 */
export function encodeSamples(values: ArrayLike<number>, format: SampleFormat): Uint8Array {
  const width = BYTES_PER_SAMPLE[format];
  const bytes = new Uint8Array(values.length * width);
  const view = new DataView(bytes.buffer);

  for (let i = 0; i < values.length; i++) {
    const offset = i * width;
    const value = toInteger(values[i] ?? 0, format);
    switch (format) {
      case 'uint8':
        view.setUint8(offset, value);
        break;
      case 'int16':
        view.setInt16(offset, value, true);
        break;
      case 'int32':
        view.setInt32(offset, value, true);
        break;
      case 'float32':
        view.setFloat32(offset, value, true);
        break;
      case 'float64':
        view.setFloat64(offset, value, true);
        break;
    }
  }

  return bytes;
}

/**
 * Decode a payload into interleaved sample values
 */
export function decodeSamples(payload: Uint8Array, format: SampleFormat): Float64Array {
  const width = BYTES_PER_SAMPLE[format];
  if (payload.byteLength % width !== 0) {
    throw new ValidationError(
      `Payload length ${payload.byteLength} is not a multiple of the ${format} sample width`,
      { format }
    );
  }

  const count = payload.byteLength / width;
  const values = new Float64Array(count);
  const view = new DataView(payload.buffer, payload.byteOffset, payload.byteLength);

  for (let i = 0; i < count; i++) {
    const offset = i * width;
    switch (format) {
      case 'uint8':
        values[i] = view.getUint8(offset);
        break;
      case 'int16':
        values[i] = view.getInt16(offset, true);
        break;
      case 'int32':
        values[i] = view.getInt32(offset, true);
        break;
      case 'float32':
        values[i] = view.getFloat32(offset, true);
        break;
      case 'float64':
        values[i] = view.getFloat64(offset, true);
        break;
    }
  }

  return values;
}

/**
 * Split interleaved values into one array per channel
 */
export function deinterleave(values: Float64Array, channels: number): Float64Array[] {
  const perChannel = Math.floor(values.length / channels);
  const result: Float64Array[] = [];
  for (let c = 0; c < channels; c++) {
    const channel = new Float64Array(perChannel);
    for (let i = 0; i < perChannel; i++) {
      channel[i] = values[i * channels + c] ?? 0;
    }
    result.push(channel);
  }
  return result;
}
