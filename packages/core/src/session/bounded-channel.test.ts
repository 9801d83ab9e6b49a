/**
 * Bounded Channel Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '@sensorlink/shared';
import { BoundedChannel } from './bounded-channel.js';

describe('BoundedChannel', () => {
  it('should reject watermarks that do not fit the capacity', () => {
    expect(() => new BoundedChannel({ capacity: 4, highWatermark: 5, lowWatermark: 1 })).toThrow(
      ValidationError
    );
    expect(() => new BoundedChannel({ capacity: 4, highWatermark: 2, lowWatermark: 2 })).toThrow(
      ValidationError
    );
  });

  it('should deliver items in FIFO order', () => {
    const channel = new BoundedChannel<number>({ capacity: 4, highWatermark: 3, lowWatermark: 1 });
    channel.push(1);
    channel.push(2);
    channel.push(3);

    expect([channel.shift(), channel.shift(), channel.shift(), channel.shift()]).toEqual([
      1,
      2,
      3,
      undefined,
    ]);
  });

  it('should fire high and low watermarks once per crossing', () => {
    const channel = new BoundedChannel<number>({ capacity: 4, highWatermark: 3, lowWatermark: 1 });
    const high = vi.fn();
    const low = vi.fn();
    channel.on('watermark:high', high);
    channel.on('watermark:low', low);

    channel.push(1);
    channel.push(2);
    channel.push(3);
    channel.push(4);
    expect(high).toHaveBeenCalledTimes(1);
    expect(high).toHaveBeenCalledWith({ size: 3 });

    channel.shift();
    channel.shift();
    expect(low).not.toHaveBeenCalled();
    channel.shift();
    expect(low).toHaveBeenCalledWith({ size: 1 });
  });

  it('should report a full channel under the block policy', () => {
    const channel = new BoundedChannel<number>({ capacity: 2, highWatermark: 2, lowWatermark: 0 });
    expect(channel.push(1)).toBe('accepted');
    expect(channel.push(2)).toBe('accepted');
    expect(channel.push(3)).toBe('full');
    expect(channel.size).toBe(2);
  });

  it('should overwrite the oldest item under drop_oldest and count it', () => {
    const channel = new BoundedChannel<number>({
      capacity: 2,
      highWatermark: 2,
      lowWatermark: 0,
      policy: 'drop_oldest',
    });
    const overrun = vi.fn();
    channel.on('overrun', overrun);

    channel.push(1);
    channel.push(2);
    expect(channel.push(3)).toBe('overwrote');
    expect(channel.push(4)).toBe('overwrote');

    expect(overrun).toHaveBeenLastCalledWith({ overwritten: 2 });
    expect(channel.overwritten).toBe(2);
    expect([channel.shift(), channel.shift()]).toEqual([3, 4]);
  });

  it('should hand pushed items straight to a waiting consumer', async () => {
    const channel = new BoundedChannel<string>({ capacity: 2, highWatermark: 2, lowWatermark: 0 });
    const pending = channel.take();

    channel.push('a');

    await expect(pending).resolves.toBe('a');
    expect(channel.size).toBe(0);
  });

  it('should resolve waiting consumers with null on close and keep buffered items', async () => {
    const empty = new BoundedChannel<string>({ capacity: 2, highWatermark: 2, lowWatermark: 0 });
    const pending = empty.take();
    empty.close();
    await expect(pending).resolves.toBeNull();

    const buffered = new BoundedChannel<string>({ capacity: 2, highWatermark: 2, lowWatermark: 0 });
    buffered.push('x');
    buffered.close();
    expect(buffered.push('y')).toBe('closed');
    await expect(buffered.take()).resolves.toBe('x');
    await expect(buffered.take()).resolves.toBeNull();
  });
});
