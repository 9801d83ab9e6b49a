/**
 * Bounded Channel
 * Fixed-capacity FIFO between a producer and one consumer, with watermark
 * events for explicit backpressure and a per-channel overflow policy.
 */

import { EventEmitter } from 'eventemitter3';
import { ValidationError } from '@sensorlink/shared';
import type { OverflowPolicy } from './types.js';

export interface BoundedChannelOptions {
  capacity: number;
  /** Buffered count at which `watermark:high` fires */
  highWatermark: number;
  /** Buffered count at which `watermark:low` fires after a high mark */
  lowWatermark: number;
  policy: OverflowPolicy;
}

export type PushOutcome = 'accepted' | 'overwrote' | 'full' | 'closed';

export interface ChannelEvents {
  'watermark:high': { size: number };
  'watermark:low': { size: number };
  'overrun': { overwritten: number };
}

const DEFAULT_OPTIONS: BoundedChannelOptions = {
  capacity: 1024,
  highWatermark: 768,
  lowWatermark: 256,
  policy: 'block',
};

export class BoundedChannel<T> extends EventEmitter<ChannelEvents> {
  private options: BoundedChannelOptions;
  private slots: Array<T | undefined>;
  private head = 0;
  private count = 0;
  private closed = false;
  private aboveHigh = false;
  private overwrittenCount = 0;
  private waiters: Array<(item: T | null) => void> = [];

  constructor(options: Partial<BoundedChannelOptions> = {}) {
    super();
    this.options = { ...DEFAULT_OPTIONS, ...options };
    const { capacity, highWatermark, lowWatermark } = this.options;

    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ValidationError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
    if (!(lowWatermark < highWatermark && highWatermark <= capacity)) {
      throw new ValidationError(
        `Watermarks must satisfy low < high <= capacity (${lowWatermark}, ${highWatermark}, ${capacity})`
      );
    }

    this.slots = new Array<T | undefined>(capacity).fill(undefined);
  }

  push(item: T): PushOutcome {
    if (this.closed) return 'closed';

    // A waiting consumer takes the item directly
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return 'accepted';
    }

    const { capacity } = this.options;

    if (this.count === capacity) {
      if (this.options.policy === 'block') return 'full';

      this.slots[this.head] = item;
      this.head = (this.head + 1) % capacity;
      this.overwrittenCount += 1;
      this.emit('overrun', { overwritten: this.overwrittenCount });
      return 'overwrote';
    }

    this.slots[(this.head + this.count) % capacity] = item;
    this.count += 1;

    if (!this.aboveHigh && this.count >= this.options.highWatermark) {
      this.aboveHigh = true;
      this.emit('watermark:high', { size: this.count });
    }
    return 'accepted';
  }

  shift(): T | undefined {
    if (this.count === 0) return undefined;

    const item = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.options.capacity;
    this.count -= 1;

    if (this.aboveHigh && this.count <= this.options.lowWatermark) {
      this.aboveHigh = false;
      this.emit('watermark:low', { size: this.count });
    }
    return item;
  }

  /**
   * Next item, waiting for one if the channel is empty. Resolves null once
   * the channel is closed and drained.
   */
  take(): Promise<T | null> {
    const item = this.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);

    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop accepting items. Buffered items stay readable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter(null);
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.options.capacity;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items lost to the drop_oldest policy */
  get overwritten(): number {
    return this.overwrittenCount;
  }

  get policy(): OverflowPolicy {
    return this.options.policy;
  }
}
