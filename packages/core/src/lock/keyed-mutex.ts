/**
 * Keyed Mutex
 * Serializes async critical sections per key; different keys never wait on each other
 */

import { createChildLogger } from '@sensorlink/shared';

export class KeyedMutex {
  private tails: Map<string, Promise<void>> = new Map();
  private waiting: Map<string, number> = new Map();
  private logger = createChildLogger({ component: 'KeyedMutex' });

  /**
   * Run `task` once every earlier task for the same key has settled
   */
  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);
    this.waiting.set(key, (this.waiting.get(key) ?? 0) + 1);

    await previous;
    try {
      return await task();
    } finally {
      release();
      const remaining = (this.waiting.get(key) ?? 1) - 1;
      if (remaining === 0) {
        this.waiting.delete(key);
        this.tails.delete(key);
      } else {
        this.waiting.set(key, remaining);
      }
      this.logger.trace({ key, remaining }, 'Released key');
    }
  }

  /** Whether any task holds or awaits the key */
  isLocked(key: string): boolean {
    return this.waiting.has(key);
  }

  get activeKeys(): number {
    return this.waiting.size;
  }
}
