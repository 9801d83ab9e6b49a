/**
 * Process-local PatternStore
 */

import type { PatternState, PatternStore } from '@sensorlink/shared';

export class InMemoryPatternStore implements PatternStore {
  private states: Map<string, PatternState> = new Map();

  async get(id: string): Promise<PatternState | null> {
    const state = this.states.get(id);
    return state ? structuredClone(state) : null;
  }

  async put(state: PatternState): Promise<void> {
    this.states.set(state.id, structuredClone(state));
  }

  async list(): Promise<PatternState[]> {
    return [...this.states.values()].map((s) => structuredClone(s));
  }

  get size(): number {
    return this.states.size;
  }
}
