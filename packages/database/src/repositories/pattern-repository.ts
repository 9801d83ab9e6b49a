/**
 * Pattern Repository
 * SQLite-backed PatternStore
 */

import { asc, eq } from 'drizzle-orm';
import {
  DatabaseError,
  formatIssues,
  patternStateSchema,
  type PatternState,
  type PatternStore,
} from '@sensorlink/shared';
import { getDatabase } from '../connection.js';
import { patterns } from '../schema.js';

type PatternRow = typeof patterns.$inferSelect;

export class PatternRepository implements PatternStore {
  async get(id: string): Promise<PatternState | null> {
    const db = getDatabase();
    const result = await db.select().from(patterns).where(eq(patterns.id, id)).limit(1);

    const [row] = result;
    return row ? this.mapToState(row) : null;
  }

  /**
   * Insert or replace the stored state. Callers merge before writing.
   */
  async put(state: PatternState): Promise<void> {
    const db = getDatabase();
    const values = {
      domainA: state.domains[0],
      domainB: state.domains[1],
      operation: state.operation,
      lagMs: state.lagMs,
      mechanism: state.mechanism,
      originAgent: state.originAgent,
      discoveredAt: state.discoveredAt,
      contributions: JSON.stringify(state.contributions),
      falsePositiveReporters: JSON.stringify(state.falsePositiveReporters),
      provenance: state.provenance ? JSON.stringify(state.provenance) : null,
      updatedAt: new Date(),
    };

    await db
      .insert(patterns)
      .values({ id: state.id, ...values })
      .onConflictDoUpdate({ target: patterns.id, set: values });
  }

  async list(): Promise<PatternState[]> {
    const db = getDatabase();
    const rows = await db.select().from(patterns).orderBy(asc(patterns.id));
    return rows.map((row) => this.mapToState(row));
  }

  async count(): Promise<number> {
    const db = getDatabase();
    const rows = await db.select({ id: patterns.id }).from(patterns);
    return rows.length;
  }

  private mapToState(row: PatternRow): PatternState {
    const contributions: unknown = JSON.parse(row.contributions);
    const falsePositiveReporters: unknown = JSON.parse(row.falsePositiveReporters);
    const provenance: unknown = row.provenance === null ? undefined : JSON.parse(row.provenance);

    const parsed = patternStateSchema.safeParse({
      id: row.id,
      domains: [row.domainA, row.domainB],
      operation: row.operation,
      lagMs: row.lagMs,
      mechanism: row.mechanism,
      originAgent: row.originAgent,
      discoveredAt: row.discoveredAt,
      contributions,
      falsePositiveReporters,
      provenance,
    });
    if (!parsed.success) {
      throw new DatabaseError(`Corrupt pattern ${row.id}: ${formatIssues(parsed.error)}`, 'E6003', {
        patternId: row.id,
      });
    }
    return parsed.data;
  }
}

export const patternRepository = new PatternRepository();
