/**
 * Capability Event Repository
 * SQLite-backed capability ledger
 */

import { asc, eq } from 'drizzle-orm';
import {
  DatabaseError,
  capabilityEventBodySchema,
  formatIssues,
  type CapabilityEvent,
  type CapabilityLedger,
} from '@sensorlink/shared';
import { getDatabase } from '../connection.js';
import { capabilityEvents } from '../schema.js';

type CapabilityEventRow = typeof capabilityEvents.$inferSelect;

export class CapabilityEventRepository implements CapabilityLedger {
  /**
   * Append an event; false when its hash is already stored
   */
  async append(event: CapabilityEvent): Promise<boolean> {
    const db = getDatabase();

    const result = db
      .insert(capabilityEvents)
      .values({
        hash: event.hash,
        bridgeId: event.bridgeId,
        type: event.body.type,
        at: event.body.at,
        body: JSON.stringify(event.body),
      })
      .onConflictDoNothing({ target: capabilityEvents.hash })
      .run();

    return result.changes > 0;
  }

  async listByBridge(bridgeId: string): Promise<CapabilityEvent[]> {
    const db = getDatabase();
    const rows = await db
      .select()
      .from(capabilityEvents)
      .where(eq(capabilityEvents.bridgeId, bridgeId))
      .orderBy(asc(capabilityEvents.seq));

    return rows.map((row) => this.mapToEvent(row));
  }

  async listAll(): Promise<CapabilityEvent[]> {
    const db = getDatabase();
    const rows = await db.select().from(capabilityEvents).orderBy(asc(capabilityEvents.seq));

    return rows.map((row) => this.mapToEvent(row));
  }

  private mapToEvent(row: CapabilityEventRow): CapabilityEvent {
    const raw: unknown = JSON.parse(row.body);
    const body = capabilityEventBodySchema.safeParse(raw);
    if (!body.success) {
      throw new DatabaseError(`Corrupt capability event ${row.hash}: ${formatIssues(body.error)}`, 'E6002', {
        bridgeId: row.bridgeId,
      });
    }

    return { hash: row.hash, bridgeId: row.bridgeId, body: body.data };
  }
}

export const capabilityEventRepository = new CapabilityEventRepository();
