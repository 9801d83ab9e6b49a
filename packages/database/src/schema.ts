/**
 * Database Schema
 * Using Drizzle ORM with SQLite
 */

import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core';

/**
 * Append-only capability ledger. One row per content-addressed event;
 * `seq` keeps append order.
 */
export const capabilityEvents = sqliteTable(
  'capability_events',
  {
    seq: integer('seq').primaryKey({ autoIncrement: true }),
    hash: text('hash').notNull().unique(),
    bridgeId: text('bridge_id').notNull(),
    type: text('type', {
      enum: ['registered', 'heartbeat', 'rated', 'stream_registered', 'unregistered'],
    }).notNull(),
    at: integer('at').notNull(),
    body: text('body').notNull(), // JSON CapabilityEventBody
  },
  (table) => ({
    bridgeIdx: index('capability_events_bridge_idx').on(table.bridgeId),
  })
);

/**
 * Replicated pattern state. Derived fields (status, confidence, counts) are
 * not stored.
 */
export const patterns = sqliteTable(
  'patterns',
  {
    id: text('id').primaryKey(),
    domainA: text('domain_a').notNull(),
    domainB: text('domain_b').notNull(),
    operation: text('operation').notNull(),
    lagMs: real('lag_ms').notNull(),
    mechanism: text('mechanism').notNull(),
    originAgent: text('origin_agent').notNull(),
    discoveredAt: integer('discovered_at').notNull(),
    contributions: text('contributions').notNull(), // JSON object: agent id -> confidence
    falsePositiveReporters: text('false_positive_reporters').notNull(), // JSON array
    provenance: text('provenance'), // JSON, seeded patterns only
    updatedAt: integer('updated_at', { mode: 'timestamp' }).notNull(),
  },
  (table) => ({
    domainsIdx: index('patterns_domains_idx').on(table.domainA, table.domainB, table.operation),
  })
);
