/**
 * Database Connection
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import { DatabaseError, createChildLogger } from '@sensorlink/shared';
import * as schema from './schema.js';

export type DatabaseConnection = BetterSQLite3Database<typeof schema>;

export interface DatabaseConfig {
  path: string;
  verbose?: boolean;
}

const logger = createChildLogger({ component: 'Database' });

let dbInstance: DatabaseConnection | null = null;
let sqliteInstance: Database.Database | null = null;

/**
 * Initialize database connection
 */
export function initializeDatabase(config: DatabaseConfig): DatabaseConnection {
  if (dbInstance) {
    return dbInstance;
  }

  logger.info({ path: config.path }, 'Initializing database');

  sqliteInstance = new Database(config.path, {
    verbose: config.verbose ? (message: unknown) => logger.debug({ sql: String(message) }, 'SQL') : undefined,
  });

  // WAL lets readers proceed while the ledger appends
  sqliteInstance.pragma('journal_mode = WAL');

  createTablesIfNotExist(sqliteInstance);

  dbInstance = drizzle(sqliteInstance, { schema });

  logger.info('Database initialized successfully');

  return dbInstance;
}

/**
 * Create database tables if they don't exist
 */
function createTablesIfNotExist(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS capability_events (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      hash TEXT NOT NULL UNIQUE,
      bridge_id TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('registered', 'heartbeat', 'rated', 'stream_registered', 'unregistered')),
      at INTEGER NOT NULL,
      body TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS capability_events_bridge_idx ON capability_events(bridge_id);

    CREATE TABLE IF NOT EXISTS patterns (
      id TEXT PRIMARY KEY,
      domain_a TEXT NOT NULL,
      domain_b TEXT NOT NULL,
      operation TEXT NOT NULL,
      lag_ms REAL NOT NULL,
      mechanism TEXT NOT NULL,
      origin_agent TEXT NOT NULL,
      discovered_at INTEGER NOT NULL,
      contributions TEXT NOT NULL,
      false_positive_reporters TEXT NOT NULL,
      provenance TEXT,
      updated_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS patterns_domains_idx ON patterns(domain_a, domain_b, operation);
  `);
}

/**
 * Get the initialized connection
 */
export function getDatabase(): DatabaseConnection {
  if (!dbInstance) {
    throw new DatabaseError('Database not initialized. Call initializeDatabase first.', 'E6001');
  }
  return dbInstance;
}

/**
 * Close database connection
 */
export function closeDatabase(): void {
  if (sqliteInstance) {
    sqliteInstance.close();
    sqliteInstance = null;
    dbInstance = null;
    logger.info('Database connection closed');
  }
}
