/**
 * @sensorlink/database
 * SQLite persistence for the capability ledger and the pattern library
 */

export { initializeDatabase, getDatabase, closeDatabase } from './connection.js';
export type { DatabaseConnection, DatabaseConfig } from './connection.js';

export * from './schema.js';
export * from './repositories/index.js';
