/**
 * @sensorlink/shared
 * Shared types, schemas, utilities, and configuration for SensorLink
 */

export * from './types/index.js';
export * from './schemas/index.js';
export * from './config/index.js';
export * from './logger/index.js';
export * from './errors/index.js';
