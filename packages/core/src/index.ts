/**
 * @sensorlink/core
 * Discovery, streaming, correlation and pattern sharing for SensorLink agents
 */

// Wire protocol and bridge:// addressing
export * from './protocol/index.js';

// Capability Registry
export * from './registry/index.js';

// Stream Session Manager
export * from './session/index.js';

// Correlation Engine
export * from './correlation/index.js';

// Significance Evaluator
export * from './significance/index.js';

// Pattern Library
export * from './patterns/index.js';

// End-to-end agent pipeline
export * from './pipeline/index.js';

// Per-key locking
export * from './lock/index.js';
