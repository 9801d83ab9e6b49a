/**
 * Repository exports
 */

export { CapabilityEventRepository, capabilityEventRepository } from './capability-event-repository.js';
export { PatternRepository, patternRepository } from './pattern-repository.js';
