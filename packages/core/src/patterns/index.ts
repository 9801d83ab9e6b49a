/**
 * Pattern library
 */

export * from './types.js';
export { InMemoryPatternStore } from './in-memory-pattern-store.js';
export { derivePattern, deriveStatus, lagBucket, mergeStates, patternId, sortDomains } from './pattern-state.js';
export { PatternLibrary, type PatternLibraryOptions } from './pattern-library.js';
export { SEED_AGENT, loadSeedPatterns, parseSeedPatterns } from './seed-patterns.js';
