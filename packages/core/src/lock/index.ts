/**
 * Locking primitives
 */

export { KeyedMutex } from './keyed-mutex.js';
