/**
 * Utility Functions Export
 * @module utils
 */

export * from './hash.js';
export * from './uuid.js';
export * from './logger.js';
export * from './random.js';
export * from './linalg.js';
