/**
 * Storage Module Export
 * @module storage
 */

export { ResultStore } from './result-store.js';
export type { ResultStoreOptions, ResultRecord, ResultRecordInfo } from './result-store.js';
