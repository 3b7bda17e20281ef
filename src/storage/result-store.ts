/**
 * Result Store - Persistent storage for posterior summaries
 *
 * Each record keeps the summary, its name and a SHA3-256 checksum of the
 * canonical summary JSON. The checksum is verified on every load.
 *
 * @module storage/result-store
 */

import { Level } from 'level';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ISO8601, SHA3Hash, UUID } from '../types/index.js';
import { IntegrityError } from '../core/errors.js';
import { parsePosteriorSummary, type PosteriorSummary } from '../results/tabulated-result.js';
import { hashObject, verifyObjectHash } from '../utils/hash.js';
import { storageLogger } from '../utils/logger.js';
import { generateUUID } from '../utils/uuid.js';

const log = storageLogger.child('results');

export interface ResultStoreOptions {
  dataDir: string;
}

export interface ResultRecordInfo {
  id: UUID;
  name: string | null;
  createdAt: ISO8601;
  checksum: SHA3Hash;
  latentLabels: string[];
  hyperparameters: string[];
}

export interface ResultRecord extends ResultRecordInfo {
  summary: PosteriorSummary;
}

/**
 * Serialized record format for storage
 */
interface SerializedRecord {
  id: UUID;
  name: string | null;
  createdAt: ISO8601;
  checksum: SHA3Hash;
  summary: unknown;
}

const KEY_PREFIX = 'result:';

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'LEVEL_NOT_FOUND';
}

function isSerializedRecord(value: unknown): value is SerializedRecord {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value && typeof value.id === 'string' &&
    'createdAt' in value && typeof value.createdAt === 'string' &&
    'checksum' in value && typeof value.checksum === 'string' &&
    'name' in value && (value.name === null || typeof value.name === 'string') &&
    'summary' in value
  );
}

export class ResultStore {
  private db: Level<string, string>;
  private dataDir: string;
  private initialized: boolean = false;

  constructor(options: ResultStoreOptions) {
    this.dataDir = options.dataDir;
    this.db = new Level(path.join(this.dataDir, 'results'), {
      valueEncoding: 'utf8'
    });
  }

  /**
   * Initialize store
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    await fs.mkdir(this.dataDir, { recursive: true });
    await this.db.open();
    this.initialized = true;
    log.debug('Result store opened', { dataDir: this.dataDir });
  }

  /**
   * Close store
   */
  async close(): Promise<void> {
    if (!this.initialized) return;
    await this.db.close();
    this.initialized = false;
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('ResultStore not initialized. Call init() first.');
    }
  }

  /**
   * Store a summary; returns the new record id
   */
  async save(summary: PosteriorSummary, options: { name?: string | null } = {}): Promise<UUID> {
    this.ensureInitialized();

    const record: SerializedRecord = {
      id: generateUUID(),
      name: options.name ?? null,
      createdAt: new Date().toISOString(),
      checksum: hashObject(summary),
      summary,
    };
    await this.db.put(KEY_PREFIX + record.id, JSON.stringify(record));
    log.info('Saved result', { id: record.id, name: record.name });
    return record.id;
  }

  /**
   * Load and verify a record; null when the id is unknown
   */
  async load(id: UUID): Promise<ResultRecord | null> {
    this.ensureInitialized();

    let raw: string;
    try {
      raw = await this.db.get(KEY_PREFIX + id);
    } catch (err) {
      if (isNotFound(err)) {
        return null;
      }
      throw err;
    }

    const record = this.parseRecord(raw, id);
    if (!verifyObjectHash(record.summary, record.checksum)) {
      throw new IntegrityError(`Checksum mismatch for result ${id}`);
    }
    return { ...this.describe(record), summary: parsePosteriorSummary(record.summary) };
  }

  /**
   * Record metadata, in key order
   */
  async list(): Promise<ResultRecordInfo[]> {
    this.ensureInitialized();

    const records: ResultRecordInfo[] = [];
    for await (const [key, value] of this.db.iterator({ gte: KEY_PREFIX, lt: KEY_PREFIX + '\xff' })) {
      records.push(this.describe(this.parseRecord(value, key.slice(KEY_PREFIX.length))));
    }
    return records;
  }

  /**
   * Delete a record; false when the id is unknown
   */
  async delete(id: UUID): Promise<boolean> {
    this.ensureInitialized();

    const key = KEY_PREFIX + id;
    try {
      await this.db.get(key);
    } catch (err) {
      if (isNotFound(err)) {
        return false;
      }
      throw err;
    }
    await this.db.del(key);
    log.info('Deleted result', { id });
    return true;
  }

  private parseRecord(raw: string, id: string): SerializedRecord {
    const parsed: unknown = JSON.parse(raw);
    if (!isSerializedRecord(parsed)) {
      throw new IntegrityError(`Malformed record for result ${id}`);
    }
    return parsed;
  }

  private describe(record: SerializedRecord): ResultRecordInfo {
    const summary = parsePosteriorSummary(record.summary);
    return {
      id: record.id,
      name: record.name,
      createdAt: record.createdAt,
      checksum: record.checksum,
      latentLabels: Object.keys(summary.latent),
      hyperparameters: Object.keys(summary.hyperparameters),
    };
  }
}
