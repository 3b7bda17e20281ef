/**
 * Result Store Tests
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Level } from 'level';
import { IntegrityError } from '../../src/core/errors.js';
import type { PosteriorSummary } from '../../src/results/tabulated-result.js';
import { ResultStore } from '../../src/storage/result-store.js';
import { hashObject } from '../../src/utils/hash.js';
import { isValidUUID } from '../../src/utils/uuid.js';

const summary: PosteriorSummary = {
  latent: { intercept: { mean: [1.5], sd: [0.2] }, x: { mean: [0.5], sd: [0.1] } },
  hyperparameters: {
    Precision_for_obs: {
      internalName: 'Log_precision_for_obs',
      link: 'log',
      model: { mean: [2], sd: [0.5] },
      internal: { mean: [0.69], sd: [0.25] },
    },
  },
};

describe('ResultStore', () => {
  let dataDir: string;
  let store: ResultStore;

  // Writes record text behind the store's back, then reopens it
  async function writeRecordText(id: string, text: string): Promise<void> {
    await store.close();
    const db = new Level<string, string>(path.join(dataDir, 'results'), { valueEncoding: 'utf8' });
    await db.open();
    await db.put(`result:${id}`, text);
    await db.close();
    store = new ResultStore({ dataDir });
    await store.init();
  }

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'latent-eval-store-'));
    store = new ResultStore({ dataDir });
    await store.init();
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('should save and load a summary', async () => {
    const id = await store.save(summary, { name: 'first fit' });
    expect(isValidUUID(id)).toBe(true);

    const record = await store.load(id);
    expect(record).not.toBeNull();
    expect(record?.name).toBe('first fit');
    expect(record?.summary).toEqual(summary);
    expect(record?.checksum).toBe(hashObject(summary));
    expect(record?.latentLabels).toEqual(['intercept', 'x']);
    expect(record?.hyperparameters).toEqual(['Precision_for_obs']);
  });

  it('should return null for unknown ids', async () => {
    expect(await store.load('00000000-0000-4000-8000-000000000000')).toBeNull();
  });

  it('should list every record', async () => {
    const a = await store.save(summary);
    const b = await store.save(summary, { name: 'second' });

    const records = await store.list();
    expect(records.map(r => r.id).sort()).toEqual([a, b].sort());
    expect(records.find(r => r.id === b)?.name).toBe('second');
    expect(records.find(r => r.id === a)?.name).toBeNull();
  });

  it('should delete records', async () => {
    const id = await store.save(summary);

    expect(await store.delete(id)).toBe(true);
    expect(await store.delete(id)).toBe(false);
    expect(await store.load(id)).toBeNull();
    expect(await store.list()).toEqual([]);
  });

  it('should detect tampered summaries', async () => {
    const id = '11111111-1111-4111-8111-111111111111';
    const record = {
      id,
      name: null,
      createdAt: '2026-01-01T00:00:00.000Z',
      checksum: hashObject(summary),
      summary: { ...summary, latent: { x: { mean: [9], sd: [0.1] } } },
    };
    await writeRecordText(id, JSON.stringify(record));

    await expect(store.load(id)).rejects.toThrow(IntegrityError);
    await expect(store.load(id)).rejects.toThrow(`Checksum mismatch for result ${id}`);
  });

  it('should reject malformed records', async () => {
    const id = '22222222-2222-4222-8222-222222222222';
    await writeRecordText(id, JSON.stringify({ id }));

    await expect(store.load(id)).rejects.toThrow(`Malformed record for result ${id}`);
  });

});
