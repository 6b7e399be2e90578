/**
 * Tests for the SQLite store connector (in-memory database)
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { sleep } from '../pipeline/retry.js';
import { StorageStage } from '../stages/store.js';
import { RecordingLogger } from '../../tests/helpers/recording-logger.js';
import { analyzedText } from '../../tests/helpers/records.js';
import type { StorableRow } from './connector.js';
import { SqliteStoreConnector } from './sqlite.js';

function row(traceId: string, source = 'review'): StorableRow {
  return {
    traceId,
    source,
    originalContent: '<p>awful</p>',
    cleanedContent: 'awful',
    sentiment: 'negative',
    sentimentScore: -1,
    confidence: 0.2,
    metadata: { ticket: 12 },
    processedAt: '2024-05-01T10:00:00.000Z',
  };
}

describe('SqliteStoreConnector', () => {
  let store: SqliteStoreConnector;

  beforeEach(() => {
    store = new SqliteStoreConnector({ filename: ':memory:' });
  });

  afterEach(async () => {
    await store.close();
  });

  it('should write, commit and read a row back', async () => {
    const tx = await store.begin();
    const id = await tx.write(row('t-1'));
    await tx.commit();

    expect(id).toBe('1');
    expect(await store.findById('1')).toEqual({ ...row('t-1'), storageId: '1' });
  });

  it('should discard a rolled back row', async () => {
    const tx = await store.begin();
    const id = await tx.write(row('t-1'));
    await tx.rollback();

    expect(await store.findById(id)).toBeNull();
  });

  it('should roll back on abandon and free the connection', async () => {
    const tx = await store.begin();
    const id = await tx.write(row('t-1'));

    tx.abandon(new Error('deadline'));
    const next = await store.begin();
    await next.rollback();

    expect(await store.findById(id)).toBeNull();
  });

  it('should raise a permanent constraint error for a duplicate trace id', async () => {
    const first = await store.begin();
    await first.write(row('dup'));
    await first.commit();

    const second = await store.begin();
    let caught: unknown;
    try {
      await second.write(row('dup'));
    } catch (error) {
      caught = error;
    }
    await second.rollback();

    expect(caught).toMatchObject({ code: 'SQLITE_CONSTRAINT_UNIQUE' });
    expect(store.classify(caught)).toBe('permanent');
  });

  it('should serialize transactions on its single connection', async () => {
    const first = await store.begin();
    let secondOpened = false;
    const opening = store.begin().then((tx) => {
      secondOpened = true;
      return tx;
    });

    await sleep(20);
    expect(secondOpened).toBe(false);

    await first.commit();
    const second = await opening;
    expect(secondOpened).toBe(true);
    await second.rollback();
  });

  it('should not read rows of a transaction that is still open', async () => {
    const tx = await store.begin();
    const id = await tx.write(row('t-1'));
    let byIdSettled = false;
    const byId = store.findById(id).then((record) => {
      byIdSettled = true;
      return record;
    });
    const bySource = store.findBySource('review');

    await sleep(20);
    expect(byIdSettled).toBe(false);

    await tx.rollback();
    expect(await byId).toBeNull();
    expect(await bySource).toEqual([]);
  });

  it('should return null for ids that are not stored', async () => {
    expect(await store.findById('abc')).toBeNull();
    expect(await store.findById('0')).toBeNull();
    expect(await store.findById('99')).toBeNull();
  });

  it('should find rows by source, oldest first', async () => {
    for (const [traceId, source] of [['a', 'review'], ['b', 'ticket'], ['c', 'review']]) {
      const tx = await store.begin();
      await tx.write(row(traceId, source));
      await tx.commit();
    }

    const reviews = await store.findBySource('review');
    expect(reviews.map((record) => [record.storageId, record.traceId])).toEqual([
      ['1', 'a'],
      ['3', 'c'],
    ]);
  });

  it('should back the storage stage', async () => {
    const stage = new StorageStage(store);

    const result = await stage.process(analyzedText('good', { traceId: 't-stage' }), {
      traceId: 't-stage',
      logger: new RecordingLogger(),
    });

    const stored = await store.findById(result.storageId);
    expect(stored?.traceId).toBe('t-stage');
    expect(stored?.sentiment).toBe('positive');
  });

  it('should tolerate closing twice', async () => {
    await store.close();
    await expect(store.close()).resolves.toBeUndefined();
  });
});
