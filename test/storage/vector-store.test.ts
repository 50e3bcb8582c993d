/**
 * Tests for the SQLite-backed vector store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Db } from '../../src/storage/db.js';
import {
  SqliteVectorStore,
  matchesFilter,
  parseVectorMetadata,
  vectorStoreRegistry,
} from '../../src/storage/vector-store.js';
import { ConfigError, StorageError } from '../../src/utils/errors.js';
import { createTestDb, createVectorRecord } from './test-utils.js';

describe('vector-store', () => {
  let db: Db;
  let store: SqliteVectorStore;

  beforeEach(() => {
    db = createTestDb();
    store = new SqliteVectorStore(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('search', () => {
    beforeEach(async () => {
      await store.upsert('ws', [
        createVectorRecord('same', [1, 0]),
        createVectorRecord('diagonal', [1, 1]),
        createVectorRecord('orthogonal', [0, 1]),
        createVectorRecord('opposite', [-1, 0]),
      ]);
    });

    it('maps cosine distance onto [0, 1] similarity', async () => {
      const hits = await store.search('ws', [[1, 0]], undefined, 10, 0);
      const byId = new Map(hits?.map((h) => [h.id, h.similarity]));

      expect(byId.get('same')).toBeCloseTo(1, 6);
      expect(byId.get('diagonal')).toBeCloseTo(1 - (1 - Math.SQRT1_2) / 2, 6);
      expect(byId.get('orthogonal')).toBeCloseTo(0.5, 6);
      expect(byId.get('opposite')).toBeCloseTo(0, 6);
    });

    it('orders hits by similarity descending', async () => {
      const hits = await store.search('ws', [[1, 0]], undefined, 10, 0);
      expect(hits?.map((h) => h.id)).toEqual(['same', 'diagonal', 'orthogonal', 'opposite']);
    });

    it('drops hits below the threshold', async () => {
      const hits = await store.search('ws', [[1, 0]], undefined, 10, 0.6);
      expect(hits?.map((h) => h.id)).toEqual(['same', 'diagonal']);
    });

    it('truncates to the limit', async () => {
      const hits = await store.search('ws', [[1, 0]], undefined, 1, 0);
      expect(hits?.map((h) => h.id)).toEqual(['same']);
    });

    it('scores each record by its best query vector', async () => {
      const hits = await store.search('ws', [[1, 0], [-1, 0]], undefined, 10, 0.99);
      expect(hits?.map((h) => h.id).sort()).toEqual(['opposite', 'same']);
    });

    it('applies metadata filters', async () => {
      await store.upsert('ws', [createVectorRecord('tagged', [1, 0], { artifactType: 'CODE' })]);
      const hits = await store.search('ws', [[1, 0]], { artifactType: 'CODE' }, 10, 0);
      expect(hits?.map((h) => h.id)).toEqual(['tagged']);
    });

    it('returns undefined for a missing collection', async () => {
      expect(await store.search('nope', [[1, 0]], undefined, 10, 0)).toBeUndefined();
    });
  });

  describe('writes', () => {
    it('rejects duplicate ids on insert', async () => {
      await store.insert('ws', [createVectorRecord('a', [1, 0])]);
      await expect(store.insert('ws', [createVectorRecord('a', [0, 1])])).rejects.toThrow(StorageError);
    });

    it('replaces records on upsert', async () => {
      await store.upsert('ws', [createVectorRecord('a', [1, 0])]);
      await store.upsert('ws', [{ ...createVectorRecord('a', [0, 1]), content: 'replaced' }]);

      const records = await store.get('ws');
      expect(records).toHaveLength(1);
      expect(records?.[0]?.content).toBe('replaced');
      expect(records?.[0]?.embedding).toEqual([0, 1]);
    });

    it('rejects empty or non-finite embeddings', async () => {
      await expect(store.upsert('ws', [createVectorRecord('a', [])])).rejects.toThrow(StorageError);
      await expect(store.insert('ws', [createVectorRecord('b', [Number.NaN])])).rejects.toThrow(StorageError);
    });

    it('persists records across store instances', async () => {
      await store.upsert('ws', [createVectorRecord('a', [0.5, 0.25], { chunkIndex: 3 })]);

      const reopened = new SqliteVectorStore(db);
      const records = await reopened.get('ws');
      expect(records?.[0]?.embedding).toEqual([0.5, 0.25]);
      expect(records?.[0]?.metadata.chunkIndex).toBe(3);
    });
  });

  describe('query and delete', () => {
    beforeEach(async () => {
      await store.upsert('ws', [
        createVectorRecord('c1', [1, 0], { artifactId: 'doc1' }),
        createVectorRecord('c2', [0, 1], { artifactId: 'doc1' }),
        createVectorRecord('c3', [1, 1], { artifactId: 'doc2' }),
      ]);
    });

    it('queries by filter in id order', async () => {
      const records = await store.query('ws', { artifactId: 'doc1' });
      expect(records?.map((r) => r.id)).toEqual(['c1', 'c2']);
      expect((await store.query('ws', undefined, 2))?.map((r) => r.id)).toEqual(['c1', 'c2']);
    });

    it('deletes by filter', async () => {
      expect(await store.delete('ws', { filter: { artifactId: 'doc1' } })).toBe(2);
      expect((await store.get('ws'))?.map((r) => r.id)).toEqual(['c3']);
    });

    it('deletes by ids', async () => {
      expect(await store.delete('ws', { ids: ['c1', 'c3', 'missing'] })).toBe(2);
      expect((await store.get('ws'))?.map((r) => r.id)).toEqual(['c2']);
    });

    it('deletes nothing without a selector', async () => {
      expect(await store.delete('ws', {})).toBe(0);
      expect(await store.get('ws')).toHaveLength(3);
    });

    it('drops a collection', async () => {
      await store.deleteCollection('ws');
      expect(await store.hasCollection('ws')).toBe(false);
      expect(await store.get('ws')).toBeUndefined();
    });

    it('resets every collection', async () => {
      await store.upsert('other', [createVectorRecord('x', [1, 0])]);
      await store.reset();
      expect(await store.hasCollection('ws')).toBe(false);
      expect(await store.hasCollection('other')).toBe(false);
    });
  });

  describe('helpers', () => {
    it('matches filters by equality on every key', () => {
      const metadata = createVectorRecord('a', [1]).metadata;
      expect(matchesFilter(metadata, undefined)).toBe(true);
      expect(matchesFilter(metadata, { artifactId: 'a', parentId: '' })).toBe(true);
      expect(matchesFilter(metadata, { artifactId: 'b' })).toBe(false);
    });

    it('keeps only scalar metadata values', () => {
      const metadata = parseVectorMetadata('{"artifactId":"a","chunkIndex":2,"nested":{"x":1}}');
      expect(metadata.artifactId).toBe('a');
      expect(metadata.chunkIndex).toBe(2);
      expect(metadata.nested).toBeUndefined();
    });

    it('falls back to empty metadata for malformed JSON', () => {
      expect(parseVectorMetadata('not json').artifactId).toBe('');
    });

    it('creates stores through the registry', () => {
      expect(vectorStoreRegistry.create('sqlite', db)).toBeInstanceOf(SqliteVectorStore);
      expect(() => vectorStoreRegistry.create('pinecone', db)).toThrow(ConfigError);
    });
  });
});
