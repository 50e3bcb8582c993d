/**
 * Vector store: named collections of embedded records with similarity search.
 *
 * `SqliteVectorStore` keeps records in SQLite and caches each collection in
 * memory on first access for brute-force search.
 *
 * ## Architecture
 *
 * ```
 * ┌─────────────────────────────────────────────────────────────┐
 * │                   SqliteVectorStore                         │
 * │  ┌─────────────────────────┐    ┌─────────────────────────┐ │
 * │  │  In-Memory Cache        │    │   SQLite Persistence    │ │
 * │  │  collection →           │ ◄──┤  vectors (collection,   │ │
 * │  │    Map<id, record>      │    │   id, embedding, ...)   │ │
 * │  └─────────────────────────┘    └─────────────────────────┘ │
 * └─────────────────────────────────────────────────────────────┘
 * ```
 *
 * ## Scoring
 *
 * Cosine distance (0 = identical, 2 = opposite) is reported as
 * `similarity = 1 - distance / 2`:
 * - `1.0`: Identical direction
 * - `0.5`: Orthogonal
 * - `0.0`: Opposite
 *
 * Hits below the threshold are dropped, the rest sorted by similarity
 * descending and truncated to the limit.
 *
 * @module storage/vector-store
 */

import type { Db } from './db.js';
import { cosineDistance, distanceToSimilarity } from '../utils/cosine-distance.js';
import { serializeEmbedding, deserializeEmbedding, assertValidEmbedding } from '../utils/embedding-utils.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { ProviderRegistry } from '../utils/provider-registry.js';
import type { VectorFilter, VectorMetadata, VectorRecord, VectorSearchHit } from './types.js';

const log = createLogger('vector-store');

export interface VectorDeleteOptions {
  ids?: string[];
  filter?: VectorFilter;
}

export interface VectorStore {
  /** Add records; fails if any id already exists in the collection. */
  insert(collection: string, records: VectorRecord[]): Promise<void>;
  /** Add or replace records by id. */
  upsert(collection: string, records: VectorRecord[]): Promise<void>;
  /**
   * Nearest records to any of `queryVectors` (each record scored by its best
   * match). Undefined when the collection does not exist.
   */
  search(
    collection: string,
    queryVectors: number[][],
    filter: VectorFilter | undefined,
    limit: number,
    threshold: number,
  ): Promise<VectorSearchHit[] | undefined>;
  /** Records matching `filter`, in id order. Undefined when the collection does not exist. */
  query(collection: string, filter: VectorFilter | undefined, limit?: number): Promise<VectorRecord[] | undefined>;
  /** Every record of the collection. Undefined when the collection does not exist. */
  get(collection: string): Promise<VectorRecord[] | undefined>;
  /** Delete by ids and/or filter; returns the number of records removed. */
  delete(collection: string, options: VectorDeleteOptions): Promise<number>;
  /** Drop every collection. */
  reset(): Promise<void>;
  hasCollection(collection: string): Promise<boolean>;
  deleteCollection(collection: string): Promise<void>;
}

/**
 * Whether `metadata` equals `filter` on every filter key.
 */
export function matchesFilter(metadata: VectorMetadata, filter: VectorFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

function isMetadataValue(value: unknown): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Parse stored metadata JSON, keeping only scalar values.
 */
export function parseVectorMetadata(json: string): VectorMetadata {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    raw = {};
  }
  const source = typeof raw === 'object' && raw !== null ? Object.entries(raw) : [];

  const metadata: VectorMetadata = {
    artifactId: '',
    parentId: '',
    artifactType: '',
    embeddingModel: '',
    createdAt: '',
    updatedAt: '',
  };
  for (const [key, value] of source) {
    if (isMetadataValue(value)) metadata[key] = value;
  }
  return metadata;
}

interface VectorRow {
  id: string;
  embedding: Buffer;
  content: string;
  metadata: string;
}

export class SqliteVectorStore implements VectorStore {
  private readonly cache = new Map<string, Map<string, VectorRecord>>();

  constructor(private readonly db: Db) {}

  /**
   * Load a collection into memory. Undefined when it does not exist.
   */
  private load(collection: string): Map<string, VectorRecord> | undefined {
    const cached = this.cache.get(collection);
    if (cached) return cached;

    const exists = this.db
      .prepare<[string], { name: string }>('SELECT name FROM vector_collections WHERE name = ?')
      .get(collection);
    if (!exists) return undefined;

    const rows = this.db
      .prepare<[string], VectorRow>(
        'SELECT id, embedding, content, metadata FROM vectors WHERE collection = ? ORDER BY id',
      )
      .all(collection);

    const records = new Map<string, VectorRecord>();
    for (const row of rows) {
      records.set(row.id, {
        id: row.id,
        embedding: deserializeEmbedding(row.embedding),
        content: row.content,
        metadata: parseVectorMetadata(row.metadata),
      });
    }
    this.cache.set(collection, records);
    log.debug('Loaded collection', { collection, count: records.size });
    return records;
  }

  private ensureCollection(collection: string): Map<string, VectorRecord> {
    const existing = this.load(collection);
    if (existing) return existing;
    this.db.prepare('INSERT OR IGNORE INTO vector_collections (name) VALUES (?)').run(collection);
    const records = new Map<string, VectorRecord>();
    this.cache.set(collection, records);
    return records;
  }

  private write(collection: string, records: VectorRecord[], replace: boolean): void {
    for (const record of records) {
      assertValidEmbedding(record.embedding, record.id);
    }

    const cached = this.ensureCollection(collection);
    if (!replace) {
      const duplicate = records.find((r) => cached.has(r.id));
      if (duplicate) {
        throw new StorageError(
          `Vector ${duplicate.id} already exists in ${collection}`,
          'VECTOR_INSERT_FAILED',
        );
      }
    }

    const stmt = this.db.prepare(
      `INSERT OR REPLACE INTO vectors (collection, id, embedding, content, metadata, updated_at)
       VALUES (?, ?, ?, ?, ?, CURRENT_TIMESTAMP)`,
    );
    const writeMany = this.db.transaction((items: VectorRecord[]) => {
      for (const item of items) {
        stmt.run(collection, item.id, serializeEmbedding(item.embedding), item.content, JSON.stringify(item.metadata));
      }
    });
    writeMany(records);

    for (const record of records) {
      cached.set(record.id, record);
    }
  }

  async insert(collection: string, records: VectorRecord[]): Promise<void> {
    try {
      this.write(collection, records, false);
    } catch (error) {
      if (error instanceof StorageError) throw error;
      log.error('Insert failed', { collection, count: records.length, error: errorMessage(error) });
      throw new StorageError(`Failed to insert vectors into ${collection}`, 'VECTOR_INSERT_FAILED', error);
    }
  }

  async upsert(collection: string, records: VectorRecord[]): Promise<void> {
    try {
      this.write(collection, records, true);
    } catch (error) {
      log.error('Upsert failed', { collection, count: records.length, error: errorMessage(error) });
      throw new StorageError(`Failed to upsert vectors into ${collection}`, 'VECTOR_INSERT_FAILED', error);
    }
  }

  async search(
    collection: string,
    queryVectors: number[][],
    filter: VectorFilter | undefined,
    limit: number,
    threshold: number,
  ): Promise<VectorSearchHit[] | undefined> {
    const start = performance.now();
    let records: Map<string, VectorRecord> | undefined;
    try {
      records = this.load(collection);
    } catch (error) {
      log.error('Search failed', { collection, error: errorMessage(error) });
      throw new StorageError(`Vector search failed for ${collection}`, 'VECTOR_SEARCH_FAILED', error);
    }
    if (!records) return undefined;

    const hits: VectorSearchHit[] = [];
    for (const record of records.values()) {
      if (!matchesFilter(record.metadata, filter)) continue;

      let similarity = 0;
      for (const query of queryVectors) {
        similarity = Math.max(similarity, distanceToSimilarity(cosineDistance(query, record.embedding)));
      }
      if (similarity < threshold) continue;

      hits.push({ id: record.id, content: record.content, metadata: record.metadata, similarity });
    }

    hits.sort((a, b) => b.similarity - a.similarity || a.id.localeCompare(b.id));
    const top = hits.slice(0, Math.max(0, limit));

    log.debug('Search complete', {
      collection,
      scanned: records.size,
      returned: top.length,
      durationMs: Math.round(performance.now() - start),
    });
    return top;
  }

  async query(collection: string, filter: VectorFilter | undefined, limit?: number): Promise<VectorRecord[] | undefined> {
    const records = this.load(collection);
    if (!records) return undefined;
    const matched = [...records.values()]
      .filter((r) => matchesFilter(r.metadata, filter))
      .sort((a, b) => a.id.localeCompare(b.id));
    return limit === undefined ? matched : matched.slice(0, limit);
  }

  async get(collection: string): Promise<VectorRecord[] | undefined> {
    return this.query(collection, undefined);
  }

  async delete(collection: string, options: VectorDeleteOptions): Promise<number> {
    // No selector: nothing to delete
    if (!options.ids && !options.filter) return 0;

    const records = this.load(collection);
    if (!records) return 0;

    const idSet = options.ids ? new Set(options.ids) : undefined;
    const doomed = [...records.values()]
      .filter((r) => (idSet ? idSet.has(r.id) : true))
      .filter((r) => matchesFilter(r.metadata, options.filter))
      .map((r) => r.id);
    if (doomed.length === 0) return 0;

    try {
      const stmt = this.db.prepare('DELETE FROM vectors WHERE collection = ? AND id = ?');
      const deleteMany = this.db.transaction((ids: string[]) => {
        for (const id of ids) stmt.run(collection, id);
      });
      deleteMany(doomed);
    } catch (error) {
      log.error('Delete failed', { collection, error: errorMessage(error) });
      throw new StorageError(`Failed to delete vectors from ${collection}`, 'VECTOR_DELETE_FAILED', error);
    }

    for (const id of doomed) records.delete(id);
    return doomed.length;
  }

  async reset(): Promise<void> {
    this.db.exec('DELETE FROM vectors; DELETE FROM vector_collections;');
    this.cache.clear();
  }

  async hasCollection(collection: string): Promise<boolean> {
    return this.load(collection) !== undefined;
  }

  async deleteCollection(collection: string): Promise<void> {
    try {
      this.db.prepare('DELETE FROM vectors WHERE collection = ?').run(collection);
      this.db.prepare('DELETE FROM vector_collections WHERE name = ?').run(collection);
    } catch (error) {
      log.error('Delete collection failed', { collection, error: errorMessage(error) });
      throw new StorageError(`Failed to delete collection ${collection}`, 'VECTOR_DELETE_FAILED', error);
    }
    this.cache.delete(collection);
  }
}

export const vectorStoreRegistry = new ProviderRegistry<Db, VectorStore>('vector store').register(
  'sqlite',
  (db) => new SqliteVectorStore(db),
);
