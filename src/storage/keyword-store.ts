/**
 * FTS5-backed lexical index for chunk and artifact text.
 *
 * Provides BM25-ranked full-text search using SQLite FTS5 with porter
 * stemming. Entries are partitioned by collection (the workspace id), the
 * same way vector records are.
 */

import type { Db } from './db.js';
import type { KeywordSearchResult } from './types.js';
import { StorageError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('keyword-store');

export interface KeywordEntry {
  id: string;
  artifactId: string;
  parentId: string;
  content: string;
}

export interface KeywordHit extends KeywordSearchResult {
  artifactId: string;
  parentId: string;
  content: string;
}

/**
 * Sanitize a query string for FTS5 MATCH syntax.
 * Strips FTS5 operators and quotes each remaining term.
 */
export function sanitizeQuery(query: string): string {
  if (!query || !query.trim()) return '';

  const sanitized = query
    // Remove boolean operators (AND, OR, NOT as full words)
    .replace(/\b(AND|OR|NOT|NEAR)\b/g, '')
    // Remove characters that carry FTS5 syntax
    .replace(/[*"(){}^~\-:+]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  if (!sanitized) return '';

  // Quote each term so nothing left is parsed as an operator
  return sanitized
    .split(/\s+/)
    .filter(Boolean)
    .map((t) => `"${t}"`)
    .join(' ');
}

interface HitRow {
  id: string;
  artifact_id: string;
  parent_id: string;
  content: string;
  score: number;
}

export class KeywordStore {
  constructor(private readonly db: Db) {}

  /**
   * Add or replace entries in `collection`.
   */
  upsert(collection: string, entries: KeywordEntry[]): void {
    if (entries.length === 0) return;
    // ON CONFLICT ... DO UPDATE fires the update trigger that keeps FTS in sync
    const stmt = this.db.prepare(
      `INSERT INTO lexical_entries (collection, id, artifact_id, parent_id, content)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT(collection, id) DO UPDATE SET
         artifact_id = excluded.artifact_id,
         parent_id = excluded.parent_id,
         content = excluded.content`,
    );
    const upsertMany = this.db.transaction((items: KeywordEntry[]) => {
      for (const e of items) {
        stmt.run(collection, e.id, e.artifactId, e.parentId, e.content);
      }
    });

    try {
      upsertMany(entries);
    } catch (error) {
      log.error('Keyword upsert failed', { collection, count: entries.length, error: errorMessage(error) });
      throw new StorageError(`Failed to write lexical entries for ${collection}`, 'KEYWORD_INSERT_FAILED', error);
    }
  }

  /**
   * Full-text search with BM25 ranking, best match first.
   */
  search(collection: string, query: string, limit: number): KeywordHit[] {
    const sanitized = sanitizeQuery(query);
    if (!sanitized) return [];

    try {
      const rows = this.db
        .prepare<[string, string, number], HitRow>(
          `SELECT e.id, e.artifact_id, e.parent_id, e.content, bm25(lexical_fts) as score
           FROM lexical_fts
           JOIN lexical_entries e ON e.rowid = lexical_fts.rowid
           WHERE lexical_fts MATCH ?
             AND e.collection = ?
           ORDER BY bm25(lexical_fts)
           LIMIT ?`,
        )
        .all(sanitized, collection, limit);

      // bm25() returns negative scores (lower = better match), negate for conventional scoring
      return rows.map((r) => ({
        id: r.id,
        artifactId: r.artifact_id,
        parentId: r.parent_id,
        content: r.content,
        score: -r.score,
      }));
    } catch (error) {
      log.warn('Keyword search failed', { collection, error: errorMessage(error) });
      return [];
    }
  }

  /**
   * Remove every entry of an artifact (its own and its chunks').
   */
  deleteByArtifact(collection: string, artifactId: string): number {
    return this.db
      .prepare('DELETE FROM lexical_entries WHERE collection = ? AND artifact_id = ?')
      .run(collection, artifactId).changes;
  }

  /**
   * Drop every entry of `collection`.
   */
  clear(collection: string): number {
    return this.db.prepare('DELETE FROM lexical_entries WHERE collection = ?').run(collection).changes;
  }

  count(collection: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) as count FROM lexical_entries WHERE collection = ?')
      .get(collection);
    return row?.count ?? 0;
  }
}
