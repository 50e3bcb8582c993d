/**
 * Tests for chunk identifiers and wire records.
 */

import { describe, it, expect } from 'vitest';
import {
  chunkFileName,
  chunkFromRecord,
  chunkId,
  chunkToRecord,
  isArtifactStatus,
  isArtifactType,
  type Chunk,
} from '../../src/artifacts/types.js';

const chunk: Chunk = {
  chunkId: 'doc1_chunk_2',
  content: 'third piece',
  chunkMetadata: {
    chunkIndex: 2,
    chunkSize: 11,
    chunkOverlap: 4,
    artifactId: 'doc1',
    artifactType: 'TEXT',
    parentArtifactId: '',
  },
};

describe('artifact types', () => {
  it('names chunks by artifact id and index', () => {
    expect(chunkId('doc1', 0)).toBe('doc1_chunk_0');
    expect(chunkFileName('doc1', 12)).toBe('doc1_chunk_12.json');
  });

  it('recognises the closed type and status sets', () => {
    expect(isArtifactType('MARKDOWN')).toBe(true);
    expect(isArtifactType('markdown')).toBe(false);
    expect(isArtifactStatus('ARCHIVED')).toBe(true);
    expect(isArtifactStatus(3)).toBe(false);
  });

  it('writes snake_case chunk records', () => {
    expect(chunkToRecord(chunk)).toEqual({
      chunk_id: 'doc1_chunk_2',
      content: 'third piece',
      chunk_metadata: {
        chunk_index: 2,
        chunk_size: 11,
        chunk_overlap: 4,
        artifact_id: 'doc1',
        artifact_type: 'TEXT',
        parent_artifact_id: '',
      },
    });
    expect(chunkFromRecord(chunkToRecord(chunk))).toEqual(chunk);
  });

  it('fills missing optional fields when parsing', () => {
    expect(chunkFromRecord({ content: 'abc', chunk_metadata: { chunk_index: 1, artifact_id: 'x' } })).toEqual({
      chunkId: 'x_chunk_1',
      content: 'abc',
      chunkMetadata: {
        chunkIndex: 1,
        chunkSize: 3,
        chunkOverlap: 0,
        artifactId: 'x',
        artifactType: '',
        parentArtifactId: '',
      },
    });
  });

  it('rejects payloads that are not chunks', () => {
    expect(chunkFromRecord(null)).toBeUndefined();
    expect(chunkFromRecord({ content: 'abc' })).toBeUndefined();
    expect(chunkFromRecord({ chunk_metadata: { artifact_id: 'x' } })).toBeUndefined();
  });
});
