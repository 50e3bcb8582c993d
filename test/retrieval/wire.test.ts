/**
 * Tests for snake_case search result records.
 */

import { describe, it, expect } from 'vitest';
import { Artifact } from '../../src/artifacts/artifact.js';
import type { Chunk } from '../../src/artifacts/types.js';
import { artifactResultToRecord, chunkResultToRecord, keywordHitToRecord } from '../../src/retrieval/wire.js';

function chunk(index: number, content: string): Chunk {
  return {
    chunkId: `doc1_chunk_${index}`,
    content,
    chunkMetadata: {
      chunkIndex: index,
      chunkSize: content.length,
      chunkOverlap: 0,
      artifactId: 'doc1',
      artifactType: 'TEXT',
      parentArtifactId: '',
    },
  };
}

describe('chunkResultToRecord', () => {
  it('renames windows and chunk metadata', () => {
    const record = chunkResultToRecord({
      chunk: chunk(1, 'middle'),
      preNChunks: [chunk(0, 'first')],
      nextNChunks: [],
      score: 0.9,
    });

    expect(record).toEqual({
      chunk: {
        chunk_id: 'doc1_chunk_1',
        content: 'middle',
        chunk_metadata: {
          chunk_index: 1,
          chunk_size: 6,
          chunk_overlap: 0,
          artifact_id: 'doc1',
          artifact_type: 'TEXT',
          parent_artifact_id: '',
        },
      },
      pre_n_chunks: [expect.objectContaining({ chunk_id: 'doc1_chunk_0', content: 'first' })],
      next_n_chunks: [],
      score: 0.9,
    });
  });
});

describe('artifactResultToRecord', () => {
  it('wraps the artifact descriptor', () => {
    const artifact = new Artifact({ artifactId: 'notes', artifactType: 'MARKDOWN', content: '# Notes' });
    const record = artifactResultToRecord({ artifact, score: 0.85 });

    expect(record.score).toBe(0.85);
    expect(record.artifact).toEqual(artifact.toDict());
    expect(record.artifact.artifact_id).toBe('notes');
  });
});

describe('keywordHitToRecord', () => {
  it('renames identity fields', () => {
    expect(
      keywordHitToRecord({ id: 'sub_chunk_0', artifactId: 'sub', parentId: 'doc1', content: 'text', score: 2.5 }),
    ).toEqual({ id: 'sub_chunk_0', artifact_id: 'sub', parent_id: 'doc1', content: 'text', score: 2.5 });
  });
});
