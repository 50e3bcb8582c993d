/**
 * Failure handling of the filesystem chunk-directory swap.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import type { PathLike } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

const failures = vi.hoisted(() => {
  const state: { writeInto?: string; renameFrom?: string } = {};
  return state;
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    writeFile: vi.fn(async (...args: Parameters<typeof actual.writeFile>) => {
      if (failures.writeInto && String(args[0]).includes(failures.writeInto)) {
        throw new Error('disk full');
      }
      return actual.writeFile(...args);
    }),
    rename: vi.fn(async (from: PathLike, to: PathLike) => {
      if (failures.renameFrom && String(from).includes(failures.renameFrom)) {
        throw new Error('rename refused');
      }
      return actual.rename(from, to);
    }),
  };
});

import { LocalRepository } from '../../src/storage/local-repository.js';
import { createSampleArtifact, createSampleChunks } from './test-utils.js';

describe('LocalRepository chunk rewrite failures', () => {
  let dir: string;
  let repo: LocalRepository;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'chunkvault-local-'));
    repo = new LocalRepository(dir);
    const artifact = createSampleArtifact('doc1');
    await repo.storeArtifactChunks(artifact, createSampleChunks(artifact, 3));
  });

  afterEach(() => {
    delete failures.writeInto;
    delete failures.renameFrom;
    rmSync(dir, { recursive: true, force: true });
  });

  async function storedContents(): Promise<string[]> {
    const chunks = await repo.getChunks('doc1', '');
    return (chunks ?? []).map((c) => c.content).sort();
  }

  it('keeps the live chunks and removes staging when a write fails', async () => {
    failures.writeInto = '.staging-';
    const artifact = createSampleArtifact('doc1');

    const rewrite = repo.storeArtifactChunks(artifact, createSampleChunks(artifact, 2));

    await expect(rewrite).rejects.toMatchObject({ code: 'CHUNK_WRITE_FAILED' });
    expect(await storedContents()).toEqual(['doc1 part 0', 'doc1 part 1', 'doc1 part 2']);
    expect(readdirSync(join(dir, 'artifacts', 'doc1'))).toEqual(['chunks']);
  });

  it('restores the live chunks when the swap fails', async () => {
    failures.renameFrom = '.staging-';
    const artifact = createSampleArtifact('doc1');

    const rewrite = repo.storeArtifactChunks(artifact, createSampleChunks(artifact, 2));

    await expect(rewrite).rejects.toMatchObject({ code: 'CHUNK_WRITE_FAILED' });
    expect(await storedContents()).toEqual(['doc1 part 0', 'doc1 part 1', 'doc1 part 2']);
    expect(readdirSync(join(dir, 'artifacts', 'doc1'))).toEqual(['chunks']);
  });

  it('swaps in the new chunks once the failure clears', async () => {
    const artifact = createSampleArtifact('doc1');

    await repo.storeArtifactChunks(artifact, createSampleChunks(artifact, 2));

    expect(await storedContents()).toEqual(['doc1 part 0', 'doc1 part 1']);
    expect(readdirSync(join(dir, 'artifacts', 'doc1'))).toEqual(['chunks']);
  });
});
