/**
 * Tests for the Artifact model.
 */

import { describe, it, expect } from 'vitest';
import { Artifact, contentExtension } from '../../src/artifacts/artifact.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('Artifact', () => {
  describe('construction', () => {
    it('starts as DRAFT with an initial version', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', content: 'hello' });

      expect(artifact.status).toBe('DRAFT');
      expect(artifact.versionHistory).toHaveLength(1);
      expect(artifact.versionHistory[0]).toMatchObject({
        description: 'Initial version',
        content: 'hello',
        status: 'DRAFT',
      });
    });

    it('generates an id when none is given', () => {
      const a = new Artifact({ artifactType: 'TEXT' });
      const b = new Artifact({ artifactType: 'TEXT', artifactId: '' });

      expect(a.artifactId).toMatch(/^[0-9a-f-]{36}$/);
      expect(b.artifactId).not.toBe('');
      expect(a.artifactId).not.toBe(b.artifactId);
    });

    it('adopts sub-artifacts and sets their parent id', () => {
      const sub = new Artifact({ artifactType: 'CODE', artifactId: 'sub-1' });
      const root = new Artifact({ artifactType: 'DIR', artifactId: 'root', sublist: [sub] });

      expect(root.sublist).toHaveLength(1);
      expect(sub.parentId).toBe('root');
      expect(root.findSubartifact('sub-1')).toBe(sub);
      expect(root.findSubartifact('missing')).toBeUndefined();
    });
  });

  describe('status transitions', () => {
    it('moves DRAFT -> EDITED -> COMPLETE, recording each step', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', content: 'v1' });

      artifact.updateContent('v2', 'Second draft');
      expect(artifact.status).toBe('EDITED');
      expect(artifact.content).toBe('v2');

      artifact.markComplete();
      expect(artifact.status).toBe('COMPLETE');

      expect(artifact.versionHistory.map((v) => v.description)).toEqual([
        'Initial version',
        'Second draft',
        'Marked as complete',
      ]);
    });

    it('archives once and rejects further edits', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', content: 'v1' });
      artifact.archive();
      artifact.archive();

      expect(artifact.isArchived).toBe(true);
      expect(artifact.versionHistory).toHaveLength(2);
      expect(() => artifact.updateContent('v2')).toThrow(ValidationError);
      expect(() => artifact.markComplete()).toThrow('Cannot complete archived artifact');
    });

    it('reverts to an earlier version by appending a record', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', content: 'v1' });
      artifact.updateContent('v2');

      expect(artifact.revertToVersion(0)).toBe(true);
      expect(artifact.content).toBe('v1');
      expect(artifact.status).toBe('DRAFT');
      expect(artifact.versionHistory).toHaveLength(3);
      expect(artifact.versionHistory[2]?.description).toBe('Reverted to version 0');
    });

    it('returns false when reverting to an unknown version', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', content: 'v1' });

      expect(artifact.revertToVersion(5)).toBe(false);
      expect(artifact.getVersion(-1)).toBeUndefined();
      expect(artifact.versionHistory).toHaveLength(1);
    });
  });

  describe('metadata', () => {
    it('merges updates without a version record', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', metadata: { a: 1 } });
      artifact.updateMetadata({ b: 'two' });

      expect(artifact.metadata).toEqual({ a: 1, b: 'two' });
      expect(artifact.versionHistory).toHaveLength(1);
    });

    it('validates required keys', () => {
      const artifact = new Artifact({ artifactType: 'TEXT', metadata: { filename: 'a.txt', pages: 3 } });

      expect(artifact.requireString('filename')).toBe('a.txt');
      expect(artifact.requireNumber('pages')).toBe(3);
      expect(() => artifact.requireString('pages')).toThrow(ValidationError);
      expect(() => artifact.requireNumber('missing')).toThrow('metadata "missing" must be a number');
    });
  });

  it('has no embedding text without content', () => {
    expect(new Artifact({ artifactType: 'TEXT' }).getEmbeddingText()).toBeUndefined();
    expect(new Artifact({ artifactType: 'TEXT', content: 'x' }).getEmbeddingText()).toBe('x');
  });

  describe('serialization', () => {
    it('writes snake_case records and reads them back', () => {
      const sub = new Artifact({ artifactType: 'MARKDOWN', artifactId: 'sub', content: '# Sub' });
      const root = new Artifact({
        artifactType: 'DIR',
        artifactId: 'root',
        content: 'root body',
        metadata: { filename: 'docs' },
        sublist: [sub],
        attachmentFiles: [{ fileName: 'a.png', filePath: '/files/a.png' }],
      });
      root.markComplete();

      const record = root.toDict({ includeHistory: true });
      expect(record).toMatchObject({
        artifact_id: 'root',
        artifact_type: 'DIR',
        status: 'COMPLETE',
        parent_id: '',
        attachment_files: [{ file_name: 'a.png', file_path: '/files/a.png' }],
      });
      expect(record.sublist[0]).toMatchObject({ artifact_id: 'sub', parent_id: 'root' });
      expect(record.sublist[0]?.version_history).toBeUndefined();
      expect(record.version_history).toHaveLength(2);

      const restored = Artifact.fromDict(JSON.parse(JSON.stringify(record)));
      expect(restored?.artifactId).toBe('root');
      expect(restored?.status).toBe('COMPLETE');
      expect(restored?.versionHistory).toHaveLength(2);
      expect(restored?.sublist[0]?.content).toBe('# Sub');
      expect(restored?.sublist[0]?.parentId).toBe('root');
      expect(restored?.attachmentFiles).toEqual([{ fileName: 'a.png', filePath: '/files/a.png' }]);
      expect(restored?.createdAt).toBe(root.createdAt);
      expect(restored?.updatedAt).toBe(root.updatedAt);
    });

    it('returns undefined without an artifact id', () => {
      expect(Artifact.fromDict({ artifact_type: 'TEXT' })).toBeUndefined();
      expect(Artifact.fromDict('not an object')).toBeUndefined();
    });

    it('rejects unknown types and statuses', () => {
      expect(() => Artifact.fromDict({ artifact_id: 'a', artifact_type: 'VIDEO' })).toThrow(
        'Artifact a has unknown type: VIDEO',
      );
      expect(() => Artifact.fromDict({ artifact_id: 'a', artifact_type: 'TEXT', status: 'LOST' })).toThrow(
        ValidationError,
      );
    });
  });

  it('maps content types to stored file extensions', () => {
    expect(contentExtension('MARKDOWN')).toBe('md');
    expect(contentExtension('HTML')).toBe('html');
    expect(contentExtension('CODE')).toBe('txt');
  });
});
