/**
 * Relative storage paths, shared by every repository backend.
 *
 * ```
 * index.json
 * versions/index_his_{unix_seconds}.json
 * artifacts/{artifact_id}/index.json
 * artifacts/{artifact_id}/sublist/{sub_id}/origin.{ext}
 * artifacts/{artifact_id}/chunks/{artifact_id}_chunk_{n}.json
 * artifacts/{parent_id}/sublist/{artifact_id}/chunks/{artifact_id}_chunk_{n}.json
 * artifacts/{artifact_id}/attachment_files/{file_name}
 * ```
 *
 * Keys always use `/`; the local backend maps them onto the filesystem.
 */

import { chunkFileName } from '../artifacts/types.js';
import { ValidationError } from '../utils/errors.js';

export const INDEX_FILE = 'index.json';
export const VERSIONS_DIR = 'versions';
export const ARTIFACTS_DIR = 'artifacts';

/**
 * Reject ids and file names that would escape their directory.
 */
export function assertSafeSegment(segment: string, what: string): void {
  if (!segment || segment === '.' || segment === '..' || /[/\\\0]/.test(segment)) {
    throw new ValidationError(`Invalid ${what}: ${JSON.stringify(segment)}`, 'INVALID_PATH_SEGMENT');
  }
}

export function versionedIndexPath(unixSeconds: number): string {
  return `${VERSIONS_DIR}/index_his_${unixSeconds}.json`;
}

export function artifactDir(artifactId: string): string {
  assertSafeSegment(artifactId, 'artifact id');
  return `${ARTIFACTS_DIR}/${artifactId}`;
}

export function artifactIndexPath(artifactId: string): string {
  return `${artifactDir(artifactId)}/index.json`;
}

export function subartifactDir(parentId: string, subId: string): string {
  assertSafeSegment(subId, 'sub-artifact id');
  return `${artifactDir(parentId)}/sublist/${subId}`;
}

export function subartifactContentPath(parentId: string, subId: string, ext: string): string {
  return `${subartifactDir(parentId, subId)}/origin.${ext}`;
}

/**
 * Chunk directory of an artifact. Sub-artifact chunks live under the parent.
 */
export function chunkDir(artifactId: string, parentId: string): string {
  return parentId
    ? `${subartifactDir(parentId, artifactId)}/chunks`
    : `${artifactDir(artifactId)}/chunks`;
}

export function chunkPath(artifactId: string, parentId: string, chunkIndex: number): string {
  return `${chunkDir(artifactId, parentId)}/${chunkFileName(artifactId, chunkIndex)}`;
}

export function attachmentPath(artifactId: string, fileName: string): string {
  assertSafeSegment(fileName, 'attachment file name');
  return `${artifactDir(artifactId)}/attachment_files/${fileName}`;
}
