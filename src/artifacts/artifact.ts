/**
 * Artifact: a versioned content unit with children and derived chunks.
 *
 * Status transitions:
 *
 * ```
 * DRAFT ──updateContent──► EDITED ──markComplete──► COMPLETE
 *   │                        │                        │
 *   └────────────archive─────┴────────────────────────┴──► ARCHIVED (terminal)
 * ```
 *
 * Every transition appends a {@link VersionRecord}; history is never rewritten.
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../utils/errors.js';
import {
  isArtifactStatus,
  isArtifactType,
  isRecord,
  type ArtifactRecord,
  type ArtifactStatus,
  type ArtifactType,
  type AttachmentFile,
  type Chunk,
  type VersionRecord,
} from './types.js';

export interface ArtifactInit {
  artifactType: ArtifactType;
  /** Generated when absent or empty. */
  artifactId?: string;
  parentId?: string;
  content?: string;
  metadata?: Record<string, unknown>;
  status?: ArtifactStatus;
  versionHistory?: VersionRecord[];
  sublist?: Artifact[];
  attachmentFiles?: AttachmentFile[];
  createdAt?: string;
  updatedAt?: string;
}

export interface ToDictOptions {
  /** Include `version_history` on this artifact (never on sub-artifacts). */
  includeHistory?: boolean;
}

/**
 * File extension used for a sub-artifact's stored content.
 */
export function contentExtension(type: ArtifactType): string {
  switch (type) {
    case 'MARKDOWN':
      return 'md';
    case 'HTML':
      return 'html';
    case 'JSON':
      return 'json';
    case 'CSV':
      return 'csv';
    case 'SVG':
      return 'svg';
    case 'TEXT':
    case 'CODE':
    case 'TABLE':
    case 'CHART':
    case 'DIAGRAM':
    case 'MCP_CALL':
    case 'TOOL_CALL':
    case 'LLM_OUTPUT':
    case 'WEB_PAGES':
    case 'DIR':
    case 'CUSTOM':
    case 'NOVEL':
    case 'CHUNK':
      return 'txt';
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}

function now(): string {
  return new Date().toISOString();
}

export class Artifact {
  readonly artifactId: string;
  readonly artifactType: ArtifactType;
  parentId: string;
  content: string;
  metadata: Record<string, unknown>;
  status: ArtifactStatus;
  readonly versionHistory: VersionRecord[];
  readonly sublist: Artifact[] = [];
  chunkList: Chunk[] = [];
  attachmentFiles: AttachmentFile[];
  readonly createdAt: string;
  updatedAt: string;

  constructor(init: ArtifactInit) {
    this.artifactId = init.artifactId || randomUUID();
    this.artifactType = init.artifactType;
    this.parentId = init.parentId ?? '';
    this.content = init.content ?? '';
    this.metadata = { ...(init.metadata ?? {}) };
    this.attachmentFiles = [...(init.attachmentFiles ?? [])];
    this.createdAt = init.createdAt ?? now();
    this.updatedAt = init.updatedAt ?? this.createdAt;

    if (init.versionHistory && init.versionHistory.length > 0) {
      this.versionHistory = init.versionHistory.map((v) => ({ ...v }));
      this.status = init.status ?? 'DRAFT';
    } else {
      this.versionHistory = [];
      this.status = 'DRAFT';
      this.recordVersion('Initial version');
      if (init.updatedAt) this.updatedAt = init.updatedAt;
    }

    for (const sub of init.sublist ?? []) {
      this.addSubartifact(sub);
    }
  }

  private recordVersion(description: string): void {
    const timestamp = now();
    this.versionHistory.push({
      timestamp,
      description,
      content: this.content,
      status: this.status,
    });
    this.updatedAt = timestamp;
  }

  private assertMutable(operation: string): void {
    if (this.status === 'ARCHIVED') {
      throw new ValidationError(
        `Cannot ${operation} archived artifact ${this.artifactId}`,
        'ARTIFACT_ARCHIVED',
      );
    }
  }

  get isArchived(): boolean {
    return this.status === 'ARCHIVED';
  }

  updateContent(content: string, description = 'Content update'): void {
    this.assertMutable('update');
    this.content = content;
    this.status = 'EDITED';
    this.recordVersion(description);
  }

  /** Merge into metadata. Bumps `updatedAt` without a version record. */
  updateMetadata(partial: Record<string, unknown>): void {
    Object.assign(this.metadata, partial);
    this.updatedAt = now();
  }

  markComplete(): void {
    this.assertMutable('complete');
    this.status = 'COMPLETE';
    this.recordVersion('Marked as complete');
  }

  archive(): void {
    if (this.status === 'ARCHIVED') return;
    this.status = 'ARCHIVED';
    this.recordVersion('Artifact archived');
  }

  getVersion(index: number): VersionRecord | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.versionHistory.length) {
      return undefined;
    }
    return this.versionHistory[index];
  }

  /**
   * Restore content and status from history entry `index`.
   * Appends a new record; returns false when the index is out of range.
   */
  revertToVersion(index: number): boolean {
    this.assertMutable('revert');
    const version = this.getVersion(index);
    if (!version) return false;
    this.content = version.content;
    this.status = version.status;
    this.recordVersion(`Reverted to version ${index}`);
    return true;
  }

  addSubartifact(sub: Artifact): void {
    sub.parentId = this.artifactId;
    this.sublist.push(sub);
  }

  findSubartifact(id: string): Artifact | undefined {
    return this.sublist.find((s) => s.artifactId === id);
  }

  /** Text to embed; undefined when there is no content. */
  getEmbeddingText(): string | undefined {
    return this.content ? this.content : undefined;
  }

  // ─── Metadata accessors ─────────────────────────────────────────────────────

  getMetadata(key: string): unknown {
    return this.metadata[key];
  }

  requireString(key: string): string {
    const value = this.metadata[key];
    if (typeof value !== 'string') {
      throw new ValidationError(
        `Artifact ${this.artifactId} metadata "${key}" must be a string`,
        'METADATA_MISSING',
      );
    }
    return value;
  }

  requireNumber(key: string): number {
    const value = this.metadata[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new ValidationError(
        `Artifact ${this.artifactId} metadata "${key}" must be a number`,
        'METADATA_MISSING',
      );
    }
    return value;
  }

  // ─── Serialization ──────────────────────────────────────────────────────────

  toDict(options: ToDictOptions = {}): ArtifactRecord {
    const record: ArtifactRecord = {
      artifact_id: this.artifactId,
      artifact_type: this.artifactType,
      content: this.content,
      metadata: { ...this.metadata },
      created_at: this.createdAt,
      updated_at: this.updatedAt,
      status: this.status,
      parent_id: this.parentId,
      sublist: this.sublist.map((sub) => sub.toDict()),
    };
    if (this.attachmentFiles.length > 0) {
      record.attachment_files = this.attachmentFiles.map((f) => ({
        file_name: f.fileName,
        file_path: f.filePath,
      }));
    }
    if (options.includeHistory) {
      record.version_history = this.versionHistory.map((v) => ({ ...v }));
    }
    return record;
  }

  /**
   * Rebuild an artifact from a stored descriptor.
   *
   * @returns undefined when `artifact_id` is absent
   * @throws ValidationError when the type or status is not recognised
   */
  static fromDict(data: unknown): Artifact | undefined {
    if (!isRecord(data)) return undefined;
    const id = data.artifact_id;
    if (typeof id !== 'string' || !id) return undefined;

    if (!isArtifactType(data.artifact_type)) {
      throw new ValidationError(
        `Artifact ${id} has unknown type: ${String(data.artifact_type)}`,
        'INVALID_ARTIFACT',
      );
    }
    const status = data.status ?? 'DRAFT';
    if (!isArtifactStatus(status)) {
      throw new ValidationError(`Artifact ${id} has unknown status: ${String(status)}`, 'INVALID_ARTIFACT');
    }

    const artifact = new Artifact({
      artifactId: id,
      artifactType: data.artifact_type,
      parentId: typeof data.parent_id === 'string' ? data.parent_id : '',
      content: typeof data.content === 'string' ? data.content : '',
      metadata: isRecord(data.metadata) ? data.metadata : {},
      versionHistory: parseHistory(data.version_history),
      attachmentFiles: parseAttachments(data.attachment_files),
      createdAt: typeof data.created_at === 'string' ? data.created_at : undefined,
      updatedAt: typeof data.updated_at === 'string' ? data.updated_at : undefined,
    });
    artifact.status = status;

    if (Array.isArray(data.sublist)) {
      for (const entry of data.sublist) {
        const sub = Artifact.fromDict(entry);
        if (sub) artifact.addSubartifact(sub);
      }
    }
    return artifact;
  }
}

function parseHistory(value: unknown): VersionRecord[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const history: VersionRecord[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || !isArtifactStatus(entry.status)) continue;
    history.push({
      timestamp: typeof entry.timestamp === 'string' ? entry.timestamp : '',
      description: typeof entry.description === 'string' ? entry.description : '',
      content: typeof entry.content === 'string' ? entry.content : '',
      status: entry.status,
    });
  }
  return history;
}

function parseAttachments(value: unknown): AttachmentFile[] {
  if (!Array.isArray(value)) return [];
  const files: AttachmentFile[] = [];
  for (const entry of value) {
    if (isRecord(entry) && typeof entry.file_name === 'string' && typeof entry.file_path === 'string') {
      files.push({ fileName: entry.file_name, filePath: entry.file_path });
    }
  }
  return files;
}
