/**
 * Core types for artifacts and chunks.
 *
 * In-memory shapes use camelCase. The JSON written by repositories uses the
 * snake_case `*Record` shapes below so stored trees stay readable by any
 * backend.
 */

/** Closed set of artifact kinds. */
export const ARTIFACT_TYPES = [
  'TEXT',
  'CODE',
  'MARKDOWN',
  'HTML',
  'SVG',
  'JSON',
  'CSV',
  'TABLE',
  'CHART',
  'DIAGRAM',
  'MCP_CALL',
  'TOOL_CALL',
  'LLM_OUTPUT',
  'WEB_PAGES',
  'DIR',
  'CUSTOM',
  'NOVEL',
  'CHUNK',
] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

/** Lifecycle states. ARCHIVED is terminal. */
export const ARTIFACT_STATUSES = ['DRAFT', 'EDITED', 'COMPLETE', 'ARCHIVED'] as const;

export type ArtifactStatus = (typeof ARTIFACT_STATUSES)[number];

export function isArtifactType(value: unknown): value is ArtifactType {
  return typeof value === 'string' && (ARTIFACT_TYPES as readonly string[]).includes(value);
}

export function isArtifactStatus(value: unknown): value is ArtifactStatus {
  return typeof value === 'string' && (ARTIFACT_STATUSES as readonly string[]).includes(value);
}

/** One entry of an artifact's append-only history. */
export interface VersionRecord {
  timestamp: string;
  description: string;
  content: string;
  status: ArtifactStatus;
}

/** A local file copied into the artifact's attachment directory on store. */
export interface AttachmentFile {
  fileName: string;
  filePath: string;
}

export interface ChunkMetadata {
  /** Dense 0-based position within the owning artifact. */
  chunkIndex: number;
  /** Length of the chunk text in characters. */
  chunkSize: number;
  /** Overlap the chunker was configured with. */
  chunkOverlap: number;
  artifactId: string;
  artifactType: string;
  /** Empty string for chunks of root artifacts. */
  parentArtifactId: string;
}

export interface Chunk {
  /** `{artifactId}_chunk_{chunkIndex}` */
  chunkId: string;
  content: string;
  chunkMetadata: ChunkMetadata;
}

// ─── Wire records ─────────────────────────────────────────────────────────────

export interface ChunkMetadataRecord {
  chunk_index: number;
  chunk_size: number;
  chunk_overlap: number;
  artifact_id: string;
  artifact_type: string;
  parent_artifact_id: string;
}

export interface ChunkRecord {
  chunk_id: string;
  content: string;
  chunk_metadata: ChunkMetadataRecord;
}

export interface VersionRecordData {
  timestamp: string;
  description: string;
  content: string;
  status: ArtifactStatus;
}

export interface AttachmentFileRecord {
  file_name: string;
  file_path: string;
}

/** Artifact descriptor as stored in `artifacts/{id}/index.json`. */
export interface ArtifactRecord {
  artifact_id: string;
  artifact_type: ArtifactType;
  content: string;
  metadata: Record<string, unknown>;
  created_at: string;
  updated_at: string;
  status: ArtifactStatus;
  parent_id: string;
  sublist: ArtifactRecord[];
  attachment_files?: AttachmentFileRecord[];
  version_history?: VersionRecordData[];
}

export function chunkId(artifactId: string, chunkIndex: number): string {
  return `${artifactId}_chunk_${chunkIndex}`;
}

export function chunkFileName(artifactId: string, chunkIndex: number): string {
  return `${chunkId(artifactId, chunkIndex)}.json`;
}

export function chunkToRecord(chunk: Chunk): ChunkRecord {
  const m = chunk.chunkMetadata;
  return {
    chunk_id: chunk.chunkId,
    content: chunk.content,
    chunk_metadata: {
      chunk_index: m.chunkIndex,
      chunk_size: m.chunkSize,
      chunk_overlap: m.chunkOverlap,
      artifact_id: m.artifactId,
      artifact_type: m.artifactType,
      parent_artifact_id: m.parentArtifactId,
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string, fallback = ''): string {
  const value = obj[key];
  return typeof value === 'string' ? value : fallback;
}

function numberField(obj: Record<string, unknown>, key: string): number | undefined {
  const value = obj[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

/**
 * Parse a stored chunk file. Returns undefined when the payload is not a chunk.
 */
export function chunkFromRecord(data: unknown): Chunk | undefined {
  if (!isRecord(data) || !isRecord(data.chunk_metadata)) return undefined;
  const meta = data.chunk_metadata;
  const chunkIndex = numberField(meta, 'chunk_index');
  const artifactId = stringField(meta, 'artifact_id');
  if (chunkIndex === undefined || !artifactId) return undefined;

  const content = stringField(data, 'content');
  return {
    chunkId: stringField(data, 'chunk_id', chunkId(artifactId, chunkIndex)),
    content,
    chunkMetadata: {
      chunkIndex,
      chunkSize: numberField(meta, 'chunk_size') ?? content.length,
      chunkOverlap: numberField(meta, 'chunk_overlap') ?? 0,
      artifactId,
      artifactType: stringField(meta, 'artifact_type'),
      parentArtifactId: stringField(meta, 'parent_artifact_id'),
    },
  };
}

export { isRecord };
