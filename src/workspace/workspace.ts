/**
 * Workspace: the artifact collection of one workspace id, its persisted
 * index, and search over it.
 *
 * Mutations persist the artifact, (re)index it when embedding is enabled,
 * write the workspace index, then notify listeners:
 *
 * ```
 * addArtifact ──► repository.storeArtifact ──► indexer.index ──► storeIndex ──► events
 * ```
 *
 * Sub-artifact content lives in the repository (`origin.{ext}`) and is loaded
 * on demand; it is reloaded before any write so a stored descriptor never
 * loses content.
 */

import { randomUUID } from 'node:crypto';
import { Artifact } from '../artifacts/artifact.js';
import type { ArtifactType, Chunk } from '../artifacts/types.js';
import type { Chunker } from '../chunking/chunker.js';
import { createChunker } from '../chunking/index.js';
import type { WorkspaceConfig } from '../config/workspace-config.js';
import type { EmbeddingProvider } from '../models/embedding-provider.js';
import type { Reranker } from '../rerank/reranker.js';
import { ArtifactRetriever, type ArtifactSearchInput } from '../retrieval/artifact-retriever.js';
import { ChunkRetriever, type ChunkSearchInput, type RetrieverDeps } from '../retrieval/chunk-retriever.js';
import type { ArtifactSearchResult, ChunkSearchResult } from '../retrieval/query.js';
import type { KeywordHit, KeywordStore } from '../storage/keyword-store.js';
import type { Repository } from '../storage/repository.js';
import type { ChunkWindow, WorkspaceIndexData } from '../storage/types.js';
import type { VectorStore } from '../storage/vector-store.js';
import { ValidationError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { WorkspaceEvents, type WorkspaceEventType } from './events.js';
import { ArtifactIndexer, emptySummary, mergeSummaries, type IndexingSummary } from './indexer.js';

const log = createLogger('workspace');

export interface WorkspaceOptions {
  /** Generated when absent. */
  workspaceId?: string;
  name?: string;
  repository: Repository;
  vectorStore: VectorStore;
  keywordStore?: KeywordStore;
  /** Required for indexing and search; indexing is skipped without one. */
  embedder?: EmbeddingProvider;
  reranker?: Reranker;
  /** Defaults to the chunker built from `config.chunking`. */
  chunker?: Chunker;
  config: WorkspaceConfig;
  events?: WorkspaceEvents;
}

export interface CreateArtifactInput {
  artifactType: ArtifactType;
  artifactId?: string;
  content?: string;
  metadata?: Record<string, unknown>;
  sublist?: Artifact[];
}

export interface TreeNode {
  name: string;
  id: string;
  type: string;
  artifactId: string;
  parentId: string;
  depth: number;
  expanded: false;
  children: TreeNode[];
}

export interface WorkspaceTree {
  name: string;
  id: '-1';
  type: 'workspace';
  children: TreeNode[];
}

export class Workspace {
  readonly workspaceId: string;
  name: string;
  readonly createdAt: string;
  updatedAt: string;
  metadata: Record<string, unknown>;
  readonly events: WorkspaceEvents;

  private readonly artifacts: Artifact[];
  private readonly indexer: ArtifactIndexer;
  private readonly chunkRetriever: ChunkRetriever;
  private readonly artifactRetriever: ArtifactRetriever;

  private constructor(
    private readonly options: WorkspaceOptions,
    state: {
      workspaceId: string;
      name: string;
      createdAt: string;
      updatedAt: string;
      metadata: Record<string, unknown>;
      artifacts: Artifact[];
    },
  ) {
    this.workspaceId = state.workspaceId;
    this.name = state.name;
    this.createdAt = state.createdAt;
    this.updatedAt = state.updatedAt;
    this.metadata = state.metadata;
    this.artifacts = state.artifacts;
    this.events = options.events ?? new WorkspaceEvents();

    const { config } = options;
    const embedder = config.embedding.enabled ? options.embedder : undefined;
    const chunker = config.chunking.enabled ? (options.chunker ?? createChunker(config.chunking)) : undefined;

    this.indexer = new ArtifactIndexer({
      workspaceId: this.workspaceId,
      repository: options.repository,
      vectorStore: options.vectorStore,
      keywordStore: options.keywordStore,
      embedder,
      chunker,
      maxConcurrent: config.embedding.maxConcurrent,
    });

    const retrieverDeps: RetrieverDeps = {
      workspaceId: this.workspaceId,
      repository: options.repository,
      vectorStore: options.vectorStore,
      embedder,
      reranker: options.reranker,
      hybridSearch: config.hybridSearch,
      rerankerConfig: config.reranker,
    };
    this.chunkRetriever = new ChunkRetriever(retrieverDeps);
    this.artifactRetriever = new ArtifactRetriever(retrieverDeps, (id, parentId) =>
      this.getArtifact(id, parentId || undefined),
    );
  }

  /**
   * Open a workspace, loading its index and artifacts when the repository
   * already holds one.
   *
   * @throws ConfigError when the chunking configuration is invalid
   */
  static async open(options: WorkspaceOptions): Promise<Workspace> {
    const index = await options.repository.getIndexData();
    const storedId = index?.workspace.workspace_id;
    const workspaceId = options.workspaceId || (typeof storedId === 'string' && storedId) || randomUUID();
    const now = new Date().toISOString();

    if (!index) {
      log.info('Created workspace', { workspaceId });
      return new Workspace(options, {
        workspaceId,
        name: options.name ?? workspaceId,
        createdAt: now,
        updatedAt: now,
        metadata: {},
        artifacts: [],
      });
    }

    const data = index.workspace;
    const artifacts: Artifact[] = [];
    const entries = Array.isArray(data.artifacts) ? data.artifacts : [];
    for (const entry of entries) {
      const artifactId = entry.artifact_id;
      if (typeof artifactId !== 'string' || !artifactId) continue;
      try {
        const record = await options.repository.retrieveArtifact(artifactId);
        const artifact = Artifact.fromDict(record);
        if (artifact) {
          artifacts.push(artifact);
        } else {
          log.warn('Indexed artifact missing from repository', { workspaceId, artifactId });
        }
      } catch (error) {
        log.warn('Skipping unreadable artifact', { workspaceId, artifactId, error: errorMessage(error) });
      }
    }

    log.info('Loaded workspace', { workspaceId, artifacts: artifacts.length });
    return new Workspace(options, {
      workspaceId,
      name: options.name ?? (typeof data.name === 'string' && data.name ? data.name : workspaceId),
      createdAt: typeof data.created_at === 'string' ? data.created_at : now,
      updatedAt: typeof data.updated_at === 'string' ? data.updated_at : now,
      metadata: typeof data.metadata === 'object' && data.metadata !== null ? data.metadata : {},
      artifacts,
    });
  }

  get repository(): Repository {
    return this.options.repository;
  }

  get config(): WorkspaceConfig {
    return this.options.config;
  }

  // ─── Mutations ──────────────────────────────────────────────────────────────

  /**
   * Build an artifact from `input` and add it.
   *
   * @throws ValidationError when the id already exists
   */
  async createArtifact(input: CreateArtifactInput): Promise<Artifact> {
    const artifact = new Artifact({
      artifactId: input.artifactId,
      artifactType: input.artifactType,
      content: input.content,
      metadata: input.metadata,
      sublist: input.sublist,
    });
    await this.addArtifact(artifact);
    return artifact;
  }

  /**
   * @throws ValidationError (`ARTIFACT_EXISTS`) when the id already exists
   */
  async addArtifact(artifact: Artifact): Promise<IndexingSummary> {
    if (this.findRoot(artifact.artifactId)) {
      throw new ValidationError(`Artifact ${artifact.artifactId} already exists`, 'ARTIFACT_EXISTS');
    }

    this.artifacts.push(artifact);
    try {
      await this.persist(artifact);
    } catch (error) {
      this.artifacts.splice(this.artifacts.indexOf(artifact), 1);
      throw error;
    }
    const indexing = await this.indexer.index(artifact);
    this.touch();
    await this.save();
    await this.notify('create', artifact, indexing);
    return indexing;
  }

  /**
   * Replace an artifact's content and re-index it.
   *
   * @returns the artifact, or undefined when the id is unknown
   * @throws ValidationError when the artifact is archived
   */
  async updateArtifact(artifactId: string, content: string, description?: string): Promise<Artifact | undefined> {
    const artifact = this.findRoot(artifactId);
    if (!artifact) return undefined;

    artifact.updateContent(content, description);
    await this.persist(artifact);
    const indexing = await this.indexer.index(artifact);
    this.touch();
    await this.save();
    await this.notify('update', artifact, indexing);
    return artifact;
  }

  /**
   * @returns the artifact, or undefined when the id is unknown
   */
  async completeArtifact(artifactId: string): Promise<Artifact | undefined> {
    const artifact = this.findRoot(artifactId);
    if (!artifact) return undefined;

    artifact.markComplete();
    await this.persist(artifact);
    this.touch();
    await this.save();
    await this.notify('update', artifact);
    return artifact;
  }

  /**
   * Archive an artifact and drop it from the live list and the search stores.
   * Its stored files stay in the repository.
   *
   * @returns false when the id is unknown
   */
  async deleteArtifact(artifactId: string): Promise<boolean> {
    const index = this.artifacts.findIndex((a) => a.artifactId === artifactId);
    const artifact = this.artifacts[index];
    if (!artifact) return false;

    artifact.archive();
    await this.persist(artifact);
    this.artifacts.splice(index, 1);
    await this.indexer.remove(artifact);
    this.touch();
    await this.save();
    await this.notify('delete', artifact);
    return true;
  }

  /**
   * Write the workspace index.
   */
  async save(): Promise<void> {
    await this.options.repository.storeIndex(this.toIndexData());
    log.debug('Saved workspace index', { workspaceId: this.workspaceId, artifacts: this.artifacts.length });
  }

  /**
   * Drop this workspace's vector and lexical records and index every live
   * artifact again. Safe to re-run.
   */
  async rebuildIndex(): Promise<IndexingSummary> {
    const { vectorStore, keywordStore } = this.options;
    await vectorStore.deleteCollection(this.workspaceId);
    keywordStore?.clear(this.workspaceId);

    let summary = emptySummary();
    for (const artifact of this.artifacts) {
      if (artifact.isArchived) continue;
      await this.loadSubartifactContent(artifact);
      summary = mergeSummaries(summary, await this.indexer.index(artifact));
    }

    log.info('Rebuilt index', {
      workspaceId: this.workspaceId,
      indexed: summary.indexed,
      chunks: summary.chunks,
      failures: summary.failures.length,
    });
    return summary;
  }

  // ─── Reads ──────────────────────────────────────────────────────────────────

  /**
   * A root artifact, or a sub-artifact when `parentId` is given (its content
   * loaded from the repository when not yet in memory).
   */
  async getArtifact(artifactId: string, parentId?: string): Promise<Artifact | undefined> {
    if (!parentId) return this.findRoot(artifactId);

    const parent = this.findRoot(parentId);
    const sub = parent?.findSubartifact(artifactId);
    if (!sub) return undefined;
    if (!sub.content) {
      sub.content = (await this.options.repository.getSubartifactContent(artifactId, parentId)) ?? '';
    }
    return sub;
  }

  listArtifacts(filterTypes?: ArtifactType[]): Artifact[] {
    if (!filterTypes || filterTypes.length === 0) return [...this.artifacts];
    const types = new Set(filterTypes);
    return this.artifacts.filter((a) => types.has(a.artifactType));
  }

  async getChunkWindow(
    artifactId: string,
    chunkIndex: number,
    preN: number,
    nextN: number,
    parentId = '',
  ): Promise<ChunkWindow> {
    return this.options.repository.getChunkWindow(artifactId, parentId, chunkIndex, preN, nextN);
  }

  /**
   * Chunks of an artifact ordered by index; empty when none are stored.
   */
  async getChunks(artifactId: string, parentId = ''): Promise<Chunk[]> {
    const chunks = (await this.options.repository.getChunks(artifactId, parentId)) ?? [];
    return chunks.sort((a, b) => a.chunkMetadata.chunkIndex - b.chunkMetadata.chunkIndex);
  }

  // ─── Search ─────────────────────────────────────────────────────────────────

  /**
   * @throws ValidationError for a malformed query
   */
  searchChunks(input: ChunkSearchInput): Promise<ChunkSearchResult[]> {
    return this.chunkRetriever.search(input);
  }

  /**
   * @throws ValidationError for a malformed query
   */
  searchArtifacts(input: ArtifactSearchInput): Promise<ArtifactSearchResult[]> {
    return this.artifactRetriever.search(input);
  }

  /**
   * Full-text search over indexed text. Empty without a lexical store.
   */
  searchKeywords(query: string, limit = 10): KeywordHit[] {
    const { keywordStore } = this.options;
    if (!keywordStore) return [];
    return keywordStore.search(this.workspaceId, query, limit);
  }

  // ─── Tree ───────────────────────────────────────────────────────────────────

  generateTreeData(): WorkspaceTree {
    const buildNode = (artifact: Artifact, parentId: string, depth: number): TreeNode => {
      const filename = artifact.getMetadata('filename');
      return {
        name: typeof filename === 'string' && filename ? filename : artifact.artifactId,
        id: artifact.artifactId,
        type: artifact.artifactType,
        artifactId: artifact.artifactId,
        parentId,
        depth,
        expanded: false,
        children: artifact.sublist.map((sub) => buildNode(sub, artifact.artifactId, depth + 1)),
      };
    };

    return {
      name: this.name,
      id: '-1',
      type: 'workspace',
      children: this.artifacts.map((a) => buildNode(a, '-1', 1)),
    };
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private findRoot(artifactId: string): Artifact | undefined {
    return this.artifacts.find((a) => a.artifactId === artifactId);
  }

  private async loadSubartifactContent(artifact: Artifact): Promise<void> {
    for (const sub of artifact.sublist) {
      if (sub.content) continue;
      sub.content = (await this.options.repository.getSubartifactContent(sub.artifactId, artifact.artifactId)) ?? '';
    }
  }

  private async persist(artifact: Artifact): Promise<void> {
    await this.loadSubartifactContent(artifact);
    await this.options.repository.storeArtifact(artifact);
  }

  private touch(): void {
    this.updatedAt = new Date().toISOString();
  }

  private toIndexData(): WorkspaceIndexData {
    return {
      workspace_id: this.workspaceId,
      name: this.name,
      created_at: this.createdAt,
      updated_at: this.updatedAt,
      metadata: this.metadata,
      artifact_ids: this.artifacts.map((a) => a.artifactId),
      artifacts: this.artifacts.map((a) => ({
        artifact_id: a.artifactId,
        type: a.artifactType,
        metadata: a.metadata,
      })),
    };
  }

  private async notify(type: WorkspaceEventType, artifact: Artifact, indexing?: IndexingSummary): Promise<void> {
    await this.events.emit({ type, workspaceId: this.workspaceId, artifact, indexing });
  }
}
