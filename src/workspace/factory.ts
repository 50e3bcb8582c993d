/**
 * Assemble a workspace and its backends from configuration.
 */

import { validateConfig, type WorkspaceConfig } from '../config/workspace-config.js';
import { createEmbedder } from '../models/index.js';
import { createReranker } from '../rerank/index.js';
import { openDatabase, type Db } from '../storage/db.js';
import { KeywordStore } from '../storage/keyword-store.js';
import { createRepository } from '../storage/repository-registry.js';
import { vectorStoreRegistry } from '../storage/vector-store.js';
import { ConfigError } from '../utils/errors.js';
import { WorkspaceEvents } from './events.js';
import { Workspace } from './workspace.js';

export const DEFAULT_WORKSPACE_ID = 'default';

export interface OpenWorkspaceOptions {
  workspaceId?: string;
  name?: string;
  /** Use this database instead of opening `config.vectorStore.dbPath`. */
  db?: Db;
  events?: WorkspaceEvents;
}

export interface OpenedWorkspace {
  workspace: Workspace;
  db: Db;
  /** Close the database unless it was passed in. */
  close(): void;
}

/**
 * @throws ConfigError for an invalid config, unknown providers or missing required settings
 */
export async function openWorkspace(
  config: WorkspaceConfig,
  options: OpenWorkspaceOptions = {},
): Promise<OpenedWorkspace> {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG_INVALID');
  }

  const workspaceId = options.workspaceId ?? DEFAULT_WORKSPACE_ID;
  const ownsDb = options.db === undefined;
  const db = options.db ?? openDatabase(config.vectorStore.dbPath);

  try {
    const workspace = await Workspace.open({
      workspaceId,
      name: options.name,
      repository: createRepository(config.storage, workspaceId),
      vectorStore: vectorStoreRegistry.create(config.vectorStore.provider, db),
      keywordStore: new KeywordStore(db),
      embedder: createEmbedder(config.embedding),
      reranker: createReranker(config.reranker),
      config,
      events: options.events,
    });
    return {
      workspace,
      db,
      close: () => {
        if (ownsDb) db.close();
      },
    };
  } catch (error) {
    if (ownsDb) db.close();
    throw error;
  }
}
