export { Workspace } from './workspace.js';
export type { CreateArtifactInput, TreeNode, WorkspaceOptions, WorkspaceTree } from './workspace.js';
export { WorkspaceEvents } from './events.js';
export type { WorkspaceEvent, WorkspaceEventType, WorkspaceListener } from './events.js';
export { ArtifactIndexer, emptySummary, mergeSummaries } from './indexer.js';
export type { IndexerDeps, IndexingFailure, IndexingSummary } from './indexer.js';
export { DEFAULT_WORKSPACE_ID, openWorkspace } from './factory.js';
export type { OpenWorkspaceOptions, OpenedWorkspace } from './factory.js';
