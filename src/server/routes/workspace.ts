import { Router } from 'express';
import type { Workspace } from '../../workspace/workspace.js';
import { asyncHandler } from '../middleware/async-handler.js';

export function createWorkspaceRouter(workspace: Workspace): Router {
  const router = Router();

  /**
   * GET /api/workspace — Identity and artifact count.
   */
  router.get('/workspace', (_req, res) => {
    res.json({
      workspace_id: workspace.workspaceId,
      name: workspace.name,
      created_at: workspace.createdAt,
      updated_at: workspace.updatedAt,
      artifact_count: workspace.listArtifacts().length,
    });
  });

  /**
   * GET /api/tree — Artifact hierarchy for tree views.
   */
  router.get('/tree', (_req, res) => {
    res.json(workspace.generateTreeData());
  });

  /**
   * POST /api/rebuild — Drop and rebuild vector and lexical entries.
   */
  router.post(
    '/rebuild',
    asyncHandler(async (_req, res) => {
      res.json(await workspace.rebuildIndex());
    }),
  );

  return router;
}
