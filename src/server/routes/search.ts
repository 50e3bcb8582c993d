import { Router } from 'express';
import { parseArtifactSearchQuery, parseChunkSearchQuery } from '../../retrieval/query.js';
import { artifactResultToRecord, chunkResultToRecord, keywordHitToRecord } from '../../retrieval/wire.js';
import type { Workspace } from '../../workspace/workspace.js';
import { ValidationError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { parseNonNegativeInt, queryString } from './params.js';

export function createSearchRouter(workspace: Workspace): Router {
  const router = Router();
  const defaults = () => ({
    threshold: workspace.config.hybridSearch.threshold,
    limit: workspace.config.hybridSearch.topK,
  });

  /**
   * POST /api/search/chunks — Hybrid chunk search with neighbour windows.
   *
   * Body: `{query, filters?, threshold?, limit?, pre_n?, next_n?}`
   */
  router.post(
    '/chunks',
    asyncHandler(async (req, res) => {
      const query = parseChunkSearchQuery(req.body, defaults());
      const results = await workspace.searchChunks(query);
      res.json(results.map(chunkResultToRecord));
    }),
  );

  /**
   * POST /api/search/artifacts — Artifact search, best hit per artifact.
   *
   * Body: `{query, filter_types?, threshold?, limit?}`
   */
  router.post(
    '/artifacts',
    asyncHandler(async (req, res) => {
      const query = parseArtifactSearchQuery(req.body, defaults());
      const results = await workspace.searchArtifacts(query);
      res.json(results.map(artifactResultToRecord));
    }),
  );

  /**
   * GET /api/search/keywords?q=&limit= — Full-text search over indexed text.
   */
  router.get('/keywords', (req, res) => {
    const q = queryString(req, 'q');
    if (!q?.trim()) {
      throw new ValidationError('q is required', 'INVALID_QUERY');
    }
    const limit = Math.min(100, Math.max(1, parseNonNegativeInt(queryString(req, 'limit'), 'limit', 10)));
    res.json(workspace.searchKeywords(q, limit).map(keywordHitToRecord));
  });

  return router;
}
