import { Router } from 'express';
import { chunkToRecord, isArtifactType, type ArtifactType } from '../../artifacts/types.js';
import type { Workspace } from '../../workspace/workspace.js';
import { ValidationError } from '../../utils/errors.js';
import { asyncHandler } from '../middleware/async-handler.js';
import { parseNonNegativeInt, queryString } from './params.js';

function parseTypes(raw: string | undefined): ArtifactType[] | undefined {
  if (!raw) return undefined;
  return raw.split(',').map((type) => {
    const trimmed = type.trim();
    if (!isArtifactType(trimmed)) {
      throw new ValidationError(`Unknown artifact type: ${trimmed}`, 'INVALID_QUERY');
    }
    return trimmed;
  });
}

export function createArtifactsRouter(workspace: Workspace): Router {
  const router = Router();

  /**
   * GET /api/artifacts?type=MARKDOWN,TEXT — Live artifacts.
   */
  router.get('/', (req, res) => {
    const types = parseTypes(queryString(req, 'type'));
    res.json(workspace.listArtifacts(types).map((a) => a.toDict()));
  });

  /**
   * GET /api/artifacts/:id?parent= — One artifact, or a sub-artifact of `parent`.
   */
  router.get(
    '/:id',
    asyncHandler(async (req, res) => {
      const artifact = await workspace.getArtifact(req.params.id, queryString(req, 'parent') || undefined);
      if (!artifact) {
        res.status(404).json({ error: 'Artifact not found' });
        return;
      }
      res.json(artifact.toDict());
    }),
  );

  /**
   * GET /api/artifacts/:id/chunks — Stored chunks in index order.
   */
  router.get(
    '/:id/chunks',
    asyncHandler(async (req, res) => {
      const chunks = await workspace.getChunks(req.params.id, queryString(req, 'parent') ?? '');
      res.json(chunks.map(chunkToRecord));
    }),
  );

  /**
   * GET /api/artifacts/:id/chunks/:index?pre=&next=&parent= — Chunk window.
   */
  router.get(
    '/:id/chunks/:index',
    asyncHandler(async (req, res) => {
      const index = parseNonNegativeInt(req.params.index, 'index', 0);
      const pre = parseNonNegativeInt(queryString(req, 'pre'), 'pre', 0);
      const next = parseNonNegativeInt(queryString(req, 'next'), 'next', 0);
      const window = await workspace.getChunkWindow(req.params.id, index, pre, next, queryString(req, 'parent') ?? '');
      if (!window.chunk) {
        res.status(404).json({ error: 'Chunk not found' });
        return;
      }
      res.json({
        chunk: chunkToRecord(window.chunk),
        pre_n_chunks: window.preNChunks.map(chunkToRecord),
        next_n_chunks: window.nextNChunks.map(chunkToRecord),
      });
    }),
  );

  return router;
}
