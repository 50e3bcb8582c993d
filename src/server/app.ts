/**
 * HTTP API over one open workspace.
 */

import express from 'express';
import type { Server } from 'node:http';
import type { Workspace } from '../workspace/workspace.js';
import { createLogger } from '../utils/logger.js';
import { errorHandler } from './middleware/error-handler.js';
import { createArtifactsRouter } from './routes/artifacts.js';
import { createSearchRouter } from './routes/search.js';
import { createWorkspaceRouter } from './routes/workspace.js';

const log = createLogger('server');

export const DEFAULT_PORT = 3333;

export function createApp(workspace: Workspace): express.Express {
  const app = express();
  app.use(express.json({ limit: '10mb' }));

  app.use('/api/search', createSearchRouter(workspace));
  app.use('/api/artifacts', createArtifactsRouter(workspace));
  app.use('/api', createWorkspaceRouter(workspace));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Must come after the routes
  app.use(errorHandler);

  return app;
}

/**
 * Listen on `port`. Resolves once the server accepts connections.
 */
export function startServer(workspace: Workspace, port: number = DEFAULT_PORT): Promise<Server> {
  const app = createApp(workspace);

  return new Promise((resolve, reject) => {
    const server = app.listen(port);
    server.once('listening', () => {
      log.info('Server listening', { port, workspaceId: workspace.workspaceId });
      resolve(server);
    });
    server.once('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EADDRINUSE') {
        log.error('Port already in use', { port });
      }
      reject(err);
    });
  });
}
