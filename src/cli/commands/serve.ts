import { loadWorkspaceConfig } from '../../config/loader.js';
import { DEFAULT_PORT, startServer } from '../../server/app.js';
import { openWorkspace } from '../../workspace/factory.js';
import type { Command } from '../types.js';
import { flagValue, intFlag, resolveWorkspaceId } from '../utils.js';

const USAGE = 'chunkvault serve [--port <port>] [--workspace <id>]';

export const serveCommand: Command = {
  name: 'serve',
  description: 'Start the HTTP API',
  usage: USAGE,
  handler: async (args) => {
    const port = intFlag(args, '--port', USAGE) ?? DEFAULT_PORT;
    const config = loadWorkspaceConfig({ projectConfigPath: flagValue(args, '--config') });
    const opened = await openWorkspace(config, { workspaceId: resolveWorkspaceId(args) });

    const server = await startServer(opened.workspace, port).catch((error: unknown) => {
      opened.close();
      if (error instanceof Error && Reflect.get(error, 'code') === 'EADDRINUSE') {
        throw new Error(`Port ${port} is already in use. Try: chunkvault serve --port ${port + 1}`, { cause: error });
      }
      throw error;
    });
    console.log(`chunkvault API running at http://localhost:${port} (workspace: ${opened.workspace.workspaceId})`);

    await new Promise<void>((resolve) => {
      const shutdown = () => {
        console.log('\nShutting down...');
        server.close(() => {
          opened.close();
          resolve();
        });
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });
  },
};
