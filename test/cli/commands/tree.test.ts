/**
 * Tests for the tree CLI command handler.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../src/workspace/factory.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/workspace/factory.js')>()),
  openWorkspace: vi.fn(),
}));

vi.mock('../../../src/config/loader.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../src/config/loader.js')>()),
  loadWorkspaceConfig: vi.fn(),
}));

import { Artifact } from '../../../src/artifacts/artifact.js';
import { formatTree, treeCommand } from '../../../src/cli/commands/tree.js';
import { loggedLines, stubWorkspace, type StubbedWorkspace } from '../helpers.js';

let env: StubbedWorkspace | undefined;

beforeEach(() => {
  vi.clearAllMocks();
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  env?.db.close();
  env = undefined;
});

describe('formatTree', () => {
  it('indents nodes by depth', () => {
    const lines = formatTree({
      name: 'Notes',
      id: '-1',
      type: 'workspace',
      children: [
        {
          name: 'report.md',
          id: 'report',
          type: 'MARKDOWN',
          artifactId: 'report',
          parentId: '-1',
          depth: 1,
          expanded: false,
          children: [
            {
              name: 'appendix',
              id: 'appendix',
              type: 'TEXT',
              artifactId: 'appendix',
              parentId: 'report',
              depth: 2,
              expanded: false,
              children: [],
            },
          ],
        },
      ],
    });

    expect(lines).toEqual(['Notes', '  report.md [MARKDOWN]', '    appendix [TEXT]']);
  });
});

describe('treeCommand', () => {
  it('prints the workspace hierarchy', async () => {
    env = await stubWorkspace();
    await env.workspace.createArtifact({
      artifactId: 'report',
      artifactType: 'TEXT',
      content: 'alpha intro',
      sublist: [new Artifact({ artifactId: 'appendix', artifactType: 'TEXT', content: 'beta details' })],
    });
    vi.mocked(console.log).mockClear();

    await treeCommand.handler([]);

    expect(loggedLines()).toEqual(['Test workspace', '  report [TEXT]', '    appendix [TEXT]']);
  });

  it('prints the tree as JSON with --json', async () => {
    env = await stubWorkspace();
    vi.mocked(console.log).mockClear();

    await treeCommand.handler(['--json']);

    const [output] = loggedLines();
    const parsed: unknown = JSON.parse(output ?? '');
    expect(parsed).toEqual({ name: 'Test workspace', id: '-1', type: 'workspace', children: [] });
  });
});
