import type { TreeNode, WorkspaceTree } from '../../workspace/workspace.js';
import type { Command } from '../types.js';
import { withWorkspace } from '../utils.js';

/**
 * Indented text rendering of a workspace tree.
 */
export function formatTree(tree: WorkspaceTree): string[] {
  const lines = [tree.name];
  const walk = (nodes: TreeNode[]): void => {
    for (const node of nodes) {
      lines.push(`${'  '.repeat(node.depth)}${node.name} [${node.type}]`);
      walk(node.children);
    }
  };
  walk(tree.children);
  return lines;
}

export const treeCommand: Command = {
  name: 'tree',
  description: 'Show the artifact hierarchy',
  usage: 'chunkvault tree [--json] [--workspace <id>]',
  handler: async (args) => {
    const tree = await withWorkspace(args, async (workspace) => workspace.generateTreeData());
    if (args.includes('--json')) {
      console.log(JSON.stringify(tree, null, 2));
      return;
    }
    for (const line of formatTree(tree)) {
      console.log(line);
    }
  },
};
