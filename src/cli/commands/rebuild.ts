import type { Command } from '../types.js';
import { withWorkspace } from '../utils.js';

export const rebuildCommand: Command = {
  name: 'rebuild',
  description: 'Rebuild the vector and keyword indexes from stored artifacts',
  usage: 'chunkvault rebuild [--workspace <id>]',
  handler: async (args) => {
    const summary = await withWorkspace(args, (workspace) => workspace.rebuildIndex());
    console.log('Rebuild complete.');
    console.log(`  Indexed: ${summary.indexed}`);
    console.log(`  Chunks:  ${summary.chunks}`);
    console.log(`  Skipped: ${summary.skipped}`);
    if (summary.failures.length > 0) {
      console.error(`  Failures: ${summary.failures.length}`);
      for (const failure of summary.failures) {
        console.error(`    ${failure.artifactId}: ${failure.error}`);
      }
      process.exit(1);
    }
  },
};
