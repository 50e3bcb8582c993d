import { isArtifactType, type ArtifactType } from '../../artifacts/types.js';
import type { Command } from '../types.js';
import { flagValue, usageError, withWorkspace } from '../utils.js';

const USAGE = 'chunkvault list [--type <TYPE>] [--json] [--workspace <id>]';

export const listCommand: Command = {
  name: 'list',
  description: 'List live artifacts',
  usage: USAGE,
  handler: async (args) => {
    const typeFlag = flagValue(args, '--type')?.toUpperCase();
    let types: ArtifactType[] | undefined;
    if (typeFlag !== undefined) {
      if (!isArtifactType(typeFlag)) {
        usageError(`Unknown artifact type: ${typeFlag}`, USAGE);
        return;
      }
      types = [typeFlag];
    }

    const records = await withWorkspace(args, async (workspace) =>
      workspace.listArtifacts(types).map((a) => a.toDict()),
    );

    if (args.includes('--json')) {
      console.log(JSON.stringify(records, null, 2));
      return;
    }
    if (records.length === 0) {
      console.log('No artifacts.');
      return;
    }
    for (const record of records) {
      const filename = record.metadata.filename;
      const label = typeof filename === 'string' ? `  ${filename}` : '';
      console.log(`${record.artifact_id}  ${record.artifact_type}  ${record.status}${label}`);
    }
  },
};
