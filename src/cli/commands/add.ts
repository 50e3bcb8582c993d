import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { Artifact } from '../../artifacts/artifact.js';
import { isArtifactType, type ArtifactType } from '../../artifacts/types.js';
import type { Command } from '../types.js';
import { flagValue, positionalArgs, usageError, withWorkspace } from '../utils.js';

const USAGE = 'chunkvault add <file> [--type <TYPE>] [--id <id>] [--workspace <id>]';

const TYPE_BY_EXTENSION: Record<string, ArtifactType> = {
  '.md': 'MARKDOWN',
  '.markdown': 'MARKDOWN',
  '.html': 'HTML',
  '.htm': 'HTML',
  '.json': 'JSON',
  '.csv': 'CSV',
  '.svg': 'SVG',
  '.ts': 'CODE',
  '.js': 'CODE',
  '.py': 'CODE',
  '.go': 'CODE',
  '.rs': 'CODE',
  '.java': 'CODE',
};

/**
 * Artifact type implied by a file name; TEXT when the extension is unknown.
 */
export function inferArtifactType(file: string): ArtifactType {
  return TYPE_BY_EXTENSION[extname(file).toLowerCase()] ?? 'TEXT';
}

export const addCommand: Command = {
  name: 'add',
  description: 'Add a file as an artifact and index it',
  usage: USAGE,
  handler: async (args) => {
    const [file] = positionalArgs(args);
    if (!file) {
      usageError('File required', USAGE);
      return;
    }

    const typeFlag = flagValue(args, '--type');
    const artifactType = typeFlag === undefined ? inferArtifactType(file) : typeFlag.toUpperCase();
    if (!isArtifactType(artifactType)) {
      usageError(`Unknown artifact type: ${typeFlag}`, USAGE);
      return;
    }

    const content = await readFile(file, 'utf-8');
    const artifact = new Artifact({
      artifactId: flagValue(args, '--id'),
      artifactType,
      content,
      metadata: { filename: basename(file) },
    });

    const summary = await withWorkspace(args, (workspace) => workspace.addArtifact(artifact));
    console.log(`Added ${artifact.artifactId} (${artifactType})`);
    console.log(`  Indexed: ${summary.indexed}, chunks: ${summary.chunks}, skipped: ${summary.skipped}`);
    for (const failure of summary.failures) {
      console.error(`  Failed: ${failure.artifactId}: ${failure.error}`);
    }
    if (summary.failures.length > 0) {
      process.exit(1);
    }
  },
};
