import type { ChunkSearchInput } from '../../retrieval/chunk-retriever.js';
import { chunkResultToRecord, keywordHitToRecord } from '../../retrieval/wire.js';
import type { Command } from '../types.js';
import { intFlag, numberFlag, positionalArgs, usageError, withWorkspace } from '../utils.js';

const USAGE =
  'chunkvault search <query> [--limit <n>] [--threshold <t>] [--pre <n>] [--next <n>] [--keyword] [--json] [--workspace <id>]';

const PREVIEW_LENGTH = 160;

function preview(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > PREVIEW_LENGTH ? `${flat.slice(0, PREVIEW_LENGTH)}...` : flat;
}

export const searchCommand: Command = {
  name: 'search',
  description: 'Search indexed chunks',
  usage: USAGE,
  handler: async (args) => {
    const query = positionalArgs(args).join(' ');
    if (!query.trim()) {
      usageError('Query required', USAGE);
      return;
    }
    const json = args.includes('--json');
    const limit = intFlag(args, '--limit', USAGE, 1);

    if (args.includes('--keyword')) {
      const hits = await withWorkspace(args, async (workspace) => workspace.searchKeywords(query, limit ?? 10));
      if (json) {
        console.log(JSON.stringify(hits.map(keywordHitToRecord), null, 2));
        return;
      }
      if (hits.length === 0) console.log('No results.');
      for (const hit of hits) {
        console.log(`[${hit.score.toFixed(3)}] ${hit.id}`);
        console.log(`  ${preview(hit.content)}`);
      }
      return;
    }

    const input: ChunkSearchInput = { query };
    if (limit !== undefined) input.limit = limit;
    const threshold = numberFlag(args, '--threshold', USAGE);
    if (threshold !== undefined) input.threshold = threshold;
    const preN = intFlag(args, '--pre', USAGE);
    if (preN !== undefined) input.preN = preN;
    const nextN = intFlag(args, '--next', USAGE);
    if (nextN !== undefined) input.nextN = nextN;

    const results = await withWorkspace(args, (workspace) => workspace.searchChunks(input));
    if (json) {
      console.log(JSON.stringify(results.map(chunkResultToRecord), null, 2));
      return;
    }
    if (results.length === 0) {
      console.log('No results.');
      return;
    }
    for (const result of results) {
      const { chunk } = result;
      console.log(`[${result.score.toFixed(3)}] ${chunk.chunkMetadata.artifactId} #${chunk.chunkMetadata.chunkIndex}`);
      for (const before of [...result.preNChunks].reverse()) {
        console.log(`  - ${preview(before.content)}`);
      }
      console.log(`  > ${preview(chunk.content)}`);
      for (const after of result.nextNChunks) {
        console.log(`  + ${preview(after.content)}`);
      }
    }
  },
};
