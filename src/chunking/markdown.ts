/**
 * Markdown chunker: one chunk per section under `#`, `##` and `###` headers.
 *
 * Each chunk carries its header path ahead of the body:
 *
 * ```
 * Header#1 Guide
 * Header#2: Install
 * Header#3:
 * Content:
 *
 *   body text
 * ```
 *
 * Headers inside fenced code blocks are treated as body text.
 */

import type { Artifact } from '../artifacts/artifact.js';
import type { Chunk } from '../artifacts/types.js';
import { createChunks, validateChunkConfig, type ChunkConfig, type Chunker } from './chunker.js';

export interface MarkdownSection {
  headers: [string, string, string];
  body: string;
}

const HEADER_PATTERN = /^(#{1,3})\s+(.+?)\s*#*\s*$/;
const FENCE_PATTERN = /^(```|~~~)/;

/**
 * Split markdown into sections keyed by their level 1-3 header path.
 * Sections without body text are dropped.
 */
export function splitMarkdownSections(text: string): MarkdownSection[] {
  const sections: MarkdownSection[] = [];
  const headers: [string, string, string] = ['', '', ''];
  let body: string[] = [];
  let inFence = false;

  const flush = (): void => {
    const content = body.join('\n').trim();
    if (content) {
      sections.push({ headers: [headers[0], headers[1], headers[2]], body: content });
    }
    body = [];
  };

  for (const line of text.split('\n')) {
    const trimmed = line.trim();
    if (FENCE_PATTERN.test(trimmed)) {
      inFence = !inFence;
      body.push(line);
      continue;
    }

    const match = inFence ? null : HEADER_PATTERN.exec(trimmed);
    if (match) {
      flush();
      const level = match[1].length;
      headers[level - 1] = match[2];
      for (let i = level; i < headers.length; i++) {
        headers[i] = '';
      }
      continue;
    }

    body.push(line.trimEnd());
  }

  flush();
  return sections;
}

export function renderSection(section: MarkdownSection): string {
  const [h1, h2, h3] = section.headers;
  return `Header#1 ${h1}\nHeader#2: ${h2}\nHeader#3: ${h3}\nContent: \n\n  ${section.body}`;
}

export class MarkdownChunker implements Chunker {
  constructor(readonly config: ChunkConfig) {
    validateChunkConfig(config);
  }

  async chunk(artifact: Artifact): Promise<Chunk[]> {
    const text = artifact.content;
    if (!text) return [];
    return createChunks(splitMarkdownSections(text).map(renderSection), artifact, this.config);
  }
}
