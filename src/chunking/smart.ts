/**
 * Smart chunker: line-based packing that prefers natural boundaries.
 *
 * Lines accumulate until the chunk would exceed `chunkSize` characters. The
 * chunk is then cut at the boundary closest to the target size, preferring
 * lines that end a sentence, blank lines, markdown headers and list items.
 * Lines after the cut carry into the next chunk together with up to
 * `chunkOverlap` characters of trailing whole lines.
 */

import type { Artifact } from '../artifacts/artifact.js';
import type { Chunk } from '../artifacts/types.js';
import { createChunks, validateChunkConfig, type ChunkConfig, type Chunker } from './chunker.js';

/**
 * Collapse runs of blank lines, strip trailing whitespace and trim blank
 * lines at both ends.
 */
export function cleanText(text: string): string {
  const lines = text
    .replace(/\n{3,}/g, '\n\n')
    .split('\n')
    .map((line) => line.trimEnd());

  while (lines.length > 0 && !lines[0].trim()) lines.shift();
  while (lines.length > 0 && !lines[lines.length - 1].trim()) lines.pop();

  const result: string[] = [];
  let previousBlank = false;
  for (const line of lines) {
    const blank = !line.trim();
    if (blank && previousBlank) continue;
    result.push(line);
    previousBlank = blank;
  }
  return result.join('\n');
}

export function isGoodSplitPoint(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed) return true;
  if (/[.!?]$/.test(trimmed)) return true;
  if (/^#{1,6}\s/.test(trimmed)) return true;
  return /^[-*+]\s/.test(trimmed) && !trimmed.endsWith(',');
}

function totalLength(lines: string[]): number {
  return lines.reduce((sum, line) => sum + line.length, 0);
}

/**
 * Index to cut `lines` at so the head lands closest to `target` characters.
 * Always in `[1, lines.length - 1]` when the lines exceed the target.
 */
export function findBestSplitPoint(lines: string[], target: number): number {
  let size = 0;
  let best = 0;
  let minDiff = Infinity;

  for (let i = 0; i < lines.length; i++) {
    const length = lines[i].length;
    if (size + length > target) {
      if (Math.abs(size - target) < minDiff) {
        best = i;
      }
      break;
    }
    size += length;
    if (isGoodSplitPoint(lines[i])) {
      const diff = Math.abs(size - target);
      if (diff < minDiff) {
        minDiff = diff;
        best = i + 1;
      }
    }
  }

  return Math.max(1, best);
}

export class SmartChunker implements Chunker {
  constructor(readonly config: ChunkConfig) {
    validateChunkConfig(config);
  }

  async chunk(artifact: Artifact): Promise<Chunk[]> {
    if (!artifact.content) return [];
    return createChunks(this.split(artifact.content), artifact, this.config);
  }

  split(text: string): string[] {
    const content = cleanText(text);
    if (!content) return [];

    const { separator, chunkSize } = this.config;
    const chunks: string[] = [];
    let current: string[] = [];
    let size = 0;

    for (const line of content.split(separator)) {
      current.push(line);
      size += line.length;

      while (size > chunkSize && current.length > 1) {
        const cut = findBestSplitPoint(current, chunkSize);
        const head = current.slice(0, cut);
        chunks.push(head.join(separator));
        current = [...this.overlapLines(head), ...current.slice(cut)];
        size = totalLength(current);
      }
    }

    if (current.length > 0) {
      chunks.push(current.join(separator));
    }

    return chunks.map(cleanText).filter((c) => c.length > 0);
  }

  /**
   * Trailing lines of `head` totalling at most `chunkOverlap` characters.
   * Never the whole head, so each cut makes progress.
   */
  private overlapLines(head: string[]): string[] {
    const budget = this.config.chunkOverlap;
    const overlap: string[] = [];
    let size = 0;
    for (let i = head.length - 1; i >= 1; i--) {
      const length = head[i].length;
      if (size + length > budget) break;
      overlap.unshift(head[i]);
      size += length;
    }
    return overlap;
  }
}
