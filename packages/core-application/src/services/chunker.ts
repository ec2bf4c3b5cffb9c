/**
 * Line-based chunking for the embedding index.
 *
 * Complete lines are packed into a chunk until the next line would push it
 * past `maxChars`; lines are never split. Boundaries depend only on the
 * content, so re-sending an unchanged file yields the same chunk hashes and
 * causes no churn in the embedding store.
 */

import type { Chunk, RelativePath } from "@code-sync/core-domain";
import { ChunkTooLargeError } from "../application/errors";
import { sha256Hex } from "./digest";

export const DEFAULT_MAX_CHUNK_CHARS = 1500;

export type ChunkSlice = {
  chunk: Chunk;
  text: string;
};

export type ChunkResult = {
  slices: ChunkSlice[];
  /** One per line that alone exceeds the budget; the chunk is still emitted whole. */
  warnings: ChunkTooLargeError[];
};

export type ChunkOptions = {
  path: RelativePath;
  content: string;
  maxChars?: number;
};

function splitLines(content: string): string[] {
  // keeps the terminators so offsets add up to content.length
  return content.split(/(?<=\n)/);
}

export function chunkContent({ path, content, maxChars = DEFAULT_MAX_CHUNK_CHARS }: ChunkOptions): ChunkResult {
  if (maxChars < 1) throw new RangeError("maxChars must be at least 1");

  const slices: ChunkSlice[] = [];
  const warnings: ChunkTooLargeError[] = [];
  if (content.length === 0) return { slices, warnings };

  let buffer = "";
  let bufferStart = 0;
  let bufferFirstLine = 1;
  let offset = 0;
  let lineNo = 0;

  const flush = (lastLine: number) => {
    if (buffer.length === 0) return;
    slices.push({
      text: buffer,
      chunk: {
        sourcePath: path,
        chunkIndex: slices.length,
        tokenRange: { start: bufferStart, end: bufferStart + buffer.length },
        lineRange: { startLine: bufferFirstLine, endLine: lastLine },
        contentHash: sha256Hex(buffer),
      },
    });
    buffer = "";
  };

  for (const line of splitLines(content)) {
    lineNo += 1;

    if (buffer.length > 0 && buffer.length + line.length > maxChars) {
      flush(lineNo - 1);
    }

    if (buffer.length === 0) {
      bufferStart = offset;
      bufferFirstLine = lineNo;
    }

    if (line.length > maxChars) {
      warnings.push(new ChunkTooLargeError(path, lineNo, line.length, maxChars));
    }

    buffer += line;
    offset += line.length;
  }

  flush(lineNo);
  return { slices, warnings };
}
