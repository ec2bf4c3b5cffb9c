import type { ChunkHash, RelativePath } from "../value-objects/ids";

export type CharRange = {
  start: number;
  end: number;
};

export type LineRange = {
  startLine: number;
  endLine: number;
};

export interface Chunk {
  sourcePath: RelativePath;
  chunkIndex: number;
  /** Character offsets into the file content, end exclusive. */
  tokenRange: CharRange;
  /** 1-based, inclusive. */
  lineRange: LineRange;
  contentHash: ChunkHash;
}
