import type { Digest } from "@code-sync/core-domain";

/** Leaf hashing for the tree builder. Must hash the full content, never a prefix. */
export interface ContentHasher {
  digestFile(absolutePath: string): Promise<Digest>;
}
