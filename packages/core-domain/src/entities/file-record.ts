import type { Digest, RelativePath } from "../value-objects/ids";

export interface FileRecord {
  readonly path: RelativePath;
  readonly contentHash: Digest;
  readonly size: number;
  readonly mtimeMs: number;
}

export type RejectedFile = {
  path: RelativePath;
  reason: string;
};
