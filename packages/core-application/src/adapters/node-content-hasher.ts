import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

import type { Digest } from "@code-sync/core-domain";
import type { ContentHasher } from "../ports/content-hasher";

/** Streams the file through sha256 so large files never sit in memory whole. */
export class NodeContentHasher implements ContentHasher {
  digestFile(absolutePath: string): Promise<Digest> {
    return new Promise((resolve, reject) => {
      const hash = createHash("sha256");
      createReadStream(absolutePath)
        .on("data", (chunk) => hash.update(chunk))
        .on("error", reject)
        .on("end", () => resolve(hash.digest("hex")));
    });
  }
}
