import { createHash } from "node:crypto";
import type { Digest } from "@code-sync/core-domain";

export function sha256Hex(data: string | Uint8Array): Digest {
  return createHash("sha256").update(data).digest("hex");
}

export function toPosix(p: string): string {
  return p.replaceAll("\\", "/");
}
