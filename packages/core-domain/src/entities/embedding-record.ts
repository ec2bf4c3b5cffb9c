import type { ChunkHash } from "../value-objects/ids";

/**
 * The only artifact the server keeps durably. `encryptedVector` is the
 * base64 ciphertext (auth tag included) of the embedding; it cannot be read
 * back without the key named by `keyId`.
 */
export interface EmbeddingRecord {
  chunkHash: ChunkHash;
  encryptedVector: string;
  nonce: string;
  keyId: string;
}
