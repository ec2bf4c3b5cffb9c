import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

import type { ChunkHash, EmbeddingRecord } from "@code-sync/core-domain";
import type { EmbeddingVector } from "../ports/embedding-provider";
import type { VectorCipher } from "../ports/vector-cipher";
import { EncryptionError } from "../application/errors";

const ALGORITHM = "aes-256-gcm";
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const TAG_BYTES = 16;

export type KeyRing = {
  activeKeyId: string;
  /** keyId -> 32 raw key bytes. Old ids stay here so existing records still decrypt. */
  keys: ReadonlyMap<string, Uint8Array>;
};

function encodeVector(vector: EmbeddingVector): Buffer {
  const buf = Buffer.alloc(vector.length * 8);
  vector.forEach((v, i) => buf.writeDoubleLE(v, i * 8));
  return buf;
}

function decodeVector(buf: Buffer): EmbeddingVector {
  const out: number[] = [];
  for (let offset = 0; offset + 8 <= buf.length; offset += 8) {
    out.push(buf.readDoubleLE(offset));
  }
  return out;
}

/**
 * AES-256-GCM over the float64 little-endian vector bytes. Every record gets a
 * fresh random nonce, and the chunk hash is bound as additional authenticated
 * data so a ciphertext cannot be replayed under another chunk. The auth tag
 * is appended to the ciphertext before base64 encoding.
 */
export class AesGcmVectorCipher implements VectorCipher {
  readonly activeKeyId: string;

  constructor(private readonly ring: KeyRing) {
    for (const [id, key] of ring.keys) {
      if (key.length !== KEY_BYTES) {
        throw new EncryptionError(`Key "${id}" must be ${KEY_BYTES} bytes, got ${key.length}`);
      }
    }
    if (!ring.keys.has(ring.activeKeyId)) {
      throw new EncryptionError(`Active key "${ring.activeKeyId}" is not in the key ring`);
    }
    this.activeKeyId = ring.activeKeyId;
  }

  private key(keyId: string): Uint8Array {
    const key = this.ring.keys.get(keyId);
    if (!key) throw new EncryptionError(`Unknown key id "${keyId}"`);
    return key;
  }

  encrypt(chunkHash: ChunkHash, vector: EmbeddingVector): EmbeddingRecord {
    if (vector.length === 0 || vector.some((v) => !Number.isFinite(v))) {
      throw new EncryptionError(`Refusing to encrypt an empty or non-finite vector for ${chunkHash}`);
    }

    try {
      const nonce = randomBytes(NONCE_BYTES);
      const cipher = createCipheriv(ALGORITHM, this.key(this.activeKeyId), nonce);
      cipher.setAAD(Buffer.from(chunkHash, "utf8"));
      const body = Buffer.concat([cipher.update(encodeVector(vector)), cipher.final()]);
      const tag = cipher.getAuthTag();

      return {
        chunkHash,
        encryptedVector: Buffer.concat([body, tag]).toString("base64"),
        nonce: nonce.toString("base64"),
        keyId: this.activeKeyId,
      };
    } catch (err) {
      if (err instanceof EncryptionError) throw err;
      throw new EncryptionError(`Encryption failed for ${chunkHash}`, err);
    }
  }

  decrypt(record: EmbeddingRecord): EmbeddingVector {
    const key = this.key(record.keyId);
    const payload = Buffer.from(record.encryptedVector, "base64");
    if (payload.length < TAG_BYTES) {
      throw new EncryptionError(`Ciphertext for ${record.chunkHash} is truncated`);
    }

    try {
      const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(record.nonce, "base64"));
      decipher.setAAD(Buffer.from(record.chunkHash, "utf8"));
      decipher.setAuthTag(payload.subarray(payload.length - TAG_BYTES));
      const plain = Buffer.concat([decipher.update(payload.subarray(0, payload.length - TAG_BYTES)), decipher.final()]);
      return decodeVector(plain);
    } catch (err) {
      throw new EncryptionError(`Decryption failed for ${record.chunkHash}`, err);
    }
  }
}

/** Key ring with a single key; the usual setup. */
export function singleKeyRing(keyId: string, key: Uint8Array): KeyRing {
  return { activeKeyId: keyId, keys: new Map([[keyId, key]]) };
}
