import { describe, expect, it } from "vitest";

import { AesGcmVectorCipher, singleKeyRing } from "./aes-gcm-vector-cipher";
import { EncryptionError } from "../application/errors";
import { sha256Hex } from "../services/digest";

const chunkHash = sha256Hex("chunk");
const keyA = Buffer.alloc(32, 1);
const keyB = Buffer.alloc(32, 2);

describe("AesGcmVectorCipher", () => {
  it("decrypts what it encrypted", () => {
    const cipher = new AesGcmVectorCipher(singleKeyRing("k1", keyA));
    const record = cipher.encrypt(chunkHash, [0.25, -1.5, 3]);

    expect(record.chunkHash).toBe(chunkHash);
    expect(record.keyId).toBe("k1");
    expect(Buffer.from(record.nonce, "base64")).toHaveLength(12);
    expect(cipher.decrypt(record)).toEqual([0.25, -1.5, 3]);
  });

  it("uses a fresh nonce for every record", () => {
    const cipher = new AesGcmVectorCipher(singleKeyRing("k1", keyA));
    const first = cipher.encrypt(chunkHash, [1, 2]);
    const second = cipher.encrypt(chunkHash, [1, 2]);

    expect(second.nonce).not.toBe(first.nonce);
    expect(second.encryptedVector).not.toBe(first.encryptedVector);
  });

  it("binds the chunk hash as authenticated data", () => {
    const cipher = new AesGcmVectorCipher(singleKeyRing("k1", keyA));
    const record = cipher.encrypt(chunkHash, [1, 2]);

    expect(() => cipher.decrypt({ ...record, chunkHash: sha256Hex("other") })).toThrow(EncryptionError);
  });

  it("keeps old keys readable after rotation", () => {
    const old = new AesGcmVectorCipher(singleKeyRing("k1", keyA));
    const record = old.encrypt(chunkHash, [4, 5, 6]);

    const rotated = new AesGcmVectorCipher({
      activeKeyId: "k2",
      keys: new Map([
        ["k1", keyA],
        ["k2", keyB],
      ]),
    });

    expect(rotated.activeKeyId).toBe("k2");
    expect(rotated.decrypt(record)).toEqual([4, 5, 6]);
    expect(rotated.encrypt(chunkHash, [1]).keyId).toBe("k2");
  });

  it("refuses unknown key ids, bad keys and non-finite vectors", () => {
    const cipher = new AesGcmVectorCipher(singleKeyRing("k1", keyA));
    const record = cipher.encrypt(chunkHash, [1]);

    expect(() => cipher.decrypt({ ...record, keyId: "missing" })).toThrow(EncryptionError);
    expect(() => new AesGcmVectorCipher(singleKeyRing("short", Buffer.alloc(16)))).toThrow(EncryptionError);
    expect(() => cipher.encrypt(chunkHash, [Number.NaN])).toThrow(EncryptionError);
    expect(() => cipher.encrypt(chunkHash, [])).toThrow(EncryptionError);
  });
});
