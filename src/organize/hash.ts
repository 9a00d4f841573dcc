import crypto from "node:crypto";
import { createReadStream } from "node:fs";
import { Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { HashAlgo } from "./types.js";

/** Bytes read per chunk when fingerprinting a file. */
export const HASH_CHUNK_BYTES = 2 * 1024 * 1024;

type Hasher = {
  update(buf: Buffer | Uint8Array): void;
  digestHex(): string;
};

export function createHasher(algo: HashAlgo): Hasher {
  if (algo === "blake3") {
    throw new Error("Use createHasherAsync for blake3");
  }
  const hash = crypto.createHash(algo);
  return {
    update(buf) {
      hash.update(buf);
    },
    digestHex() {
      return hash.digest("hex");
    },
  };
}

export async function createHasherAsync(algo: HashAlgo): Promise<Hasher> {
  if (algo === "blake3") {
    const { blake3 } = await import("@noble/hashes/blake3");
    const hash = blake3.create({});
    return {
      update(buf) {
        hash.update(buf);
      },
      digestHex() {
        return Buffer.from(hash.digest()).toString("hex");
      },
    };
  }
  return createHasher(algo);
}

/**
 * Fingerprint a file by streaming it through a hasher in bounded chunks.
 * Read errors (ENOENT, EACCES, ...) reject the returned promise.
 */
export async function hashFile(filePath: string, algo: HashAlgo = "sha256"): Promise<string> {
  const hasher = await createHasherAsync(algo);
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      hasher.update(chunk);
      callback();
    },
  });
  await pipeline(createReadStream(filePath, { highWaterMark: HASH_CHUNK_BYTES }), sink);
  return hasher.digestHex();
}
