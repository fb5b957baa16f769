/**
 * @scevents/hash — Fixed-size digest.
 *
 * Digests are SHA-256 over the raw input. Two encodings are supported:
 *
 *   raw:         the 32 digest bytes, no header, no length prefix
 *   base58check: base58(bytes || sha256(sha256(bytes))[0..4])
 *
 * A Hash is immutable: it copies its input and hands out copies.
 */

import { createHash } from "node:crypto";
import bs58check from "bs58check";
import { HASH_SIZE_BYTES, HashError } from "./types.js";
import type { PreHashed } from "./types.js";

export class Hash implements PreHashed {
  private readonly _bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this._bytes = Uint8Array.from(bytes);
  }

  /**
   * Compute the digest of some data. Strings are hashed as UTF-8.
   */
  static computeFrom(data: Uint8Array | string): Hash {
    return new Hash(createHash("sha256").update(data).digest());
  }

  /**
   * @throws HashError INVALID_LENGTH unless exactly HASH_SIZE_BYTES long
   */
  static fromBytes(bytes: Uint8Array): Hash {
    if (bytes.length !== HASH_SIZE_BYTES) {
      throw new HashError(
        "INVALID_LENGTH",
        `Expected ${HASH_SIZE_BYTES} bytes, got ${bytes.length}`,
      );
    }
    return new Hash(bytes);
  }

  /**
   * Decode and checksum-validate a base58check string.
   *
   * @throws HashError BS58_DECODE on bad alphabet, bad checksum or wrong payload size
   */
  static fromBs58Check(text: string): Hash {
    let payload: Uint8Array;
    try {
      payload = bs58check.decode(text);
    } catch (err) {
      throw new HashError(
        "BS58_DECODE",
        `Invalid base58check digest "${text}"`,
        { cause: err },
      );
    }
    if (payload.length !== HASH_SIZE_BYTES) {
      throw new HashError(
        "BS58_DECODE",
        `Decoded digest has ${payload.length} bytes, expected ${HASH_SIZE_BYTES}`,
      );
    }
    return new Hash(payload);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this._bytes);
  }

  toBs58Check(): string {
    return bs58check.encode(this._bytes);
  }

  /** Lexicographic order over the digest bytes. */
  compare(other: Hash): -1 | 0 | 1 {
    return Buffer.compare(this._bytes, other._bytes);
  }

  equals(other: Hash): boolean {
    return Buffer.compare(this._bytes, other._bytes) === 0;
  }

  preHash(): Uint8Array {
    return this.toBytes();
  }

  toString(): string {
    return this.toBs58Check();
  }
}
