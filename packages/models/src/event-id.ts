/**
 * @scevents/models — Output event identifier.
 *
 * An EventId is a digest computed by the execution engine from whether
 * the event is read-only, its slot and its index in the slot. The
 * derivation is the producer's business; here the id is an opaque digest
 * with two bit-exact encodings:
 *
 *   bytes: exactly EVENT_ID_SIZE_BYTES, same as the digest
 *   text:  base58check of those bytes (the only textual grammar)
 *
 * Equality, ordering and container keys are all taken from the digest.
 */

import { Hash } from "@scevents/hash";
import type { PreHashed } from "@scevents/hash";
import { ModelsError } from "./types.js";

export class EventId implements PreHashed {
  constructor(private readonly _hash: Hash) {}

  /**
   * Rebuild an id from its fixed-size byte encoding.
   *
   * @throws ModelsError HASH_ERROR unless the bytes form a valid digest
   */
  static fromBytes(bytes: Uint8Array): EventId {
    try {
      return new EventId(Hash.fromBytes(bytes));
    } catch (err) {
      throw new ModelsError("HASH_ERROR", `Invalid event id bytes: ${describe(err)}`, {
        cause: err,
      });
    }
  }

  /**
   * Decode and checksum-validate the textual form.
   *
   * @throws ModelsError HASH_ERROR on malformed base58 or checksum mismatch
   */
  static fromBs58Check(text: string): EventId {
    try {
      return new EventId(Hash.fromBs58Check(text));
    } catch (err) {
      throw new ModelsError("HASH_ERROR", `Invalid event id "${text}": ${describe(err)}`, {
        cause: err,
      });
    }
  }

  /** Same as {@link EventId.fromBs58Check}. */
  static parse(text: string): EventId {
    return EventId.fromBs58Check(text);
  }

  get hash(): Hash {
    return this._hash;
  }

  toBytes(): Uint8Array {
    return this._hash.toBytes();
  }

  toBs58Check(): string {
    return this._hash.toBs58Check();
  }

  equals(other: EventId): boolean {
    return this._hash.equals(other._hash);
  }

  compare(other: EventId): -1 | 0 | 1 {
    return this._hash.compare(other._hash);
  }

  preHash(): Uint8Array {
    return this._hash.preHash();
  }

  toString(): string {
    return this.toBs58Check();
  }

  toJSON(): string {
    return this.toBs58Check();
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
