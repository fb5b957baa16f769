/**
 * Tests for EventId.
 *
 * Verifies:
 * - Byte and base58check round-trips
 * - parse() is exactly fromBs58Check()
 * - Every malformed input surfaces HASH_ERROR
 * - Ordering follows the byte encoding
 * - Container keys are the digest
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { Hash, PreHashMap, PreHashSet } from "@scevents/hash";
import { EventId } from "../src/event-id.js";
import { EVENT_ID_SIZE_BYTES, ModelsError } from "../src/types.js";

// =============================================================================
// Helpers
// =============================================================================

const arbEventId: fc.Arbitrary<EventId> = fc
  .uint8Array({ minLength: EVENT_ID_SIZE_BYTES, maxLength: EVENT_ID_SIZE_BYTES })
  .map((bytes) => new EventId(Hash.fromBytes(bytes)));

const BASE58_ALPHABET = "123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz";

type Outcome = { ok: true; id: string } | { ok: false; code: string };

function outcome(decode: () => EventId): Outcome {
  try {
    return { ok: true, id: decode().toBs58Check() };
  } catch (err) {
    return { ok: false, code: err instanceof ModelsError ? err.code : "UNEXPECTED" };
  }
}

function expectHashError(decode: () => unknown): void {
  try {
    decode();
    expect.unreachable();
  } catch (err) {
    expect(err).toBeInstanceOf(ModelsError);
    expect((err as ModelsError).code).toBe("HASH_ERROR");
  }
}

// =============================================================================
// Scenario
// =============================================================================

describe("hello world id", () => {
  const id = new EventId(Hash.computeFrom("hello world"));

  it("encodes to exactly EVENT_ID_SIZE_BYTES", () => {
    expect(id.toBytes()).toHaveLength(EVENT_ID_SIZE_BYTES);
    expect(EVENT_ID_SIZE_BYTES).toBe(32);
  });

  it("round-trips through bytes", () => {
    expect(EventId.fromBytes(id.toBytes()).equals(id)).toBe(true);
  });

  it("round-trips through checksummed text", () => {
    expect(EventId.fromBs58Check(id.toBs58Check()).equals(id)).toBe(true);
  });

  it("has the digest's text form", () => {
    expect(id.toBs58Check()).toBe("2QcGxuiethzLk2We9hTQVN9Ua9mipFdqvGLQRZzArzyC6Czrfi");
    expect(id.toString()).toBe(id.toBs58Check());
    expect(JSON.stringify({ id })).toBe(`{"id":"${id.toBs58Check()}"}`);
  });

  it("rejects a truncated byte slice", () => {
    expectHashError(() => EventId.fromBytes(id.toBytes().slice(0, EVENT_ID_SIZE_BYTES - 1)));
  });

  it("rejects the text with one character flipped", () => {
    const text = id.toBs58Check();
    expectHashError(() => EventId.fromBs58Check(text.slice(0, -1) + "j"));
  });

  it("keeps the underlying HashError as cause", () => {
    try {
      EventId.fromBytes(new Uint8Array(3));
      expect.unreachable();
    } catch (err) {
      expect((err as ModelsError).cause).toBeInstanceOf(Error);
      expect((err as ModelsError).message).toBe(
        "Invalid event id bytes: Expected 32 bytes, got 3",
      );
    }
  });
});

// =============================================================================
// Properties
// =============================================================================

describe("codec properties", () => {
  it("byte round-trip", () => {
    fc.assert(
      fc.property(arbEventId, (id) => {
        expect(EventId.fromBytes(id.toBytes()).equals(id)).toBe(true);
      }),
    );
  });

  it("text round-trip", () => {
    fc.assert(
      fc.property(arbEventId, (id) => {
        expect(EventId.fromBs58Check(id.toBs58Check()).equals(id)).toBe(true);
      }),
    );
  });

  it("parse matches fromBs58Check on arbitrary strings", () => {
    fc.assert(
      fc.property(fc.string(), (text) => {
        expect(outcome(() => EventId.parse(text))).toEqual(
          outcome(() => EventId.fromBs58Check(text)),
        );
      }),
    );
  });

  it("parse matches fromBs58Check on valid ids", () => {
    fc.assert(
      fc.property(arbEventId, (id) => {
        const text = id.toBs58Check();
        expect(outcome(() => EventId.parse(text))).toEqual({ ok: true, id: text });
        expect(outcome(() => EventId.fromBs58Check(text))).toEqual({ ok: true, id: text });
      }),
    );
  });

  it("wrong byte lengths yield HASH_ERROR", () => {
    fc.assert(
      fc.property(
        fc.uint8Array({ maxLength: 2 * EVENT_ID_SIZE_BYTES }).filter(
          (b) => b.length !== EVENT_ID_SIZE_BYTES,
        ),
        (bytes) => {
          expect(outcome(() => EventId.fromBytes(bytes))).toEqual({
            ok: false,
            code: "HASH_ERROR",
          });
        },
      ),
    );
  });

  it("a single substituted character yields HASH_ERROR", () => {
    fc.assert(
      fc.property(arbEventId, fc.nat(), fc.nat({ max: BASE58_ALPHABET.length - 2 }), (id, at, shift) => {
        const text = id.toBs58Check();
        const pos = at % text.length;
        const original = BASE58_ALPHABET.indexOf(text.charAt(pos));
        const replacement = BASE58_ALPHABET.charAt(
          (original + 1 + shift) % BASE58_ALPHABET.length,
        );
        const corrupted = text.slice(0, pos) + replacement + text.slice(pos + 1);

        expect(corrupted).not.toBe(text);
        expect(outcome(() => EventId.fromBs58Check(corrupted))).toEqual({
          ok: false,
          code: "HASH_ERROR",
        });
      }),
    );
  });

  it("ordering matches byte order", () => {
    fc.assert(
      fc.property(arbEventId, arbEventId, (a, b) => {
        expect(a.compare(b) < 0).toBe(Buffer.compare(a.toBytes(), b.toBytes()) < 0);
        expect(a.compare(b) === 0).toBe(a.equals(b));
      }),
    );
  });
});

// =============================================================================
// Container keys
// =============================================================================

describe("container keys", () => {
  it("pre-hashes to its digest bytes", () => {
    const hash = Hash.computeFrom("event");
    expect(Buffer.from(new EventId(hash).preHash()).equals(Buffer.from(hash.toBytes()))).toBe(
      true,
    );
  });

  it("addresses the same map entry from a decoded copy", () => {
    const id = new EventId(Hash.computeFrom("event"));
    const map = new PreHashMap<EventId, string>([[id, "payload"]]);

    expect(map.get(EventId.parse(id.toBs58Check()))).toBe("payload");
  });

  it("de-duplicates equal ids in a set", () => {
    const set = new PreHashSet<EventId>([
      new EventId(Hash.computeFrom("a")),
      EventId.fromBytes(Hash.computeFrom("a").toBytes()),
      new EventId(Hash.computeFrom("b")),
    ]);

    expect(set.size).toBe(2);
  });

  it("exposes its digest", () => {
    const hash = Hash.computeFrom("event");
    expect(new EventId(hash).hash.equals(hash)).toBe(true);
  });
});
