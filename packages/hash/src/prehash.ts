/**
 * @scevents/hash — Containers keyed by pre-computed digests.
 *
 * A PreHashed key's digest bytes are its identity in the container:
 * two keys address the same entry iff their digests are byte-identical.
 * Keys are never hashed again; the digest is turned into a lookup string
 * as-is.
 */

import type { PreHashed } from "./types.js";

function keyOf(key: PreHashed): string {
  return Buffer.from(key.preHash()).toString("hex");
}

/**
 * Map keyed by pre-hashed values. Iteration follows insertion order.
 */
export class PreHashMap<K extends PreHashed, V> implements Iterable<[K, V]> {
  private readonly _entries = new Map<string, [K, V]>();

  constructor(entries?: Iterable<readonly [K, V]>) {
    if (entries !== undefined) {
      for (const [key, value] of entries) {
        this.set(key, value);
      }
    }
  }

  get size(): number {
    return this._entries.size;
  }

  get(key: K): V | undefined {
    return this._entries.get(keyOf(key))?.[1];
  }

  has(key: K): boolean {
    return this._entries.has(keyOf(key));
  }

  set(key: K, value: V): this {
    this._entries.set(keyOf(key), [key, value]);
    return this;
  }

  delete(key: K): boolean {
    return this._entries.delete(keyOf(key));
  }

  clear(): void {
    this._entries.clear();
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this._entries.values()) {
      yield key;
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this._entries.values()) {
      yield value;
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (const [key, value] of this._entries.values()) {
      yield [key, value];
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries();
  }
}

/**
 * Set of pre-hashed values. Iteration follows insertion order.
 */
export class PreHashSet<K extends PreHashed> implements Iterable<K> {
  private readonly _items = new Map<string, K>();

  constructor(items?: Iterable<K>) {
    if (items !== undefined) {
      for (const item of items) {
        this.add(item);
      }
    }
  }

  get size(): number {
    return this._items.size;
  }

  has(item: K): boolean {
    return this._items.has(keyOf(item));
  }

  /** Adds the item; an equal item already present is kept. */
  add(item: K): this {
    const key = keyOf(item);
    if (!this._items.has(key)) {
      this._items.set(key, item);
    }
    return this;
  }

  delete(item: K): boolean {
    return this._items.delete(keyOf(item));
  }

  clear(): void {
    this._items.clear();
  }

  values(): IterableIterator<K> {
    return this._items.values();
  }

  [Symbol.iterator](): IterableIterator<K> {
    return this._items.values();
  }
}
