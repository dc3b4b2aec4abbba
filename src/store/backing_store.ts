/***
 * BackingStore — Capability interface for matrix storage.
 *
 * A SparseMatrix is generic over any associative container that can:
 *
 *   set(key, value)    insert or overwrite
 *   find(key)          position of the entry, or ABSENT
 *   delete(key)        remove, reporting whether anything was there
 *   clear()            drop every entry
 *   size               number of entries
 *
 * and walk its entries in both directions by position (key_at / value_at
 * for 0 <= pos < size) or forward through Symbol.iterator. Positions are
 * the store's native traversal order; what a position refers to after a
 * mutation is store-specific (see each implementation's header).
 *
 * Lookups take plain coordinate arrays so reads never allocate a key;
 * set takes a frozen CoordinateKey because the store keeps it.
 *
 ***/

import type { CoordinateKey } from "type_primitives";

export interface BackingStore<V> extends Iterable<[CoordinateKey, V]> {
  readonly size: number;

  /** Position of `key` in traversal order, or ABSENT (-1). */
  find(key: readonly number[]): number;

  set(key: CoordinateKey, value: V): void;

  delete(key: readonly number[]): boolean;

  clear(): void;

  key_at(pos: number): CoordinateKey;

  value_at(pos: number): V;
}

/** Creates the single store a matrix owns. Must return a fresh, empty store. */
export type StoreFactory<V> = () => BackingStore<V>;
