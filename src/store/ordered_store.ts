/***
 *
 * OrderedStore — Coordinate-keyed store kept in lexicographic key order
 *
 * Keys and values sit in two parallel arrays sorted by
 * compare_coordinates, so traversal visits cells in row-major order
 * ((0, 0), (0, 1), ..., (1, 0), ...). Lookups are a binary search; inserts
 * and deletes splice, shifting every later position by one.
 *
 * Positions held across an insert or delete of a smaller key are off by
 * one afterwards; positions before the mutated key are unaffected.
 *
 ***/

import { compare_coordinates, type CoordinateKey } from "type_primitives";
import { ABSENT } from "utils/constants";
import { binary_search } from "utils/arrays";
import { MATRIX_ERROR, MatrixError } from "utils/error";
import type { BackingStore } from "./backing_store";

export class OrderedStore<V> implements BackingStore<V> {
  private _keys: CoordinateKey[] = [];
  private _vals: V[] = [];

  get size(): number {
    return this._keys.length;
  }

  find(key: readonly number[]): number {
    const i = binary_search(this._keys, key, compare_coordinates);
    return i >= 0 ? i : ABSENT;
  }

  set(key: CoordinateKey, value: V): void {
    const i = binary_search(this._keys, key, compare_coordinates);
    if (i >= 0) {
      this._vals[i] = value;
      return;
    }
    if (__DEV__ && this._keys.length > 0 && key.length !== this._keys[0].length) {
      throw new MatrixError(
        MATRIX_ERROR.ARITY_MISMATCH,
        `Store holds ${this._keys[0].length}-component keys, got ${key.length}`,
        { expected: this._keys[0].length, actual: key.length },
      );
    }
    const at = -(i + 1);
    this._keys.splice(at, 0, key);
    this._vals.splice(at, 0, value);
  }

  delete(key: readonly number[]): boolean {
    const i = binary_search(this._keys, key, compare_coordinates);
    if (i < 0) return false;
    this._keys.splice(i, 1);
    this._vals.splice(i, 1);
    return true;
  }

  clear(): void {
    this._keys.length = 0;
    this._vals.length = 0;
  }

  key_at(pos: number): CoordinateKey {
    return this._keys[pos];
  }

  value_at(pos: number): V {
    return this._vals[pos];
  }

  *[Symbol.iterator](): Iterator<[CoordinateKey, V]> {
    const keys = this._keys;
    const vals = this._vals;
    for (let i = 0; i < keys.length; i++) {
      yield [keys[i], vals[i]];
    }
  }
}
