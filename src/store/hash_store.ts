/***
 *
 * HashStore — Unordered coordinate-keyed store with dense entry storage
 *
 * Entries live in three parallel dense arrays (keys, values, hashes) so
 * traversal is a linear walk. An open-addressing Int32Array slot table,
 * probed linearly from hash & mask, maps each key to its dense row.
 * Deletion leaves a tombstone in the slot table and swap-and-pops the
 * dense arrays; the moved entry's slot is re-pointed at its new row.
 *
 * Slot states:  row >= 0  |  EMPTY (-1)  |  TOMBSTONE (-2)
 *
 * The table is rebuilt once live entries plus tombstones exceed the load
 * factor: doubled when live entries dominate, rebuilt in place otherwise.
 *
 * Traversal order is insertion order until a delete moves the last entry
 * into the hole. Positions held across a delete are invalid; inserts only
 * append, so positions held across an insert stay valid.
 *
 ***/

import {
  coordinates_equal,
  hash_coordinates,
  is_non_negative_integer,
  validate_and_cast,
  type CoordinateKey,
} from "type_primitives";
import {
  ABSENT,
  DEFAULT_INITIAL_CAPACITY,
  GROWTH_FACTOR,
  MAX_LOAD_FACTOR,
  TOMBSTONE,
} from "utils/constants";
import { debug_store } from "utils/debug";
import { MATRIX_ERROR, MatrixError } from "utils/error";
import type { BackingStore } from "./backing_store";

const EMPTY = ABSENT;

export class HashStore<V> implements BackingStore<V> {
  private _keys: CoordinateKey[] = [];
  private _vals: V[] = [];
  private _hashes: number[] = [];
  private _slots: Int32Array;
  private _mask: number;
  private _tombstones = 0;

  /** `initial_capacity` is the number of entries to hold before the first rebuild. */
  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    const slot_count = slot_count_for(
      validate_and_cast(
        initial_capacity,
        is_non_negative_integer,
        "initial_capacity must be a non-negative integer",
      ),
    );
    this._slots = new Int32Array(slot_count).fill(EMPTY);
    this._mask = slot_count - 1;
  }

  get size(): number {
    return this._keys.length;
  }

  /** Entries the slot table holds before it rebuilds. */
  get capacity(): number {
    return Math.floor(this._slots.length * MAX_LOAD_FACTOR);
  }

  find(key: readonly number[]): number {
    const slot = this._find_slot(key, hash_coordinates(key));
    return slot === ABSENT ? ABSENT : this._slots[slot];
  }

  set(key: CoordinateKey, value: V): void {
    const hash = hash_coordinates(key);
    const slot = this._find_slot(key, hash);
    if (slot !== ABSENT) {
      this._vals[this._slots[slot]] = value;
      return;
    }
    if (__DEV__ && this._keys.length > 0 && key.length !== this._keys[0].length) {
      throw new MatrixError(
        MATRIX_ERROR.ARITY_MISMATCH,
        `Store holds ${this._keys[0].length}-component keys, got ${key.length}`,
        { expected: this._keys[0].length, actual: key.length },
      );
    }
    this._ensure();
    this._place(hash, this._keys.length);
    this._keys.push(key);
    this._vals.push(value);
    this._hashes.push(hash);
  }

  delete(key: readonly number[]): boolean {
    const slot = this._find_slot(key, hash_coordinates(key));
    if (slot === ABSENT) return false;

    const row = this._slots[slot];
    this._slots[slot] = TOMBSTONE;
    this._tombstones++;

    const last = this._keys.length - 1;
    if (row !== last) {
      const moved_slot = this._find_slot(this._keys[last], this._hashes[last]);
      this._slots[moved_slot] = row;
      this._keys[row] = this._keys[last];
      this._vals[row] = this._vals[last];
      this._hashes[row] = this._hashes[last];
    }
    this._keys.pop();
    this._vals.pop();
    this._hashes.pop();
    return true;
  }

  clear(): void {
    this._slots.fill(EMPTY);
    this._tombstones = 0;
    this._keys.length = 0;
    this._vals.length = 0;
    this._hashes.length = 0;
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

  //=========================================================
  // Internal
  //=========================================================

  /** Slot index whose row holds `key`, or ABSENT. */
  private _find_slot(key: readonly number[], hash: number): number {
    const slots = this._slots;
    const mask = this._mask;
    let i = hash & mask;
    for (;;) {
      const row = slots[i];
      if (row === EMPTY) return ABSENT;
      if (
        row >= 0 &&
        this._hashes[row] === hash &&
        coordinates_equal(this._keys[row], key)
      ) {
        return i;
      }
      i = (i + 1) & mask;
    }
  }

  /** Point the first free slot on `hash`'s probe sequence at `row`. */
  private _place(hash: number, row: number): void {
    const slots = this._slots;
    const mask = this._mask;
    let i = hash & mask;
    while (slots[i] >= 0) i = (i + 1) & mask;
    if (slots[i] === TOMBSTONE) this._tombstones--;
    slots[i] = row;
  }

  /** Make room for one more entry. */
  private _ensure(): void {
    const used = this._keys.length + this._tombstones + 1;
    if (used <= this._slots.length * MAX_LOAD_FACTOR) return;

    let slot_count = this._slots.length;
    if ((this._keys.length + 1) > slot_count * MAX_LOAD_FACTOR / GROWTH_FACTOR) {
      slot_count *= GROWTH_FACTOR;
    }
    debug_store(
      "hash store rebuild: %d -> %d slots (%d entries, %d tombstones)",
      this._slots.length,
      slot_count,
      this._keys.length,
      this._tombstones,
    );
    this._slots = new Int32Array(slot_count).fill(EMPTY);
    this._mask = slot_count - 1;
    this._tombstones = 0;
    for (let row = 0; row < this._hashes.length; row++) {
      this._place(this._hashes[row], row);
    }
  }
}

/** Smallest power of two whose load-factor share holds `entries`. */
function slot_count_for(entries: number): number {
  const needed = Math.max(1, Math.ceil(entries / MAX_LOAD_FACTOR));
  let count = 1;
  while (count < needed) count *= 2;
  return count < 2 ? 2 : count;
}
