/***
 * SparseMatrix — N-dimensional matrix that stores only non-default cells.
 *
 * Behaves like a dense N-dimensional array whose every cell starts at
 * `default_value`, but only cells holding something else occupy the
 * backing store. Reading an absent cell synthesizes the default; writing
 * the default through the default-aware path erases the cell, so
 * `size` is exactly the number of interesting cells.
 *
 *   const m = new SparseMatrix({ dimensions: 2, default_value: 0 });
 *   m.index(3).index(4).value = 7;   // chained indexing
 *   m.at(3, 4).get();                // 7
 *   m.at(3, 4).assign(0);            // erased
 *   for (const [x, y, v] of m) ...   // stored cells only
 *
 * Access paths:
 *
 *   at(...coords)            ValueHandle, the primary API
 *   index(i).index(j)...     same handle, one component at a time
 *   get_or_default / set / erase / assign   direct, no handle
 *
 * `set` is the low-level primitive and stores whatever it is given,
 * including the default. Everything else that writes (ValueHandle.assign,
 * ValueHandle.value =, SparseMatrix.assign) keeps the no-default-stored
 * invariant.
 *
 * Coordinate arity is enforced by the Coordinates<N> tuple type and,
 * in dev builds, re-checked at runtime (ARITY_MISMATCH,
 * INVALID_COORDINATE). The `_`-prefixed members are the handle/proxy
 * entry points and take already-shaped keys.
 *
 ***/

import {
  as_coordinate_key,
  check_coordinates,
  is_positive_integer,
  unsafe_cast,
  type CoordinateKey,
  type Coordinates,
} from "type_primitives";
import { OrderedStore, type BackingStore } from "store";
import { ABSENT, CURSOR_END } from "utils/constants";
import { debug_matrix } from "utils/debug";
import { MATRIX_ERROR, MatrixError } from "utils/error";
import { CellCursor } from "./cell_cursor";
import { IndexChainProxy } from "./index_chain";
import { ValueHandle } from "./value_handle";
import {
  make_cell,
  type Cell,
  type CellState,
  type IndexStep,
  type MatrixOptions,
  type ReadonlySparseMatrix,
} from "./types";

/** SameValueZero: 0 and -0 are equal, NaN equals NaN. */
export function same_value_zero(a: unknown, b: unknown): boolean {
  // NaN is the only value not equal to itself
  return a === b || (a !== a && b !== b);
}

export class SparseMatrix<V, N extends number = 2>
  implements ReadonlySparseMatrix<V, N>
{
  readonly dimensions: N;
  readonly default_value: V;

  private readonly _store: BackingStore<V>;
  private readonly _equals: (a: V, b: V) => boolean;

  constructor(options: MatrixOptions<V, N>) {
    if (!is_positive_integer(options.dimensions)) {
      throw new MatrixError(
        MATRIX_ERROR.INVALID_DIMENSIONS,
        `Dimensions must be a positive integer, got ${String(options.dimensions)}`,
        { dimensions: options.dimensions },
      );
    }
    const store = options.store ? options.store() : new OrderedStore<V>();
    if (store.size !== 0) {
      throw new MatrixError(
        MATRIX_ERROR.STORE_NOT_EMPTY,
        `Store factory must return an empty store, got ${store.size} entries`,
        { size: store.size },
      );
    }

    this.dimensions = options.dimensions;
    this.default_value = options.default_value;
    this._store = store;
    this._equals = options.equals ?? same_value_zero;

    debug_matrix(
      "created %d-dimensional matrix (default %o, %s)",
      this.dimensions,
      this.default_value,
      store.constructor.name,
    );
  }

  /** Number of stored (non-default) cells. */
  get size(): number {
    return this._store.size;
  }

  get empty(): boolean {
    return this._store.size === 0;
  }

  values_equal(a: V, b: V): boolean {
    return this._equals(a, b);
  }

  //=========================================================
  // Access
  //=========================================================

  /**
   * Begin a chained index. For a 1-dimensional matrix this is already the
   * ValueHandle for `(i)`.
   */
  index(i: number): IndexStep<V, N, []> {
    return new IndexChainProxy<V, N, []>(this, []).index(i);
  }

  at(...coords: Coordinates<N>): ValueHandle<V, N> {
    return this._handle(coords);
  }

  get_or_default(...coords: Coordinates<N>): V {
    if (__DEV__) check_coordinates(coords, this.dimensions);
    return this._get(coords);
  }

  has(...coords: Coordinates<N>): boolean {
    if (__DEV__) check_coordinates(coords, this.dimensions);
    return this._store.find(coords) !== ABSENT;
  }

  /** Insert or overwrite unconditionally, even with the default value. */
  set(value: V, ...coords: Coordinates<N>): void {
    this._store.set(as_coordinate_key(coords, this.dimensions), value);
  }

  /** Remove the cell if stored. Returns whether anything was removed. */
  erase(...coords: Coordinates<N>): boolean {
    if (__DEV__) check_coordinates(coords, this.dimensions);
    return this._store.delete(coords);
  }

  /** Default-aware write: erase when `value` equals the default, else set. */
  assign(value: V, ...coords: Coordinates<N>): void {
    this._assign(as_coordinate_key(coords, this.dimensions), value);
  }

  clear(): void {
    debug_matrix("clearing %d cells", this._store.size);
    this._store.clear();
  }

  /** This matrix, typed without its write operations. */
  as_readonly(): ReadonlySparseMatrix<V, N> {
    return this;
  }

  //=========================================================
  // Iteration
  //=========================================================

  begin(): CellCursor<V, N> {
    return new CellCursor<V, N>(this._store, 0);
  }

  end(): CellCursor<V, N> {
    return new CellCursor<V, N>(this._store, CURSOR_END);
  }

  cbegin(): CellCursor<V, N> {
    return this.begin();
  }

  cend(): CellCursor<V, N> {
    return this.end();
  }

  *cells(): IterableIterator<Cell<N, V>> {
    for (const [key, value] of this._store) {
      yield make_cell<V, N>(key, value);
    }
  }

  [Symbol.iterator](): Iterator<Cell<N, V>> {
    return this.cells();
  }

  for_each(fn: (value: V, coordinates: CoordinateKey<N>) => void): void {
    for (const [key, value] of this._store) {
      fn(value, unsafe_cast<CoordinateKey<N>>(key));
    }
  }

  //=========================================================
  // Handle / proxy entry points
  //=========================================================

  /** @internal */
  _handle(coords: readonly number[]): ValueHandle<V, N> {
    return new ValueHandle<V, N>(this, as_coordinate_key(coords, this.dimensions));
  }

  /** @internal */
  _get(key: readonly number[]): V {
    const pos = this._store.find(key);
    return pos === ABSENT ? this.default_value : this._store.value_at(pos);
  }

  /** @internal */
  _peek(key: readonly number[]): CellState<V> {
    const pos = this._store.find(key);
    return pos === ABSENT
      ? { kind: "empty" }
      : { kind: "present", value: this._store.value_at(pos) };
  }

  /** @internal */
  _assign(key: CoordinateKey<N>, value: V): void {
    if (this._equals(value, this.default_value)) {
      this._store.delete(key);
    } else {
      this._store.set(key, value);
    }
  }
}
