/***
 * ValueHandle — Lazy accessor bound to one matrix cell.
 *
 * Returned by SparseMatrix.at and by the last step of an index chain.
 * Holds the matrix and a frozen coordinate key, nothing else: every read
 * goes to the store, so two handles on the same cell always agree.
 *
 * Writes go through the erase-on-default rule: assigning the matrix's
 * default value removes the cell instead of storing it.
 *
 *   const cell = m.at(0, 0);
 *   cell.value = 1;          // stored
 *   cell.get();              // 1
 *   cell.assign(42);         // default: erased, size drops by one
 *   cell.peek();             // { kind: "empty" }
 *
 * A handle keeps its matrix reachable, so it cannot dangle; after
 * m.clear() it reads the default like any other absent cell.
 *
 ***/

import type { CoordinateKey } from "type_primitives";
import type { SparseMatrix } from "./matrix";
import type { CellState, ReadonlyValueHandle } from "./types";

export class ValueHandle<V, N extends number = number>
  implements ReadonlyValueHandle<V, N>
{
  constructor(
    private readonly _matrix: SparseMatrix<V, N>,
    readonly coordinates: CoordinateKey<N>,
  ) {}

  get value(): V {
    return this._matrix._get(this.coordinates);
  }

  set value(v: V) {
    this._matrix._assign(this.coordinates, v);
  }

  get(): V {
    return this._matrix._get(this.coordinates);
  }

  /** Stored value, or empty when the cell reads as the default. */
  peek(): CellState<V> {
    return this._matrix._peek(this.coordinates);
  }

  equals(other: V): boolean {
    return this._matrix.values_equal(this.get(), other);
  }

  /** Default-aware write. */
  assign(value: V): this {
    this._matrix._assign(this.coordinates, value);
    return this;
  }

  /** Read `other` now and write the result here. No binding remains. */
  assign_from(other: ReadonlyValueHandle<V, number>): this {
    return this.assign(other.get());
  }

  /** Another handle on the same cell. Copies the binding, not the value. */
  copy(): ValueHandle<V, N> {
    return new ValueHandle(this._matrix, this.coordinates);
  }

  valueOf(): V {
    return this.get();
  }

  toString(): string {
    return String(this.get());
  }
}
