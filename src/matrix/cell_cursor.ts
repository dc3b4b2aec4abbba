/***
 * CellCursor — Bidirectional, read-only position over a matrix's cells.
 *
 * Wraps a position in the backing store's traversal order. begin() sits
 * on the first stored cell, end() past the last. End is the CURSOR_END
 * sentinel rather than the current size, so an end cursor taken before an
 * insert still equals end() afterwards. A held position that an erase
 * leaves at or beyond the size also counts as end.
 *
 *   next() / prev()           step in place, return this
 *   advanced() / retreated()  step a copy, leave this alone
 *   deref()                   fresh frozen Cell record
 *
 * Stepping past end or before begin, or dereferencing end, throws
 * CURSOR_OUT_OF_RANGE. What a held position refers to after a set or
 * erase follows the store's invalidation rules.
 *
 ***/

import { unsafe_cast, type CoordinateKey } from "type_primitives";
import type { BackingStore } from "store";
import { CURSOR_END } from "utils/constants";
import { MATRIX_ERROR, MatrixError } from "utils/error";
import { make_cell, type Cell } from "./types";

export class CellCursor<V, N extends number = number> {
  constructor(
    private readonly _store: BackingStore<V>,
    private _pos: number,
  ) {}

  /** Position in traversal order; `size` for end. */
  get position(): number {
    const size = this._store.size;
    return this._pos < size ? this._pos : size;
  }

  get is_end(): boolean {
    return this._pos >= this._store.size;
  }

  get key(): CoordinateKey<N> {
    this._check_dereferenceable();
    return unsafe_cast<CoordinateKey<N>>(this._store.key_at(this._pos));
  }

  get value(): V {
    this._check_dereferenceable();
    return this._store.value_at(this._pos);
  }

  deref(): Cell<N, V> {
    this._check_dereferenceable();
    return make_cell<V, N>(
      this._store.key_at(this._pos),
      this._store.value_at(this._pos),
    );
  }

  next(): this {
    if (this.is_end) {
      throw new MatrixError(
        MATRIX_ERROR.CURSOR_OUT_OF_RANGE,
        "Cannot advance past end",
      );
    }
    const next = this._pos + 1;
    this._pos = next < this._store.size ? next : CURSOR_END;
    return this;
  }

  prev(): this {
    const at = this.position;
    if (at === 0) {
      throw new MatrixError(
        MATRIX_ERROR.CURSOR_OUT_OF_RANGE,
        "Cannot step back before begin",
      );
    }
    this._pos = at - 1;
    return this;
  }

  advanced(): CellCursor<V, N> {
    return this.copy().next();
  }

  retreated(): CellCursor<V, N> {
    return this.copy().prev();
  }

  copy(): CellCursor<V, N> {
    return new CellCursor<V, N>(this._store, this._pos);
  }

  /** Same store and same position. */
  equals(other: CellCursor<V, N>): boolean {
    return this._store === other._store && this.position === other.position;
  }

  private _check_dereferenceable(): void {
    if (this.is_end) {
      throw new MatrixError(
        MATRIX_ERROR.CURSOR_OUT_OF_RANGE,
        "Cannot dereference end",
        { position: this._pos, size: this._store.size },
      );
    }
  }
}
