/***
 * IndexChainProxy — Partial coordinate built one index at a time.
 *
 * m.index(i) starts a chain; each .index(j) appends one component. When
 * the last component arrives the chain hands back the matrix's
 * ValueHandle for the full coordinate. Intermediate proxies never touch
 * the store. The return type of each step is computed from the prefix
 * length (see IndexStep), so over-indexing is a compile error.
 *
 ***/

import { unsafe_cast } from "type_primitives";
import type { SparseMatrix } from "./matrix";
import type { IndexStep, ReadonlyIndexChain } from "./types";

export class IndexChainProxy<V, N extends number, P extends number[]>
  implements ReadonlyIndexChain<V, N, P>
{
  constructor(
    private readonly _matrix: SparseMatrix<V, N>,
    readonly prefix: Readonly<P>,
  ) {}

  /** Components still to be supplied, counting the next one. */
  get remaining(): number {
    return this._matrix.dimensions - this.prefix.length;
  }

  index(next: number): IndexStep<V, N, P> {
    const coords = [...this.prefix, next];
    if (coords.length >= this._matrix.dimensions) {
      return unsafe_cast<IndexStep<V, N, P>>(this._matrix._handle(coords));
    }
    return unsafe_cast<IndexStep<V, N, P>>(
      new IndexChainProxy(this._matrix, coords),
    );
  }
}
