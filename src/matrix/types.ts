/***
 * Matrix types — Cell records, presence states and the read-only views.
 *
 * Cell<N, V> is the flattened record iteration produces: the N coordinate
 * components followed by the value, e.g. Cell<2, number> is
 * readonly [number, number, number], so `for (const [x, y, v] of m)`
 * destructures with full types.
 *
 * IndexStep computes what one more index returns: a ValueHandle once the
 * prefix reaches N components, otherwise a proxy one component longer.
 *
 *   N = 3:  m.index(0)                  IndexChainProxy<V, 3, [number]>
 *           m.index(0).index(1)         IndexChainProxy<V, 3, [number, number]>
 *           m.index(0).index(1).index(2) ValueHandle<V, 3>
 *
 ***/

import {
  unsafe_cast,
  type CoordinateKey,
  type Coordinates,
} from "type_primitives";
import type { StoreFactory } from "store";
import type { ValueHandle } from "./value_handle";
import type { IndexChainProxy } from "./index_chain";
import type { CellCursor } from "./cell_cursor";

type CellOf<C, V> = C extends readonly number[] ? readonly [...C, V] : never;

export type Cell<N extends number, V> = CellOf<Coordinates<N>, V>;

export type CellState<V> =
  | { readonly kind: "present"; readonly value: V }
  | { readonly kind: "empty" };

export interface MatrixOptions<V, N extends number> {
  /** Number of coordinate components per cell. */
  dimensions: N;
  /** Value every unassigned cell reads as. Never stored. */
  default_value: V;
  /** Creates the owned backing store. Defaults to an OrderedStore. */
  store?: StoreFactory<V>;
  /** Value equality used for the erase-on-default rule. Defaults to SameValueZero. */
  equals?: (a: V, b: V) => boolean;
}

export interface ReadonlyValueHandle<V, N extends number = number> {
  readonly coordinates: CoordinateKey<N>;
  readonly value: V;
  get(): V;
  peek(): CellState<V>;
  equals(other: V): boolean;
  copy(): ReadonlyValueHandle<V, N>;
  valueOf(): V;
  toString(): string;
}

export interface ReadonlyIndexChain<V, N extends number, P extends number[]> {
  readonly prefix: Readonly<P>;
  readonly remaining: number;
  index(next: number): ReadonlyIndexStep<V, N, P>;
}

export type IndexStep<V, N extends number, P extends number[]> =
  [...P, number]["length"] extends N
    ? ValueHandle<V, N>
    : IndexChainProxy<V, N, [...P, number]>;

export type ReadonlyIndexStep<V, N extends number, P extends number[]> =
  [...P, number]["length"] extends N
    ? ReadonlyValueHandle<V, N>
    : ReadonlyIndexChain<V, N, [...P, number]>;

/** Everything a SparseMatrix offers except writes. */
export interface ReadonlySparseMatrix<V, N extends number = number>
  extends Iterable<Cell<N, V>> {
  readonly dimensions: N;
  readonly default_value: V;
  readonly size: number;
  readonly empty: boolean;
  index(i: number): ReadonlyIndexStep<V, N, []>;
  at(...coords: Coordinates<N>): ReadonlyValueHandle<V, N>;
  get_or_default(...coords: Coordinates<N>): V;
  has(...coords: Coordinates<N>): boolean;
  values_equal(a: V, b: V): boolean;
  begin(): CellCursor<V, N>;
  end(): CellCursor<V, N>;
  cbegin(): CellCursor<V, N>;
  cend(): CellCursor<V, N>;
  cells(): IterableIterator<Cell<N, V>>;
  for_each(fn: (value: V, coordinates: CoordinateKey<N>) => void): void;
}

export function make_cell<V, N extends number>(
  key: readonly number[],
  value: V,
): Cell<N, V> {
  return unsafe_cast<Cell<N, V>>(Object.freeze([...key, value]));
}
