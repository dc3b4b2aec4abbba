/***
 * Coordinates — Fixed-arity cell addresses for N-dimensional matrices.
 *
 * A coordinate is a tuple of N non-negative safe integers. The tuple type
 * is built at the type level (TupleOf<number, N>), so a 3-dimensional
 * matrix only accepts three components and the compiler rejects any other
 * arity. At runtime the same contract is re-checked in dev builds for
 * callers that reach the API untyped.
 *
 * A CoordinateKey is a coordinate that has been validated, copied and
 * frozen; stores keep keys, never caller-owned arrays.
 *
 * Hashing is order-sensitive: each component is split into its low and
 * high 32-bit halves and folded in with a multiply-rotate round, then the
 * result is avalanched. (1, 2) and (2, 1) hash differently, and repeated
 * components do not cancel out.
 *
 *   hash  = seed ^ N
 *   hash  = round(hash, lo(c_i)); hash = round(hash, hi(c_i))   for each i
 *   hash  = finalize(hash)
 *
 ***/

import type { Brand } from "../brand";
import { is_coordinate_component, unsafe_cast } from "../assertions";
import { debug_matrix } from "utils/debug";
import { MATRIX_ERROR, MatrixError } from "utils/error";
import {
  HASH_GOLDEN_RATIO,
  MIX_C1,
  MIX_C2,
  MIX_ROUND_ADD,
  AVALANCHE_C1,
  AVALANCHE_C2,
  TWO_POW_32,
} from "utils/constants";

type BuildTuple<T, N extends number, Acc extends T[]> = Acc["length"] extends N
  ? Acc
  : BuildTuple<T, N, [...Acc, T]>;

/** Homogeneous tuple of length N. Falls back to T[] when N is not a literal. */
export type TupleOf<T, N extends number> = number extends N
  ? T[]
  : BuildTuple<T, N, []>;

export type Coordinates<N extends number> = TupleOf<number, N>;

/** Validated, frozen coordinate of length N, as kept by the stores. */
export type CoordinateKey<N extends number = number> = Brand<
  readonly number[],
  "coordinate_key"
> & { readonly length: N };

/**
 * Validate `coords` against `dimensions`, then copy and freeze them.
 * Throws ARITY_MISMATCH / INVALID_COORDINATE in dev builds.
 */
export function as_coordinate_key<N extends number>(
  coords: readonly number[],
  dimensions: N,
): CoordinateKey<N> {
  if (__DEV__) check_coordinates(coords, dimensions);
  return unsafe_cast<CoordinateKey<N>>(Object.freeze(coords.slice()));
}

export function check_coordinates(
  coords: readonly unknown[],
  dimensions: number,
): void {
  if (coords.length !== dimensions) {
    debug_matrix("arity mismatch: expected %d, got %d", dimensions, coords.length);
    throw new MatrixError(
      MATRIX_ERROR.ARITY_MISMATCH,
      `Expected ${dimensions} coordinate component(s), got ${coords.length}`,
      { expected: dimensions, actual: coords.length },
    );
  }
  for (let i = 0; i < coords.length; i++) {
    if (!is_coordinate_component(coords[i])) {
      debug_matrix("invalid coordinate component %d: %o", i, coords[i]);
      throw new MatrixError(
        MATRIX_ERROR.INVALID_COORDINATE,
        `Coordinate component ${i} of ${format_coordinates(coords)} must be a non-negative safe integer, got ${String(coords[i])}`,
        { dimension: i, value: coords[i] },
      );
    }
  }
}

export function coordinates_equal(
  a: readonly number[],
  b: readonly number[],
): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Lexicographic order in dimension order; shorter tuples sort first on a shared prefix. */
export function compare_coordinates(
  a: readonly number[],
  b: readonly number[],
): number {
  const len = a.length < b.length ? a.length : b.length;
  for (let i = 0; i < len; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
}

export function hash_coordinates(coords: readonly number[]): number {
  let h = HASH_GOLDEN_RATIO ^ coords.length;
  for (let i = 0; i < coords.length; i++) {
    const c = coords[i];
    const lo = c >>> 0;
    // exact for safe integers: c - lo is a multiple of 2^32
    const hi = ((c - lo) / TWO_POW_32) >>> 0;
    h = mix_round(h, lo);
    h = mix_round(h, hi);
  }
  return avalanche(h);
}

export function format_coordinates(coords: readonly unknown[]): string {
  return `(${coords.join(", ")})`;
}

//=========================================================
// Internal
//=========================================================

const rotl = (x: number, r: number): number => (x << r) | (x >>> (32 - r));

function mix_round(h: number, k: number): number {
  k = Math.imul(k, MIX_C1);
  k = rotl(k, 15);
  k = Math.imul(k, MIX_C2);
  h ^= k;
  h = rotl(h, 13);
  return (Math.imul(h, 5) + MIX_ROUND_ADD) | 0;
}

function avalanche(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, AVALANCHE_C1);
  h ^= h >>> 13;
  h = Math.imul(h, AVALANCHE_C2);
  h ^= h >>> 16;
  return h >>> 0;
}
