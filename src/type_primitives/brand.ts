/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops
 * structurally identical types from being assigned to each other.
 *
 * Example: a CoordinateKey<2> is a frozen two-element number array at
 * runtime, but a bare array literal cannot be passed where a
 * CoordinateKey<2> is expected without going through as_coordinate_key.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
