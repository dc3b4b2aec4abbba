/***
 * Assertions — Dev-only runtime validation and branded casting.
 *
 * Checks are guarded by __DEV__ and tree-shaken in production builds.
 * validate_and_cast is the tool for creating branded values: it validates
 * the input in dev and returns it as the branded type. unsafe_cast
 * bypasses all checks (the caller guarantees validity).
 *
 ***/

import { TYPE_ERROR, TypeError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

/** A coordinate component: a non-negative integer that survives a round trip through a double. */
export const is_coordinate_component = (v: unknown): v is number =>
  typeof v === "number" && Number.isSafeInteger(v) && v >= 0;

export const is_positive_integer = (v: number): boolean =>
  Number.isInteger(v) && v > 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new TypeError(
      TYPE_ERROR.VALIDATION_FAIL_CONDITION,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
