/**
 * Binary search over a sorted array. Returns the index of the match, or
 * `-(insertion_point + 1)` when absent.
 */
export function binary_search<T, K>(
  arr: readonly T[],
  key: K,
  compare: (item: T, key: K) => number,
): number {
  let lo = 0;
  let hi = arr.length - 1;
  while (lo <= hi) {
    const mid = (lo + hi) >>> 1;
    const c = compare(arr[mid], key);
    if (c < 0) lo = mid + 1;
    else if (c > 0) hi = mid - 1;
    else return mid;
  }
  return -(lo + 1);
}
