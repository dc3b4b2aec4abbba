/***
 * Demo — Two diagonals in a 10×10 hash-backed matrix.
 *
 * Fills the main diagonal with its column index and the anti-diagonal
 * with its column index, default 0, then renders the inner 8×8 block,
 * the stored-cell count and every stored cell as "x y value".
 * (0, 0) and (9, 0) receive the default and are never stored.
 *
 ***/

import { SparseMatrix } from "matrix";
import { HashStore } from "store";

const N = 10;
const HASH_CAPACITY = 32;

export function render_demo(): string[] {
  const m = new SparseMatrix<number, 2>({
    dimensions: 2,
    default_value: 0,
    store: () => new HashStore<number>(HASH_CAPACITY),
  });

  for (let i = 0; i < N; i++) {
    m.index(i).index(i).value = i;
  }
  for (let row = 0, col = N - 1; row < N; row++, col--) {
    m.index(row).index(col).value = col;
  }

  const lines: string[] = [];
  for (let row = 1; row <= N - 2; row++) {
    const cols: number[] = [];
    for (let col = 1; col <= N - 2; col++) cols.push(m.index(row).index(col).get());
    lines.push(cols.join(" "));
  }

  lines.push(String(m.size));

  for (const [x, y, value] of m) {
    lines.push(`${x} ${y} ${value}`);
  }
  return lines;
}
