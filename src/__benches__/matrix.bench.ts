import { bench, describe } from "vitest";
import { SparseMatrix } from "../matrix";
import { HashStore, OrderedStore, type StoreFactory } from "../store";

//=========================================================
// Helpers
//=========================================================

function xorshift32(seed: number) {
  let state = seed;
  return () => {
    state ^= state << 13;
    state ^= state >> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}

const SIDE = 1_000;
const CELLS = 10_000;

const factories: [string, StoreFactory<number>][] = [
  ["hash", () => new HashStore<number>(CELLS)],
  ["ordered", () => new OrderedStore<number>()],
];

function filled(store: StoreFactory<number>): SparseMatrix<number, 2> {
  const rand = xorshift32(0xdecaf);
  const m = new SparseMatrix<number, 2>({ dimensions: 2, default_value: 0, store });
  for (let i = 0; i < CELLS; i++) {
    m.at((rand() * SIDE) | 0, (rand() * SIDE) | 0).assign(i + 1);
  }
  return m;
}

//=========================================================
// Writes
//=========================================================

describe("assign 10k random cells", () => {
  for (const [name, store] of factories) {
    bench(name, () => {
      filled(store);
    });
  }
});

//=========================================================
// Reads
//=========================================================

describe("read 10k random cells (hits and misses)", () => {
  for (const [name, store] of factories) {
    const m = filled(store);
    const rand = xorshift32(0xbeef);
    bench(name, () => {
      let sum = 0;
      for (let i = 0; i < CELLS; i++) {
        sum += m.get_or_default((rand() * SIDE) | 0, (rand() * SIDE) | 0);
      }
      if (sum < 0) throw new Error("unreachable");
    });
  }
});

describe("chained index vs at", () => {
  const m = filled(factories[0][1]);
  bench("at", () => {
    for (let i = 0; i < 1_000; i++) m.at(i, i).get();
  });
  bench("index chain", () => {
    for (let i = 0; i < 1_000; i++) m.index(i).index(i).get();
  });
});

//=========================================================
// Iteration
//=========================================================

describe("iterate all stored cells", () => {
  for (const [name, store] of factories) {
    const m = filled(store);
    bench(`${name} for..of`, () => {
      let n = 0;
      for (const cell of m) n += cell[2];
      if (n < 0) throw new Error("unreachable");
    });
    bench(`${name} cursor`, () => {
      let n = 0;
      const end = m.end();
      for (const c = m.begin(); !c.equals(end); c.next()) n += c.value;
      if (n < 0) throw new Error("unreachable");
    });
  }
});
