import { describe, expect, it } from "vitest";
import { SparseMatrix, same_value_zero } from "../matrix";
import { HashStore, OrderedStore } from "store";
import { MatrixError, MATRIX_ERROR } from "utils/error";

const DEFAULT_VALUE = 42;

const make_matrix = () =>
  new SparseMatrix<number, 2>({ dimensions: 2, default_value: DEFAULT_VALUE });

describe("SparseMatrix", () => {
  //=========================================================
  // Construction
  //=========================================================

  it("is empty by default", () => {
    const m = make_matrix();
    expect(m.size).toBe(0);
    expect(m.empty).toBe(true);
    expect(m.dimensions).toBe(2);
    expect(m.default_value).toBe(DEFAULT_VALUE);
  });

  it("rejects non-positive or fractional dimensions", () => {
    for (const dimensions of [0, -1, 1.5]) {
      try {
        new SparseMatrix({ dimensions, default_value: 0 });
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(MatrixError);
        expect((e as MatrixError).category).toBe(
          MATRIX_ERROR.INVALID_DIMENSIONS,
        );
      }
    }
  });

  it("rejects a store factory that hands back a populated store", () => {
    const shared = new OrderedStore<number>();
    const first = new SparseMatrix<number, 1>({
      dimensions: 1,
      default_value: 0,
      store: () => shared,
    });
    first.at(0).assign(1);
    expect(
      () =>
        new SparseMatrix<number, 1>({
          dimensions: 1,
          default_value: 0,
          store: () => shared,
        }),
    ).toThrow("Store factory must return an empty store, got 1 entries");
  });

  //=========================================================
  // Default-read / round-trip / erase-on-default
  //=========================================================

  it("reads the default for any unassigned cell without storing it", () => {
    const m = make_matrix();
    expect(m.get_or_default(0, 0)).toBe(DEFAULT_VALUE);
    expect(m.at(1_000_000, 7).get()).toBe(DEFAULT_VALUE);
    expect(m.index(3).index(4).get()).toBe(DEFAULT_VALUE);
    expect(m.size).toBe(0);
  });

  it("round-trips a non-default value and counts it once", () => {
    const m = make_matrix();
    m.at(2, 3).assign(7);
    expect(m.get_or_default(2, 3)).toBe(7);
    expect(m.size).toBe(1);
    m.at(2, 3).assign(8);
    expect(m.get_or_default(2, 3)).toBe(8);
    expect(m.size).toBe(1);
  });

  it("assigning the default erases a stored cell", () => {
    const m = make_matrix();
    m.at(0, 0).assign(1);
    m.at(0, 1).assign(2);
    expect(m.size).toBe(2);
    m.at(0, 0).assign(DEFAULT_VALUE);
    expect(m.size).toBe(1);
    expect(m.has(0, 0)).toBe(false);
    expect(m.get_or_default(0, 0)).toBe(DEFAULT_VALUE);
  });

  it("assigning the default to an absent cell changes nothing", () => {
    const m = make_matrix();
    m.at(5, 5).assign(DEFAULT_VALUE);
    expect(m.size).toBe(0);
  });

  it("matrix-level assign follows the same rule", () => {
    const m = make_matrix();
    m.assign(9, 1, 1);
    expect(m.get_or_default(1, 1)).toBe(9);
    m.assign(DEFAULT_VALUE, 1, 1);
    expect(m.size).toBe(0);
  });

  it("scenario: assign, read through a second handle, assign default", () => {
    const m = make_matrix();
    m.index(0).index(0).value = 1;
    expect(m.size).toBe(1);
    expect(m.index(0).index(0).get()).toBe(1);
    m.index(0).index(0).value = DEFAULT_VALUE;
    expect(m.size).toBe(0);
    expect(m.index(0).index(0).get()).toBe(DEFAULT_VALUE);
  });

  //=========================================================
  // Low-level primitives
  //=========================================================

  it("set stores unconditionally, even the default", () => {
    const m = make_matrix();
    m.set(DEFAULT_VALUE, 4, 4);
    expect(m.size).toBe(1);
    expect(m.has(4, 4)).toBe(true);
  });

  it("erase reports whether a cell was removed", () => {
    const m = make_matrix();
    m.set(3, 1, 2);
    expect(m.erase(1, 2)).toBe(true);
    expect(m.erase(1, 2)).toBe(false);
    expect(m.size).toBe(0);
  });

  it("clear removes every cell", () => {
    const m = make_matrix();
    m.assign(1, 0, 0);
    m.assign(2, 9, 9);
    m.clear();
    expect(m.empty).toBe(true);
    expect(m.get_or_default(9, 9)).toBe(DEFAULT_VALUE);
  });

  //=========================================================
  // Arity & coordinate validation
  //=========================================================

  it("rejects a coordinate with the wrong number of components at runtime", () => {
    const m = make_matrix();
    // untyped callers bypass the Coordinates<2> signature
    try {
      Reflect.apply(m.at, m, [1, 2, 3]);
      expect.unreachable();
    } catch (e) {
      expect((e as MatrixError).category).toBe(MATRIX_ERROR.ARITY_MISMATCH);
    }
    expect(() => Reflect.apply(m.get_or_default, m, [1])).toThrow(
      "Expected 2 coordinate component(s), got 1",
    );
    expect(() => Reflect.apply(m.erase, m, [1, 2, 3])).toThrow(MatrixError);
  });

  it("rejects negative and fractional components", () => {
    const m = make_matrix();
    expect(() => m.at(-1, 0)).toThrow(MatrixError);
    expect(() => m.assign(1, 0, 0.5)).toThrow(
      "Coordinate component 1 of (0, 0.5) must be a non-negative safe integer, got 0.5",
    );
    expect(m.size).toBe(0);
  });

  //=========================================================
  // Equality
  //=========================================================

  it("treats -0 as the default 0 and NaN as a NaN default", () => {
    const zero = new SparseMatrix<number, 1>({ dimensions: 1, default_value: 0 });
    zero.at(0).assign(-0);
    expect(zero.size).toBe(0);

    const nan = new SparseMatrix<number, 1>({ dimensions: 1, default_value: NaN });
    nan.at(0).assign(1);
    nan.at(0).assign(NaN);
    expect(nan.size).toBe(0);
  });

  it("uses a custom equality for the erase-on-default rule", () => {
    type Point = { x: number; y: number };
    const m = new SparseMatrix<Point, 2>({
      dimensions: 2,
      default_value: { x: 0, y: 0 },
      equals: (a, b) => a.x === b.x && a.y === b.y,
    });
    m.at(1, 1).assign({ x: 3, y: 4 });
    expect(m.size).toBe(1);
    m.at(1, 1).assign({ x: 0, y: 0 });
    expect(m.size).toBe(0);
    expect(m.values_equal({ x: 1, y: 1 }, { x: 1, y: 1 })).toBe(true);
  });

  it("same_value_zero", () => {
    expect(same_value_zero(0, -0)).toBe(true);
    expect(same_value_zero(NaN, NaN)).toBe(true);
    expect(same_value_zero(1, "1")).toBe(false);
    expect(same_value_zero({}, {})).toBe(false);
  });

  //=========================================================
  // Dimensional generality
  //=========================================================

  it("scenario: 3-D matrix via at, read through the chain", () => {
    const m = new SparseMatrix<number, 3>({ dimensions: 3, default_value: 0 });
    const cell = m.at(0, 1, 2);
    cell.assign(222);
    expect(m.at(0, 1, 2).get()).toBe(222);
    expect(m.index(0).index(1).index(2).get()).toBe(222);
    expect(m.size).toBe(1);
    cell.assign(0);
    expect(m.size).toBe(0);
  });

  it("chain and at agree for 2 and 3 dimensions", () => {
    const m2 = new SparseMatrix<number, 2>({ dimensions: 2, default_value: -1 });
    const m3 = new SparseMatrix<number, 3>({ dimensions: 3, default_value: -1 });
    for (let i = 0; i < 4; i++) {
      for (let j = 0; j < 4; j++) {
        if ((i + j) % 3 === 0) m2.index(i).index(j).value = i * 10 + j;
        for (let k = 0; k < 4; k++) {
          if ((i * j + k) % 5 === 0) m3.at(i, j, k).assign(i * 100 + j * 10 + k);
        }
      }
    }
    for (let i = 0; i < 4; i++) {
      for (let j = 0; j < 4; j++) {
        expect(m2.index(i).index(j).get()).toBe(m2.at(i, j).get());
        for (let k = 0; k < 4; k++) {
          expect(m3.index(i).index(j).index(k).get()).toBe(m3.get_or_default(i, j, k));
        }
      }
    }
  });

  it("1-D matrix index goes straight to a handle", () => {
    const m = new SparseMatrix<string, 1>({ dimensions: 1, default_value: "" });
    m.index(7).value = "seven";
    expect(m.at(7).get()).toBe("seven");
    expect(m.size).toBe(1);
  });

  it("addresses cells beyond 32-bit coordinates", () => {
    const m = new SparseMatrix<number, 2>({
      dimensions: 2,
      default_value: 0,
      store: () => new HashStore<number>(),
    });
    const far = 2 ** 40;
    m.at(far, 1).assign(5);
    expect(m.get_or_default(far, 1)).toBe(5);
    expect(m.get_or_default(0, 1)).toBe(0);
  });

  //=========================================================
  // Readonly view
  //=========================================================

  it("readonly view reads through to the same cells", () => {
    const m = make_matrix();
    m.at(0, 0).assign(3);
    const view = m.as_readonly();
    expect(view.at(0, 0).get()).toBe(3);
    expect(view.index(0).index(0).value).toBe(3);
    expect(view.index(1).index(1).get()).toBe(DEFAULT_VALUE);
    expect(view.size).toBe(1);
  });
});
