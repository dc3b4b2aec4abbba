import { describe, expect, it } from "vitest";
import { AppError, MatrixError, MATRIX_ERROR, is_matrix_error } from "../error";

describe("MatrixError", () => {
  //=========================================================
  // Construction & properties
  //=========================================================

  it("stores the category", () => {
    const err = new MatrixError(MATRIX_ERROR.ARITY_MISMATCH);
    expect(err.category).toBe(MATRIX_ERROR.ARITY_MISMATCH);
  });

  it("uses category as default message when message is omitted", () => {
    const err = new MatrixError(MATRIX_ERROR.INVALID_COORDINATE);
    expect(err.message).toBe("INVALID_COORDINATE");
  });

  it("uses provided message when given", () => {
    const err = new MatrixError(
      MATRIX_ERROR.INVALID_DIMENSIONS,
      "dimensions must be positive",
    );
    expect(err.message).toBe("dimensions must be positive");
  });

  it("is always operational", () => {
    const err = new MatrixError(MATRIX_ERROR.CURSOR_OUT_OF_RANGE);
    expect(err.is_operational).toBe(true);
  });

  it("context is undefined when not provided", () => {
    const err = new MatrixError(MATRIX_ERROR.STORE_NOT_EMPTY);
    expect(err.context).toBeUndefined();
  });

  it("stores provided context", () => {
    const err = new MatrixError(MATRIX_ERROR.ARITY_MISMATCH, "arity", {
      expected: 3,
      actual: 2,
    });
    expect(err.context).toEqual({ expected: 3, actual: 2 });
  });

  it("sets name to MatrixError", () => {
    const err = new MatrixError(MATRIX_ERROR.ARITY_MISMATCH);
    expect(err.name).toBe("MatrixError");
  });

  //=========================================================
  // Inheritance
  //=========================================================

  it("is an instance of AppError and Error", () => {
    const err = new MatrixError(MATRIX_ERROR.STORE_NOT_EMPTY);
    expect(err).toBeInstanceOf(AppError);
    expect(err).toBeInstanceOf(Error);
  });

  it("all MATRIX_ERROR enum members are distinct strings", () => {
    const values = Object.values(MATRIX_ERROR);
    expect(new Set(values).size).toBe(values.length);
  });

  //=========================================================
  // is_matrix_error guard
  //=========================================================

  it("is_matrix_error returns true for MatrixError instances", () => {
    expect(is_matrix_error(new MatrixError(MATRIX_ERROR.ARITY_MISMATCH))).toBe(true);
  });

  it("is_matrix_error returns false for plain Error and non-errors", () => {
    expect(is_matrix_error(new Error("plain"))).toBe(false);
    expect(is_matrix_error(null)).toBe(false);
    expect(is_matrix_error(undefined)).toBe(false);
    expect(is_matrix_error("ARITY_MISMATCH")).toBe(false);
    expect(is_matrix_error({ category: MATRIX_ERROR.ARITY_MISMATCH })).toBe(false);
  });
});
