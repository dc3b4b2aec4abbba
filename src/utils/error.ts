export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum MATRIX_ERROR {
  ARITY_MISMATCH = "ARITY_MISMATCH",
  INVALID_COORDINATE = "INVALID_COORDINATE",
  INVALID_DIMENSIONS = "INVALID_DIMENSIONS",
  STORE_NOT_EMPTY = "STORE_NOT_EMPTY",
  CURSOR_OUT_OF_RANGE = "CURSOR_OUT_OF_RANGE",
}

export class MatrixError extends AppError {
  constructor(
    public readonly category: MATRIX_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_matrix_error(error: unknown): error is MatrixError {
  return error instanceof MatrixError;
}
