export { SparseMatrix, same_value_zero } from "./matrix";
export { ValueHandle } from "./value_handle";
export { IndexChainProxy } from "./index_chain";
export { CellCursor } from "./cell_cursor";
export type {
  Cell,
  CellState,
  IndexStep,
  MatrixOptions,
  ReadonlyIndexChain,
  ReadonlyIndexStep,
  ReadonlySparseMatrix,
  ReadonlyValueHandle,
} from "./types";
