// Matrix
export {
  SparseMatrix,
  ValueHandle,
  IndexChainProxy,
  CellCursor,
  same_value_zero,
  type Cell,
  type CellState,
  type IndexStep,
  type MatrixOptions,
  type ReadonlyIndexChain,
  type ReadonlyIndexStep,
  type ReadonlySparseMatrix,
  type ReadonlyValueHandle,
} from "./matrix";

// Backing stores
export {
  HashStore,
  OrderedStore,
  type BackingStore,
  type StoreFactory,
} from "./store";

// Coordinates
export {
  as_coordinate_key,
  coordinates_equal,
  compare_coordinates,
  hash_coordinates,
  format_coordinates,
  type TupleOf,
  type Coordinates,
  type CoordinateKey,
} from "./type_primitives";

// Errors
export {
  AppError,
  MatrixError,
  MATRIX_ERROR,
  is_matrix_error,
} from "./utils/error";

// Demo
export { render_demo } from "./demo";
