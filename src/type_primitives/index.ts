export type { Brand } from "./brand";
export {
  validate_and_cast,
  unsafe_cast,
  is_non_negative_integer,
  is_positive_integer,
  is_coordinate_component,
} from "./assertions";
export { TYPE_ERROR, TypeError } from "./error";
export {
  as_coordinate_key,
  check_coordinates,
  coordinates_equal,
  compare_coordinates,
  hash_coordinates,
  format_coordinates,
  type TupleOf,
  type Coordinates,
  type CoordinateKey,
} from "./coordinates/coordinates";
