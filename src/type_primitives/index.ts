export { TypeError, TYPE_ERROR } from "./error";
export {
  is_array_key,
  is_safe_integer,
  unsafe_cast,
  validate,
  type ArrayKey,
} from "./assertions";
