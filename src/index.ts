// Collection
export {
  Collection,
  ADD_POLICY,
  type CollectionOptions,
  type Predicate,
} from "./collection/collection";

// Indexed view
export { indexed, type IndexedCollection } from "./collection/indexed";

// Comparison
export {
  compare_regular,
  strict_equals,
  type Comparator,
} from "./utils/compare";

// Errors
export {
  AppError,
  CollectionError,
  COLLECTION_ERROR,
  is_collection_error,
} from "./utils/error";
export { TypeError, TYPE_ERROR } from "./type_primitives/error";

// Keys
export type { ArrayKey } from "./type_primitives/assertions";
