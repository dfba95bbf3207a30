// Integer domain
export { U64_MAX, I64_MIN, I64_MAX, asU64, asI64 } from "./int.js";

// Categories
export {
  Category,
  MARKERS,
  NEG_1BYTE_MIN,
  NEG_2BYTE_MIN,
  POS_1BYTE_MAX,
  POS_2BYTE_MAX,
  MAX_ENCODED_LENGTH,
} from "./category.js";
