export { pack, unpack } from "./codec.ts";
export { integerRange } from "./scalars.ts";
export {
  type FieldValue,
  flattenInput,
  isStructInput,
  type Scalar,
  type StructInput,
  type StructValue,
} from "./values.ts";
