export { computeLayout, LayoutCalculator } from "./calculator.ts";
export {
  type BitField,
  type FieldLayout,
  isArrayField,
  type PrimitiveField,
  type StructField,
  type StructLayout,
} from "./types.ts";
