export {
  bitWidthOf,
  isPrimitiveName,
  isUnsignedInteger,
  lookupPrimitive,
  type NumericKind,
  type PrimitiveType,
  primitiveNames,
  usesBigInt,
} from "./catalog.ts";
