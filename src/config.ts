/** Byte order used by the codec. */
export type Endianness = "little" | "big";

export const DEFAULT_ENDIANNESS: Endianness = "little";

export function isEndianness(value: string): value is Endianness {
  return value === "little" || value === "big";
}
