import type { BaseNode } from "./base.ts";
import type { Declaration } from "./declarations.ts";

/** `#include "path"`; system includes (`<path>`) are not recorded. */
export interface IncludeDirective extends BaseNode {
  kind: "IncludeDirective";
  path: string;
}

/** Root node of one parsed header. */
export interface HeaderFile extends BaseNode {
  kind: "HeaderFile";
  filename: string;
  includes: IncludeDirective[];
  declarations: Declaration[];
}
