import type { SourceLocation } from "../errors/diagnostic.ts";

export interface LineColumn {
  line: number;
  column: number;
}

/** A header's text plus the line table used to turn offsets into locations. */
export class SourceFile {
  readonly filename: string;
  readonly content: string;
  private lineOffsets: number[];

  constructor(filename: string, content: string) {
    this.filename = filename;
    this.content = content;
    this.lineOffsets = this.computeLineOffsets();
  }

  private computeLineOffsets(): number[] {
    const offsets: number[] = [0];
    for (let idx = 0; idx < this.content.length; idx++) {
      const ch = this.content[idx];
      if (ch === "\n") {
        offsets.push(idx + 1);
      } else if (ch === "\r") {
        if (this.content[idx + 1] === "\n") idx++;
        offsets.push(idx + 1);
      }
    }
    return offsets;
  }

  lineCol(offset: number): LineColumn {
    let low = 0;
    let high = this.lineOffsets.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((this.lineOffsets[mid] ?? 0) <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return {
      line: low + 1,
      column: offset - (this.lineOffsets[low] ?? 0) + 1,
    };
  }

  locate(offset: number): SourceLocation {
    const { line, column } = this.lineCol(offset);
    return { file: this.filename, line, column, offset };
  }

  /** Text of a 1-based line without its terminator, or `null` past the end. */
  lineText(line: number): string | null {
    const start = this.lineOffsets[line - 1];
    if (start === undefined) return null;
    const next = this.lineOffsets[line];
    const raw = this.content.slice(start, next ?? this.content.length);
    return raw.replace(/\r?\n$|\r$/, "");
  }

  get length(): number {
    return this.content.length;
  }

  charAt(offset: number): string {
    return this.content[offset] ?? "";
  }
}
