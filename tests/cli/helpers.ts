import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { type CliOutput, main } from "../../src/cli/main.ts";

export interface CliRun {
  code: number;
  stdout: string[];
  stderr: string[];
}

export function run(...args: string[]): CliRun {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const out: CliOutput = {
    log: (text) => stdout.push(text),
    error: (text) => stderr.push(text),
  };
  const code = main(args, out);
  return { code, stdout, stderr };
}

/** A scratch directory; call `cleanup` when done. */
export function scratchDir(): { dir: string; write(name: string, data: string | Uint8Array): string; cleanup(): void } {
  const dir = mkdtempSync(join(tmpdir(), "cstruct-cli-"));
  return {
    dir,
    write(name, data) {
      const path = join(dir, name);
      writeFileSync(path, data);
      return path;
    },
    cleanup() {
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
