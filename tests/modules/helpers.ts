import { fileURLToPath } from "node:url";

/** Directory of sample headers shared by the file system tests. */
export const FIXTURE_DIR = fileURLToPath(new URL("../fixtures/headers", import.meta.url));
