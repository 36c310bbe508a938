/**
 * Locate repository-level directories (`configs/`, `data/`) from the package
 * sources or their compiled output.
 */

import { existsSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

const MODULE_DIR = dirname(fileURLToPath(import.meta.url));

/** packages/routing/src -> repository root */
const REPO_ROOT_GUESS = resolve(MODULE_DIR, "..", "..", "..");

const MAX_DEPTH = 10;

/**
 * Walk up from `startDir` to the first ancestor that contains
 * `segments` as a directory. When none does, the path under the
 * repository root is returned as-is for the caller to report.
 */
export function findRepoDir(segments: string[], startDir: string = MODULE_DIR): string {
  let dir = startDir;
  for (let i = 0; i < MAX_DEPTH; i++) {
    const candidate = join(dir, ...segments);
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return join(REPO_ROOT_GUESS, ...segments);
}
