import fs from "node:fs";
import path from "node:path";

/**
 * Find repo root by walking upward from `startDir` until `requiredRelativePath` exists.
 *
 * In npm workspaces, process.cwd() may be either the repo root or a workspace dir,
 * while config/report/*.json lives at the repo root.
 *
 * Contract:
 * - Returns an absolute directory path.
 * - Throws if the root cannot be found within `maxHops`.
 */
export function findRepoRoot(startDir: string, requiredRelativePath: string, maxHops = 8): string {
  let cur = path.resolve(startDir);

  for (let hop = 0; hop <= maxHops; hop++) {
    const probe = path.join(cur, requiredRelativePath);
    if (fs.existsSync(probe)) return cur;

    const parent = path.dirname(cur);
    if (parent === cur) break; // reached filesystem root
    cur = parent;
  }

  throw new Error(`Cannot locate repo root from ${startDir}; missing ${requiredRelativePath}`);
}
