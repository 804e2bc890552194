import fs from "node:fs";
import path from "node:path";

export type SparseScopeResult = {
  ok: boolean;
  /** Directories materialized outside the declared subdirectory, relative to the checkout. */
  outside: string[];
};

/**
 * Check that a checkout holds no directories besides the declared
 * subdirectory. Walks each parent of the subdirectory; files at those levels
 * are allowed because cone-mode sparse checkout always includes them.
 */
export function verifySparseScope(checkoutDir: string, subdirectory: string): SparseScopeResult {
  const segments = subdirectory.split("/").filter((s) => s.length > 0 && s !== ".");
  const outside: string[] = [];

  let level = "";
  for (const segment of segments) {
    const dir = path.join(checkoutDir, level);
    if (!fs.existsSync(dir)) break;
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      if (!entry.isDirectory()) continue;
      if (level === "" && entry.name === ".git") continue;
      if (entry.name === segment) continue;
      outside.push(path.posix.join(level, entry.name));
    }
    level = path.posix.join(level, segment);
  }

  return { ok: outside.length === 0, outside: outside.sort() };
}
