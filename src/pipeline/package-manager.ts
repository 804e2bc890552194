import type { PackageManager } from "../types/recipe.js";
import { quoteShellArg } from "../dockerfile/shell.js";

/** Shell commands that install packages without leaving package-manager caches behind. */
export function installCommands(manager: PackageManager, packages: string[]): string[] {
  const list = packages.map(quoteShellArg).join(" ");
  switch (manager) {
    case "apk":
      return [`apk add --no-cache ${list}`];
    case "apt":
      return [
        "apt-get update",
        `apt-get install -y --no-install-recommends ${list}`,
        "rm -rf /var/lib/apt/lists/*",
      ];
  }
}
