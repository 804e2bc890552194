import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { validateConfig } from "../config/validator.js";
import { resolvePlatform, type TargetPlatform } from "../platform/platform.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import type { RecipeConfig } from "../types/recipe.js";

export type RecipeOptions = {
  configDir: string;
  env?: string;
};

export type RecipeResult = { ok: true; recipe: RecipeConfig } | { ok: false; errors: Diagnostic[] };

/** Load and validate the layered recipe config from a directory relative to cwd. */
export function loadRecipe(opts: RecipeOptions): RecipeResult {
  const configPath = path.resolve(process.cwd(), opts.configDir);
  if (!fs.existsSync(configPath) || !fs.statSync(configPath).isDirectory()) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configPath}`)] };
  }

  let tree: Record<string, unknown>;
  try {
    tree = loadConfig(opts.env, configPath);
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, errors: [diag("error", "CONFIG_PARSE", message, { path: configPath })] };
  }

  const res = validateConfig(tree);
  if (!res.valid) {
    return { ok: false, errors: [diag("error", "CONFIG_INVALID", res.errors, { path: configPath })] };
  }
  return { ok: true, recipe: res.config };
}

export type PlatformResult = { ok: true; platform: TargetPlatform } | { ok: false; error: Diagnostic };

/** Resolve the target platform from a CLI flag, the recipe, TARGETPLATFORM or the host. */
export function pickPlatform(recipe: RecipeConfig, cli?: string): PlatformResult {
  try {
    return { ok: true, platform: resolvePlatform({ cli, config: recipe.platform }) };
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: diag("error", "PLATFORM_INVALID", message) };
  }
}
