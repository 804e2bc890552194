import { checkPlan, createPlan } from "../pipeline/plan.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { loadRecipe, pickPlatform, type RecipeOptions } from "./load-recipe.js";

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/** Validate the recipe and the plan it produces for the target platform. */
export function validateAll(opts: RecipeOptions & { platform?: string }): ValidateResult {
  const loaded = loadRecipe(opts);
  if (!loaded.ok) return { ok: false, errors: loaded.errors };

  const platform = pickPlatform(loaded.recipe, opts.platform);
  if (!platform.ok) return { ok: false, errors: [platform.error] };

  const diagnostics = checkPlan(createPlan(loaded.recipe, { platform: platform.platform }));
  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, warnings: diagnostics.filter((d) => d.level !== "error") };
}
