import fs from "node:fs";
import path from "node:path";
import { checkPlan, createPlan, planRecord, renderPlan } from "../pipeline/plan.js";
import { isCommitSha } from "../source/repository.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { loadRecipe, pickPlatform, type RecipeOptions } from "./load-recipe.js";

export type RenderOptions = RecipeOptions & {
  platform?: string;
  tag?: string;
  /** Pin the fetch to this commit (used when source.pin is set). */
  commit?: string;
};

export type RenderResult =
  | { ok: true; dockerfile: string; plan: Record<string, unknown>; warnings: Diagnostic[]; writtenTo?: string }
  | { ok: false; errors: Diagnostic[] };

/** Build the plan without running anything and render it. */
export function render(opts: RenderOptions & { out?: string }): RenderResult {
  const loaded = loadRecipe(opts);
  if (!loaded.ok) return loaded;

  const platform = pickPlatform(loaded.recipe, opts.platform);
  if (!platform.ok) return { ok: false, errors: [platform.error] };

  if (opts.commit !== undefined && !isCommitSha(opts.commit)) {
    return { ok: false, errors: [diag("error", "COMMIT_INVALID", `Not a commit SHA: ${opts.commit}`)] };
  }

  const plan = createPlan(loaded.recipe, { platform: platform.platform, tag: opts.tag, sourceCommit: opts.commit });
  const diagnostics = checkPlan(plan);
  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) return { ok: false, errors };

  const dockerfile = renderPlan(plan);
  let writtenTo: string | undefined;
  if (opts.out) {
    writtenTo = path.resolve(process.cwd(), opts.out);
    fs.mkdirSync(path.dirname(writtenTo), { recursive: true });
    fs.writeFileSync(writtenTo, dockerfile, "utf8");
  }

  return { ok: true, dockerfile, plan: planRecord(plan), warnings: diagnostics.filter((d) => d.level !== "error"), writtenTo };
}
