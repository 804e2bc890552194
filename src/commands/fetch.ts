import path from "node:path";
import { FetchError, SourceFetcher, type FetchedSource } from "../source/fetcher.js";
import { verifySparseScope } from "../source/sparse-scope.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";
import { loadRecipe, type RecipeOptions } from "./load-recipe.js";

export type FetchResult =
  | { ok: true; path: string; projectDir: string; commit: string }
  | { ok: false; errors: Diagnostic[] };

/**
 * Materialize the partial checkout locally, the same way the builder stage
 * does, and check that nothing outside the subdirectory was checked out.
 */
export async function fetchSource(
  opts: RecipeOptions & { dest: string; fetcher?: SourceFetcher },
): Promise<FetchResult> {
  const loaded = loadRecipe(opts);
  if (!loaded.ok) return loaded;
  const { source } = loaded.recipe;

  const fetcher = opts.fetcher ?? new SourceFetcher();
  let fetched: FetchedSource;
  try {
    fetched = await fetcher.fetch(source, path.resolve(process.cwd(), opts.dest));
  } catch (e: unknown) {
    if (e instanceof FetchError) return { ok: false, errors: [diag("error", "FETCH_FAILED", e.message)] };
    throw e;
  }

  const scope = verifySparseScope(fetched.path, source.subdirectory);
  if (!scope.ok) {
    return {
      ok: false,
      errors: [
        diag("error", "SPARSE_SCOPE", `Checkout contains directories outside '${source.subdirectory}': ${scope.outside.join(", ")}`, {
          path: fetched.path,
          details: { outside: scope.outside },
        }),
      ],
    };
  }

  return { ok: true, path: fetched.path, projectDir: fetched.projectDir, commit: fetched.commit };
}
