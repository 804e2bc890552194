import fs from "node:fs";
import path from "node:path";
import type { BuildRunState } from "../core/orchestrator.js";
import { sanitizePathComponent } from "../core/security.js";

export type StatusResult =
  | { ok: true; state: BuildRunState }
  | { ok: false; error: string };

/**
 * Read the state of one build run.
 */
export function status(opts: { runsDir: string; runId: string }): StatusResult {
  let runId: string;
  try {
    runId = sanitizePathComponent(opts.runId);
  } catch (e: unknown) {
    return { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
  const statePath = path.join(opts.runsDir, runId, "state.json");

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No build run found: ${runId}` };
  }

  try {
    const raw = fs.readFileSync(statePath, "utf8");
    const state = JSON.parse(raw) as BuildRunState;
    return { ok: true, state };
  } catch (e: unknown) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

export type RunSummary = { id: string; status: string; platform: string; updated_at: string };

function field(value: unknown, key: string): string {
  if (typeof value !== "object" || value === null || !(key in value)) return "";
  const v: unknown = Reflect.get(value, key);
  return typeof v === "string" ? v : "";
}

/**
 * List all build runs, most recently updated first.
 */
export function listRuns(runsDir: string): RunSummary[] {
  if (!fs.existsSync(runsDir)) return [];

  const entries = fs.readdirSync(runsDir, { withFileTypes: true });
  const results: RunSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const statePath = path.join(runsDir, entry.name, "state.json");
    if (!fs.existsSync(statePath)) continue;

    try {
      const state: unknown = JSON.parse(fs.readFileSync(statePath, "utf8"));
      results.push({
        id: entry.name,
        status: field(state, "current_step") || "unknown",
        platform: field(state, "platform"),
        updated_at: field(state, "updated_at"),
      });
    } catch {
      results.push({ id: entry.name, status: "corrupted", platform: "", updated_at: "" });
    }
  }

  return results.sort((a, b) => b.updated_at.localeCompare(a.updated_at));
}
