#!/usr/bin/env node

import path from "node:path";
import { Command } from "commander";
import { validateAll } from "./commands/validate.js";
import { render } from "./commands/render.js";
import { fetchSource } from "./commands/fetch.js";
import { build } from "./commands/build.js";
import { status, listRuns } from "./commands/status.js";
import { listArtifacts } from "./commands/artifacts.js";
import { loadRecipe } from "./commands/load-recipe.js";
import { EXIT, exitCodeForErrors } from "./commands/exit-codes.js";
import { diag, type Diagnostic } from "./types/diagnostic.js";

type Format = "human" | "jsonl";

type CommonOpts = { config: string; env?: string; format: Format };

function writeLine(value: unknown): void {
  process.stdout.write(JSON.stringify(value) + "\n");
}

function report(format: Format, diagnostics: Diagnostic[]): void {
  for (const d of diagnostics) {
    if (format === "jsonl") writeLine(d);
    else if (d.level === "error") console.error(d.message);
    else console.error(`${d.level}: ${d.message}`);
  }
}

function fail(format: Format, errors: Diagnostic[], exitCode: number): never {
  report(format, errors);
  process.exit(exitCode);
}

/** Runs directory for status/artifacts: explicit flag, else the recipe's runs_dir. */
function runsDirFor(opts: CommonOpts & { runsRoot?: string }): string {
  if (opts.runsRoot) return path.resolve(process.cwd(), opts.runsRoot);
  const loaded = loadRecipe({ configDir: opts.config, env: opts.env });
  if (!loaded.ok) fail(opts.format, loaded.errors, EXIT.INVALID_CONFIG);
  return path.resolve(process.cwd(), loaded.recipe.runs_dir);
}

function withCommon(cmd: Command): Command {
  return cmd
    .option("--config <path>", "Path to config directory", "config")
    .option("--env <name>", "Config overlay: loads <config>/<name>.yaml over base.yaml")
    .option("--format <format>", "Output format: human|jsonl", "human");
}

const program = new Command();

program
  .name("imagesmith")
  .description("Plan, render and build two-stage runtime images for a service binary")
  .version("0.1.0");

withCommon(program.command("validate"))
  .description("Validate the recipe and the plan invariants")
  .option("--platform <platform>", "Target platform (os/arch[/variant])")
  .action((opts: CommonOpts & { platform?: string }) => {
    const res = validateAll({ configDir: opts.config, env: opts.env, platform: opts.platform });
    if (!res.ok) fail(opts.format, res.errors, exitCodeForErrors(res.errors));

    report(opts.format, res.warnings);
    if (opts.format === "jsonl") writeLine({ level: "info", code: "OK", message: "OK" });
    else console.log("OK");
  });

withCommon(program.command("plan"))
  .description("Print the build plan as JSON")
  .option("--platform <platform>", "Target platform (os/arch[/variant])")
  .option("--tag <tag>", "Image tag")
  .option("--commit <sha>", "Pin the source fetch to a commit")
  .action((opts: CommonOpts & { platform?: string; tag?: string; commit?: string }) => {
    const res = render({ configDir: opts.config, env: opts.env, platform: opts.platform, tag: opts.tag, commit: opts.commit });
    if (!res.ok) fail(opts.format, res.errors, exitCodeForErrors(res.errors));

    if (opts.format === "jsonl") writeLine(res.plan);
    else console.log(JSON.stringify(res.plan, null, 2));
  });

withCommon(program.command("render"))
  .description("Render the Dockerfile for the pipeline")
  .option("--platform <platform>", "Target platform (os/arch[/variant])")
  .option("--commit <sha>", "Pin the source fetch to a commit")
  .option("--out <path>", "Write the Dockerfile here instead of stdout")
  .action((opts: CommonOpts & { platform?: string; commit?: string; out?: string }) => {
    const res = render({ configDir: opts.config, env: opts.env, platform: opts.platform, commit: opts.commit, out: opts.out });
    if (!res.ok) fail(opts.format, res.errors, exitCodeForErrors(res.errors));

    report(opts.format, res.warnings);
    if (res.writtenTo) {
      if (opts.format === "jsonl") writeLine({ level: "info", code: "RENDERED", message: "Wrote Dockerfile", path: res.writtenTo });
      else console.log(res.writtenTo);
    } else {
      process.stdout.write(res.dockerfile);
    }
  });

withCommon(program.command("fetch"))
  .description("Partially clone the source subdirectory and check its sparse scope")
  .argument("<dest>", "Directory to clone into")
  .action(async (dest: string, opts: CommonOpts) => {
    const res = await fetchSource({ configDir: opts.config, env: opts.env, dest });
    if (!res.ok) fail(opts.format, res.errors, EXIT.BUILD_FAILED);

    if (opts.format === "jsonl") writeLine({ level: "info", code: "FETCHED", path: res.projectDir, commit: res.commit });
    else console.log(`${res.projectDir} @ ${res.commit}`);
  });

withCommon(program.command("build"))
  .description("Build the builder stage, then the runtime image, then verify it")
  .option("--platform <platform>", "Target platform (os/arch[/variant])")
  .option("--tag <tag>", "Image tag")
  .option("--runs-root <path>", "Runs directory (default: runs_dir from config)")
  .action(async (opts: CommonOpts & { platform?: string; tag?: string; runsRoot?: string }) => {
    const res = await build({
      configDir: opts.config,
      env: opts.env,
      platform: opts.platform,
      tag: opts.tag,
      runsRoot: opts.runsRoot,
      onEvent: (event) => report(opts.format, [event]),
    });
    if (!res.ok) fail(opts.format, res.errors, res.exitCode);

    const { result } = res;
    if (opts.format === "jsonl") {
      writeLine({ level: "info", code: "OK", runId: result.run_id, imageId: result.image_id, runDir: result.run_dir });
    } else {
      console.log(`Run ${result.run_id}: ${result.final_status} (${result.image_id ?? "no image id"})`);
    }
  });

withCommon(program.command("status"))
  .description("Show build run status")
  .argument("[id]", "Run ID (omit to list all)")
  .option("--runs-root <path>", "Runs directory (default: runs_dir from config)")
  .action((id: string | undefined, opts: CommonOpts & { runsRoot?: string }) => {
    const runsDir = runsDirFor(opts);
    if (id) {
      const res = status({ runsDir, runId: id });
      if (!res.ok) fail(opts.format, [{ level: "error", code: "RUN_NOT_FOUND", message: res.error }], EXIT.INVALID_ARGS);
      if (opts.format === "jsonl") writeLine(res.state);
      else console.log(JSON.stringify(res.state, null, 2));
      return;
    }

    const list = listRuns(runsDir);
    if (opts.format === "jsonl") {
      for (const item of list) writeLine(item);
    } else if (list.length === 0) {
      console.log("No build runs found.");
    } else {
      for (const item of list) console.log(`${item.id}  ${item.status}  ${item.platform}  ${item.updated_at}`);
    }
  });

withCommon(program.command("artifacts"))
  .description("List the files of a build run and check them against its manifest")
  .argument("<id>", "Run ID")
  .option("--runs-root <path>", "Runs directory (default: runs_dir from config)")
  .action((id: string, opts: CommonOpts & { runsRoot?: string }) => {
    const res = listArtifacts({ runsDir: runsDirFor(opts), runId: id });
    if (!res.ok) fail(opts.format, [{ level: "error", code: "RUN_NOT_FOUND", message: res.error }], EXIT.INVALID_ARGS);

    if (opts.format === "jsonl") {
      for (const f of res.files) writeLine(f);
    } else {
      for (const f of res.files) {
        const mark = f.intact === null ? "" : f.intact ? "  ok" : "  MODIFIED";
        console.log(`${f.path}  ${f.size} bytes${mark}`);
      }
    }
    report(
      opts.format,
      res.missing.map((p) => diag("warn", "ARTIFACT_MISSING", `Manifest does not list ${p}`, { path: p })),
    );
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
