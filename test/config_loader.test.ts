import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { applyEnvOverrides, deepMerge, loadConfig } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../config");

describe("config loader", () => {
  it("loads the base recipe", () => {
    const res = validateConfig(loadConfig(undefined, CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    if (!res.valid) return;
    expect(res.config.source.repository).toBe("https://github.com/cyb0124/CCRemote.git");
    expect(res.config.source.subdirectory).toBe("server");
    expect(res.config.runtime.port).toBe(1847);
    expect(res.config.builder.packages).toEqual(["git", "musl-dev", "openssl-dev", "pkgconfig", "build-base"]);
  });

  it("merges the env overlay over base", () => {
    const res = validateConfig(loadConfig("release", CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    if (!res.valid) return;
    expect(res.config.image.tag).toBe("cc-remote:release");
    expect(res.config.source.pin).toBe(true);
    // base fields still present
    expect(res.config.source.subdirectory).toBe("server");
  });

  it("returns base config when the overlay does not exist", () => {
    const res = validateConfig(loadConfig("nonexistent-env", CONFIG_DIR, {}));
    expect(res.valid).toBe(true);
    if (res.valid) expect(res.config.image.tag).toBe("cc-remote:latest");
  });

  it("applies nested environment variable overrides with YAML scalar types", () => {
    const tree = loadConfig(undefined, CONFIG_DIR, {
      IMAGESMITH_RUNTIME__PORT: "9000",
      IMAGESMITH_RUNTIME__TRUST_ROOTS: "false",
      IMAGESMITH_IMAGE__TAG: "svc:dev",
      UNRELATED: "x",
    });
    const res = validateConfig(tree);
    expect(res.valid).toBe(true);
    if (!res.valid) return;
    expect(res.config.runtime.port).toBe(9000);
    expect(res.config.runtime.trust_roots).toBe(false);
    expect(res.config.image.tag).toBe("svc:dev");
  });

  it("env vars override the overlay", () => {
    const res = validateConfig(loadConfig("release", CONFIG_DIR, { IMAGESMITH_IMAGE__TAG: "svc:override" }));
    expect(res.valid && res.config.image.tag).toBe("svc:override");
  });

  it("does not mutate its input when applying overrides", () => {
    const base = { runtime: { port: 1 } };
    applyEnvOverrides(base, { IMAGESMITH_RUNTIME__PORT: "2" });
    expect(base.runtime.port).toBe(1);
  });

  it("deepMerge replaces arrays instead of concatenating", () => {
    expect(deepMerge({ a: [1, 2], b: { c: 1, d: 2 } }, { a: [3], b: { d: 4 } })).toEqual({ a: [3], b: { c: 1, d: 4 } });
  });

  it("rejects a config file that is not a mapping", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "imagesmith-cfg-"));
    try {
      fs.writeFileSync(path.join(dir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfig(undefined, dir, {})).toThrow(/mapping/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("config validator", () => {
  const minimal = {
    image: { tag: "svc:1" },
    source: { repository: "https://example.com/org/svc.git", subdirectory: "svc" },
    builder: { base_image: "rust:alpine3.22", build_command: ["cargo", "build", "--release"], artifact: "target/release/svc" },
    runtime: { base_image: "alpine:3.22", port: 8080 },
  };

  it("fills defaults for omitted fields", () => {
    const res = validateConfig(minimal);
    expect(res.valid).toBe(true);
    if (!res.valid) return;
    expect(res.config.source.filter).toBe("blob:none");
    expect(res.config.builder.name).toBe("builder");
    expect(res.config.builder.workdir).toBe("/usr/src");
    expect(res.config.runtime.trust_roots).toBe(true);
    expect(res.config.runtime.protocol).toBe("tcp");
    expect(res.config.engine).toEqual({ command: "docker", timeout_seconds: 0 });
  });

  it("rejects a non-numeric port", () => {
    const res = validateConfig({ ...minimal, runtime: { base_image: "alpine:3.22", port: "http" } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/runtime/port must be integer");
  });

  it("rejects an out-of-range port", () => {
    const res = validateConfig({ ...minimal, runtime: { base_image: "alpine:3.22", port: 70000 } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/runtime/port must be <= 65535");
  });

  it("rejects a subdirectory that escapes the repository", () => {
    const res = validateConfig({ ...minimal, source: { repository: "https://example.com/r.git", subdirectory: "../etc" } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/source/subdirectory");
  });

  it("rejects paths that would split into several Dockerfile words", () => {
    const spaced = validateConfig({ ...minimal, source: { repository: "https://example.com/r.git", subdirectory: "my svc" } });
    expect(spaced.valid).toBe(false);
    expect(spaced.errors).toContain("config/source/subdirectory must match pattern");

    const artifact = validateConfig({ ...minimal, builder: { ...minimal.builder, artifact: "target/$PROFILE/svc" } });
    expect(artifact.errors).toContain("config/builder/artifact must match pattern");

    const install = validateConfig({ ...minimal, runtime: { ...minimal.runtime, install_path: "/usr/local/bin/my svc" } });
    expect(install.errors).toContain("config/runtime/install_path must match pattern");

    const workdir = validateConfig({ ...minimal, builder: { ...minimal.builder, workdir: "/usr/src\tx" } });
    expect(workdir.errors).toContain("config/builder/workdir must match pattern");
  });

  it("rejects a relative install path", () => {
    const res = validateConfig({ ...minimal, runtime: { base_image: "alpine:3.22", port: 1, install_path: "bin/svc" } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/runtime/install_path");
  });

  it("rejects a missing repository", () => {
    const res = validateConfig({ ...minimal, source: { subdirectory: "svc" } });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("must have required property 'repository'");
  });

  it("rejects a malformed platform", () => {
    const res = validateConfig({ ...minimal, platform: "amd64" });
    expect(res.valid).toBe(false);
    expect(res.errors).toContain("config/platform");
  });
});
