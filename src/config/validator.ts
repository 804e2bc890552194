import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { deepMerge, type ConfigTree } from "./loader.js";
import type { RecipeConfig } from "../types/recipe.js";

// Paths land unquoted in WORKDIR and COPY: no whitespace, quotes, backslashes or "$".
const PATH_CHARS = "[^\\s$\"'\\\\]";
const ABSOLUTE_PATH = `^/${PATH_CHARS}*$`;
// Relative, non-empty, and never climbing out with "..".
const CONTAINED_PATH = `^(?!/)(?!(.*/)?\\.\\.(/|$))${PATH_CHARS}+$`;
const PLATFORM = "^[a-z0-9]+/[a-z0-9_]+(/v[0-9]+)?$";

const stringList = { type: "array", items: { type: "string", minLength: 1 } } as const;
const packageManager = { type: "string", enum: ["apk", "apt"] } as const;

/** Recipe schema: every field required once defaults are applied. */
export const RECIPE_SCHEMA = {
  type: "object",
  additionalProperties: false,
  required: ["schema_version", "runs_dir", "image", "source", "builder", "runtime", "engine"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    platform: { type: "string", pattern: PLATFORM },
    image: {
      type: "object",
      additionalProperties: false,
      required: ["tag"],
      properties: { tag: { type: "string", minLength: 1, pattern: "^[^\\s]+$" } },
    },
    source: {
      type: "object",
      additionalProperties: false,
      required: ["repository", "subdirectory", "filter", "pin"],
      properties: {
        repository: { type: "string", format: "uri" },
        subdirectory: { type: "string", pattern: CONTAINED_PATH },
        ref: { type: "string", minLength: 1 },
        filter: { type: "string", minLength: 1 },
        pin: { type: "boolean" },
      },
    },
    builder: {
      type: "object",
      additionalProperties: false,
      required: ["name", "base_image", "package_manager", "packages", "workdir", "build_command", "artifact"],
      properties: {
        name: { type: "string", pattern: "^[a-z][a-z0-9_.-]*$" },
        base_image: { type: "string", minLength: 1 },
        package_manager: packageManager,
        packages: stringList,
        workdir: { type: "string", pattern: ABSOLUTE_PATH },
        build_command: { ...stringList, minItems: 1 },
        artifact: { type: "string", pattern: CONTAINED_PATH },
      },
    },
    runtime: {
      type: "object",
      additionalProperties: false,
      required: ["base_image", "package_manager", "trust_roots", "extra_packages", "install_path", "port", "protocol"],
      properties: {
        base_image: { type: "string", minLength: 1 },
        package_manager: packageManager,
        trust_roots: { type: "boolean" },
        extra_packages: stringList,
        install_path: { type: "string", pattern: ABSOLUTE_PATH },
        port: { type: "integer", minimum: 1, maximum: 65535 },
        protocol: { type: "string", enum: ["tcp", "udp"] },
      },
    },
    engine: {
      type: "object",
      additionalProperties: false,
      required: ["command", "timeout_seconds"],
      properties: {
        command: { type: "string", minLength: 1 },
        timeout_seconds: { type: "integer", minimum: 0 },
      },
    },
  },
} as const;

/** Values filled in underneath whatever the config layers provide. */
export const RECIPE_DEFAULTS: ConfigTree = {
  schema_version: "1.0.0",
  runs_dir: ".imagesmith/runs",
  source: { filter: "blob:none", pin: false },
  builder: { name: "builder", package_manager: "apk", packages: [], workdir: "/usr/src" },
  runtime: { package_manager: "apk", trust_roots: true, extra_packages: [], install_path: "/usr/local/bin/app", protocol: "tcp" },
  engine: { command: "docker", timeout_seconds: 0 },
};

export type ConfigValidationResult =
  | { valid: true; config: RecipeConfig; errors: null }
  | { valid: false; config: null; errors: string };

type ValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

type RecipeAjv = {
  compile: (schema: unknown) => ValidateFn;
  errorsText: (errors: unknown, opts?: { separator?: string; dataVar?: string }) => string;
};

// Both packages are CommonJS with a default export; under NodeNext the
// default import is the module object, so the constructors are re-typed.
function createAjv(): RecipeAjv {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): RecipeAjv };
  const withFormats = addFormats as unknown as (ajv: RecipeAjv, formats: string[]) => void;
  const instance = new AjvCtor({ allErrors: true, strict: true });
  withFormats(instance, ["uri"]);
  return instance;
}

let ajv: RecipeAjv | null = null;
let compiled: ValidateFn | null = null;

function recipeValidator(): { ajv: RecipeAjv; validate: ValidateFn } {
  if (!ajv) ajv = createAjv();
  if (!compiled) compiled = ajv.compile(RECIPE_SCHEMA);
  return { ajv, validate: compiled };
}

function isRecipeConfig(value: unknown): value is RecipeConfig {
  return recipeValidator().validate(value);
}

/** Apply defaults, then validate a loaded config against the recipe schema. */
export function validateConfig(tree: ConfigTree): ConfigValidationResult {
  const candidate = deepMerge(structuredClone(RECIPE_DEFAULTS), tree);
  if (isRecipeConfig(candidate)) {
    return { valid: true, config: candidate, errors: null };
  }
  const { ajv: instance, validate } = recipeValidator();
  const errors = instance.errorsText(validate.errors, { dataVar: "config" });
  return { valid: false, config: null, errors };
}
