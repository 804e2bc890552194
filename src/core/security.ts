import { redactRepositoryUrl } from "../source/repository.js";

/**
 * Sanitize path component to prevent path traversal attacks.
 * @throws Error if path component is invalid
 */
export function sanitizePathComponent(component: string): string {
  if (!component || component.trim().length === 0) {
    throw new Error("Path component cannot be empty");
  }

  if (
    component.includes("..") ||
    component.includes("/") ||
    component.includes("\\") ||
    component.includes("\0")
  ) {
    throw new Error(`Invalid path component: ${component}`);
  }

  return component.trim();
}

/**
 * Sanitize log message to prevent log injection.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/[\r\n]/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Redact sensitive information from messages before they are logged.
 */
export function redactSensitiveInfo(s: string): string {
  if (!s) return "";

  let result = redactRepositoryUrl(s);
  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/secret[=:]\s*\S+/gi, "secret=***");

  return result;
}

const PASSTHROUGH_PREFIXES = ["DOCKER_", "BUILDX_", "BUILDKIT_"];

/**
 * Environment for the container engine: the basics plus DOCKER_/BUILDX_/BUILDKIT_ variables.
 */
export function sanitizeEnv(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const safe: NodeJS.ProcessEnv = {
    PATH: env.PATH,
    HOME: env.HOME,
    USER: env.USER,
    LANG: env.LANG,
    LC_ALL: env.LC_ALL,
    TERM: env.TERM,
    XDG_RUNTIME_DIR: env.XDG_RUNTIME_DIR,
  };

  for (const [key, value] of Object.entries(env)) {
    if (PASSTHROUGH_PREFIXES.some((p) => key.startsWith(p))) safe[key] = value;
  }

  Object.keys(safe).forEach((key) => {
    if (safe[key] === undefined) {
      delete safe[key];
    }
  });

  return safe;
}
