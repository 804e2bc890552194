import os from "node:os";

/** Target platform: the OS/architecture pair an image and its binary are built for. */
export type TargetPlatform = {
  os: string;
  architecture: string;
  variant?: string;
};

/** Platforms published by the default alpine and rust:alpine base images. */
export const SUPPORTED_PLATFORMS = [
  "linux/386",
  "linux/amd64",
  "linux/arm/v6",
  "linux/arm/v7",
  "linux/arm64",
  "linux/ppc64le",
  "linux/riscv64",
  "linux/s390x",
] as const;

const NODE_ARCH: Record<string, string> = {
  x64: "amd64",
  arm64: "arm64",
  arm: "arm/v7",
  ia32: "386",
  ppc64: "ppc64le",
  s390x: "s390x",
  riscv64: "riscv64",
};

function normalize(p: TargetPlatform): TargetPlatform {
  if (p.architecture === "arm64" && p.variant === "v8") return { os: p.os, architecture: p.architecture };
  if (p.architecture === "arm" && !p.variant) return { ...p, variant: "v7" };
  return p;
}

/**
 * Parse `os/arch[/variant]`.
 * @throws Error on malformed input
 */
export function parsePlatform(text: string): TargetPlatform {
  const parts = text.trim().toLowerCase().split("/");
  if (parts.length < 2 || parts.length > 3 || parts.some((p) => !/^[a-z0-9_]+$/.test(p))) {
    throw new Error(`Invalid target platform: '${text}' (expected os/arch[/variant])`);
  }
  const [osName, architecture, variant] = parts;
  return normalize(variant ? { os: osName, architecture, variant } : { os: osName, architecture });
}

export function formatPlatform(p: TargetPlatform): string {
  return p.variant ? `${p.os}/${p.architecture}/${p.variant}` : `${p.os}/${p.architecture}`;
}

export function platformsMatch(a: TargetPlatform, b: TargetPlatform): boolean {
  return formatPlatform(normalize(a)) === formatPlatform(normalize(b));
}

export function isSupported(p: TargetPlatform): boolean {
  const text = formatPlatform(normalize(p));
  return SUPPORTED_PLATFORMS.some((s) => s === text);
}

/** Platform of the machine running imagesmith. Images are always linux. */
export function hostPlatform(arch: string = os.arch()): TargetPlatform {
  const mapped = NODE_ARCH[arch];
  if (!mapped) {
    throw new Error(`Unsupported host architecture: ${arch}`);
  }
  return parsePlatform(`linux/${mapped}`);
}

/**
 * Pick the target platform: CLI flag, then config, then the TARGETPLATFORM
 * variable a surrounding build system sets, then the host.
 */
export function resolvePlatform(opts: {
  cli?: string;
  config?: string;
  env?: NodeJS.ProcessEnv;
}): TargetPlatform {
  const env = opts.env ?? process.env;
  const explicit = opts.cli ?? opts.config ?? env.TARGETPLATFORM;
  return explicit ? parsePlatform(explicit) : hostPlatform();
}
