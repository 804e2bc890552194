import type { ImageInspect } from "../engine/engine.js";
import type { BuildPlan } from "../pipeline/plan.js";
import { formatPlatform, platformsMatch } from "../platform/platform.js";
import { diag, type Diagnostic } from "../types/diagnostic.js";

function sameArgv(a: string[] | null | undefined, b: string[]): boolean {
  return Array.isArray(a) && a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Check a built image against its plan: platform, exposed port, and an
 * entrypoint that is the installed binary with no baked-in arguments.
 * Returns error diagnostics only; an empty list means the image conforms.
 */
export function verifyImage(plan: BuildPlan, image: ImageInspect | null, inspectedTag: string = plan.tag): Diagnostic[] {
  if (!image) {
    return [diag("error", "IMAGE_MISSING", `No image tagged ${inspectedTag}`)];
  }

  const out: Diagnostic[] = [];

  const actual = { os: image.Os, architecture: image.Architecture, variant: image.Variant || undefined };
  if (!platformsMatch(actual, plan.platform)) {
    out.push(
      diag("error", "IMAGE_PLATFORM", `Image is ${formatPlatform(actual)}, expected ${formatPlatform(plan.platform)}`, {
        details: { expected: formatPlatform(plan.platform), actual: formatPlatform(actual) },
      }),
    );
  }

  const portKey = `${plan.port.number}/${plan.port.protocol}`;
  const exposed = Object.keys(image.Config.ExposedPorts ?? {});
  if (!exposed.includes(portKey)) {
    out.push(diag("error", "IMAGE_PORT", `Port ${portKey} is not exposed`, { details: { exposed } }));
  }

  if (!sameArgv(image.Config.Entrypoint, plan.entrypoint)) {
    out.push(
      diag("error", "IMAGE_ENTRYPOINT", `Entrypoint is ${JSON.stringify(image.Config.Entrypoint ?? null)}, expected ${JSON.stringify(plan.entrypoint)}`),
    );
  }

  if (image.Config.Cmd && image.Config.Cmd.length > 0) {
    out.push(diag("error", "IMAGE_CMD", `Image bakes in default arguments: ${JSON.stringify(image.Config.Cmd)}`));
  }

  return out;
}
