import type { Instruction } from "./instructions.js";

const RUN_CONTINUATION = " \\\n    && ";

export function renderInstruction(instruction: Instruction): string {
  switch (instruction.kind) {
    case "from": {
      const platform = instruction.platform ? `--platform=${instruction.platform} ` : "";
      const alias = instruction.alias ? ` AS ${instruction.alias}` : "";
      return `FROM ${platform}${instruction.image}${alias}`;
    }
    case "arg":
      return instruction.defaultValue === undefined
        ? `ARG ${instruction.name}`
        : `ARG ${instruction.name}=${instruction.defaultValue}`;
    case "run":
      if (instruction.commands.length === 0) {
        throw new Error("RUN instruction needs at least one command");
      }
      return `RUN ${instruction.commands.join(RUN_CONTINUATION)}`;
    case "workdir":
      return `WORKDIR ${instruction.path}`;
    case "copy": {
      const from = instruction.from ? `--from=${instruction.from} ` : "";
      const paths = [instruction.source, instruction.destination];
      // A path that would split into several words goes in JSON form.
      if (paths.some((p) => /[\s"'\\$]/.test(p))) return `COPY ${from}${JSON.stringify(paths)}`;
      return `COPY ${from}${paths.join(" ")}`;
    }
    case "expose":
      return instruction.protocol === "tcp"
        ? `EXPOSE ${instruction.port}`
        : `EXPOSE ${instruction.port}/${instruction.protocol}`;
    case "entrypoint":
      // Exec form: no shell wraps the binary.
      return `ENTRYPOINT ${JSON.stringify(instruction.argv)}`;
  }
}

/**
 * Render stages into Dockerfile text. Instructions are separated by a blank
 * line, stages by two.
 */
export function renderDockerfile(stages: Instruction[][]): string {
  return (
    stages
      .map((instructions) => instructions.map(renderInstruction).join("\n\n"))
      .join("\n\n\n") + "\n"
  );
}
