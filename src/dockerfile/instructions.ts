/** Dockerfile instruction model. One variant per instruction the pipeline emits. */
export type FromInstruction = {
  kind: "from";
  image: string;
  /** Platform expression, e.g. "$TARGETPLATFORM". */
  platform?: string;
  alias?: string;
};

export type ArgInstruction = { kind: "arg"; name: string; defaultValue?: string };

/** Shell commands chained with `&&` into a single layer. */
export type RunInstruction = { kind: "run"; commands: string[] };

export type WorkdirInstruction = { kind: "workdir"; path: string };

export type CopyInstruction = {
  kind: "copy";
  /** Stage alias to copy from; omitted for the build context. */
  from?: string;
  source: string;
  destination: string;
};

export type ExposeInstruction = { kind: "expose"; port: number; protocol: "tcp" | "udp" };

export type EntrypointInstruction = { kind: "entrypoint"; argv: string[] };

export type Instruction =
  | FromInstruction
  | ArgInstruction
  | RunInstruction
  | WorkdirInstruction
  | CopyInstruction
  | ExposeInstruction
  | EntrypointInstruction;
