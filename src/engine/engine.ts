/** Subset of `docker image inspect` output that verification reads. */
export type ImageInspect = {
  Id: string;
  Os: string;
  Architecture: string;
  Variant?: string;
  Config: {
    ExposedPorts?: Record<string, unknown> | null;
    Entrypoint?: string[] | null;
    Cmd?: string[] | null;
  };
};

export type BuildRequest = {
  dockerfile: string;
  context: string;
  platform: string;
  /** Stop after this stage; the image is not tagged. */
  target?: string;
  tag?: string;
};

export type BuildOutcome = {
  ok: boolean;
  exitCode: number;
  /** Engine stdout followed by its stderr (BuildKit's plain progress goes to stderr). */
  output: string;
};

/**
 * Container engine: the narrow surface the orchestrator needs. The real
 * implementation shells out to a docker-compatible CLI with BuildKit.
 */
export interface ContainerEngine {
  build(req: BuildRequest): Promise<BuildOutcome>;
  /** null when no image carries the tag. */
  inspect(tag: string): Promise<ImageInspect | null>;
  /** Point `target` at the image `source` names. */
  tag(source: string, target: string): Promise<void>;
  /** Remove a tag; the image goes with it when no other tag holds it. */
  untag(tag: string): Promise<void>;
}
