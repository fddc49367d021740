import { ref } from "./Id";
import type { Id, ResourceRef } from "./Id";
import { Link } from "./Link";

export interface ProgramLinkOptions {
  /** Outputs captured by transform feedback, declared before linking. */
  transformFeedbackVaryings?: readonly string[];
  transformFeedbackBufferMode?: "interleaved" | "separate";
  dependencies?: readonly ResourceRef[];
}

/** Pairs a vertex shader id with a fragment shader id; linked by the core. */
export class ProgramLink extends Link<"program"> {
  readonly kind = "program";
  readonly transformFeedbackVaryings: readonly string[];
  readonly transformFeedbackBufferMode: "interleaved" | "separate";

  constructor(
    id: Id,
    readonly vertexShaderId: Id,
    readonly fragmentShaderId: Id,
    options: ProgramLinkOptions = {}
  ) {
    super(id, options.dependencies);
    this.transformFeedbackVaryings = options.transformFeedbackVaryings ?? [];
    this.transformFeedbackBufferMode = options.transformFeedbackBufferMode ?? "interleaved";
  }

  protected ownDependencies(): ResourceRef[] {
    return [ref.vertexShader(this.vertexShaderId), ref.fragmentShader(this.fragmentShaderId)];
  }
}
