import type { Id, ResourceRef } from "./Id";
import { Link } from "./Link";

export type ShaderType = "vertex" | "fragment";

/** GLSL source registered under an id; compiled by the core at build time. */
export class ShaderLink extends Link<"vertexShader" | "fragmentShader"> {
  readonly kind: "vertexShader" | "fragmentShader";

  constructor(
    id: Id,
    readonly type: ShaderType,
    readonly source: string
  ) {
    super(id);
    this.kind = type === "vertex" ? "vertexShader" : "fragmentShader";
  }

  protected ownDependencies(): ResourceRef[] {
    return [];
  }
}
