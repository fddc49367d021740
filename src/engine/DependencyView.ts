import { refKey } from "./Id";
import type { Id, ResourceKind, ResourceRef } from "./Id";
import type { ResourceLookup } from "./Link";
import { UnknownIdError } from "./errors";

/**
 * The lookup handed to a link's callbacks: the full registry, restricted to
 * the refs the link declared. Reaching for anything else is an UnknownIdError,
 * so an undeclared dependency fails loudly instead of depending on build order.
 */
export class DependencyView implements ResourceLookup {
  private readonly allowed: ReadonlySet<string>;

  constructor(
    private readonly registry: ResourceLookup,
    declared: readonly ResourceRef[],
    private readonly owner: string
  ) {
    this.allowed = new Set(declared.map(refKey));
  }

  private check(kind: ResourceKind, id: Id): void {
    if (!this.allowed.has(refKey({ kind, id }))) throw new UnknownIdError(kind, id, this.owner);
  }

  vertexShader(id: Id): WebGLShader {
    this.check("vertexShader", id);
    return this.registry.vertexShader(id);
  }

  fragmentShader(id: Id): WebGLShader {
    this.check("fragmentShader", id);
    return this.registry.fragmentShader(id);
  }

  program(id: Id): WebGLProgram {
    this.check("program", id);
    return this.registry.program(id);
  }

  vao(id: Id): WebGLVertexArrayObject {
    this.check("vao", id);
    return this.registry.vao(id);
  }

  buffer(id: Id): WebGLBuffer {
    this.check("buffer", id);
    return this.registry.buffer(id);
  }

  texture(id: Id): WebGLTexture {
    this.check("texture", id);
    return this.registry.texture(id);
  }

  framebuffer(id: Id): WebGLFramebuffer {
    this.check("framebuffer", id);
    return this.registry.framebuffer(id);
  }

  transformFeedback(id: Id): WebGLTransformFeedback {
    this.check("transformFeedback", id);
    return this.registry.transformFeedback(id);
  }

  attributeLocation(id: Id): number {
    this.check("attribute", id);
    return this.registry.attributeLocation(id);
  }

  uniformLocation(id: Id, programId: Id): WebGLUniformLocation {
    this.check("uniform", id);
    return this.registry.uniformLocation(id, programId);
  }
}
