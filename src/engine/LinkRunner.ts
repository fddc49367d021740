// LinkRunner: runs links against the live context. create() realizes a link
// once at build time; update() re-applies its per-frame callback. Both share
// the binding rules (VAO + buffer for attributes, useProgram for uniforms).

import type { Id } from "./Id";
import type { AnyLink } from "./AnyLink";
import type { LinkContext, ResourceLookup } from "./Link";
import type { AttributeLink } from "./AttributeLink";
import type { UniformLink } from "./UniformLink";
import type { ContextTarget, GraphicsContext } from "./GraphicsContext";
import type { OwnedKind, ResourceRegistry } from "./ResourceRegistry";
import { compileShader, linkProgram } from "./ShaderProgram";
import { HandleCreationError, LocationNotFoundError } from "./errors";

/** A link in build order, with the lookup restricted to its dependencies. */
export interface LinkStep<Gl extends GraphicsContext, UserCtx> {
  readonly link: AnyLink<Gl, UserCtx>;
  readonly deps: ResourceLookup;
}

function required<T>(kind: OwnedKind, id: Id, handle: T | null): T {
  if (handle === null) throw new HandleCreationError(kind, id);
  return handle;
}

export class LinkRunner<Gl extends GraphicsContext, UserCtx> {
  constructor(
    private readonly gl: Gl,
    private readonly canvas: ContextTarget<Gl>,
    private readonly registry: ResourceRegistry,
    private readonly userCtx: UserCtx | undefined
  ) {}

  create(step: LinkStep<Gl, UserCtx>, now: number): void {
    const { gl, registry } = this;
    const { link } = step;
    const ctx = this.context(step, now);

    switch (link.kind) {
      case "vertexShader":
      case "fragmentShader":
        registry.adopt(link.kind, link.id, compileShader(gl, link.id, link.type, link.source));
        return;
      case "program": {
        const vertex = registry.vertexShader(link.vertexShaderId);
        const fragment = registry.fragmentShader(link.fragmentShaderId);
        registry.adopt("program", link.id, linkProgram(gl, link.id, vertex, fragment, link));
        return;
      }
      case "vao":
        registry.adopt("vao", link.id, required("vao", link.id, link.create(ctx)));
        return;
      case "buffer":
        registry.adopt("buffer", link.id, required("buffer", link.id, link.create(ctx)));
        return;
      case "texture":
        registry.adopt("texture", link.id, required("texture", link.id, link.create(ctx)));
        return;
      case "framebuffer":
        registry.adopt("framebuffer", link.id, required("framebuffer", link.id, link.create(ctx)));
        return;
      case "transformFeedback":
        registry.adopt("transformFeedback", link.id, required("transformFeedback", link.id, link.create(ctx)));
        return;
      case "attribute":
        this.createAttribute(link, ctx);
        return;
      case "uniform":
        this.createUniform(link, ctx);
        return;
    }
  }

  /** Runs the link's update callback, if it has one. Shaders, programs and VAOs never do. */
  update(step: LinkStep<Gl, UserCtx>, now: number): void {
    const { registry } = this;
    const { link } = step;

    switch (link.kind) {
      case "vertexShader":
      case "fragmentShader":
      case "program":
      case "vao":
        return;
      case "buffer":
        if (link.hasUpdate()) link.runUpdate({ ...this.context(step, now), buffer: registry.buffer(link.id) });
        return;
      case "texture":
        if (link.hasUpdate()) link.runUpdate({ ...this.context(step, now), texture: registry.texture(link.id) });
        return;
      case "framebuffer":
        if (link.hasUpdate()) {
          link.runUpdate({ ...this.context(step, now), framebuffer: registry.framebuffer(link.id) });
        }
        return;
      case "transformFeedback":
        if (link.hasUpdate()) {
          link.runUpdate({ ...this.context(step, now), transformFeedback: registry.transformFeedback(link.id) });
        }
        return;
      case "attribute":
        if (link.hasUpdate()) this.updateAttribute(link, this.context(step, now));
        return;
      case "uniform":
        if (link.hasUpdate()) this.updateUniform(link, this.context(step, now));
        return;
    }
  }

  private context(step: LinkStep<Gl, UserCtx>, now: number): LinkContext<Gl, UserCtx> {
    return { gl: this.gl, canvas: this.canvas, now, userCtx: this.userCtx, deps: step.deps };
  }

  private createAttribute(link: AttributeLink<Gl, UserCtx>, ctx: LinkContext<Gl, UserCtx>): void {
    const location = link.location ?? this.queryAttributeLocation(link);
    const buffer = this.registry.buffer(link.bufferId);

    for (const vaoId of link.vaoIds) {
      const vao = this.registry.vao(vaoId);
      this.withAttributeBound(vao, buffer, location, () => {
        link.create({ ...ctx, location, buffer, vao, vaoId });
      });
    }

    this.registry.attributes.set(link.id, { location, bufferId: link.bufferId, vaoIds: link.vaoIds });
  }

  private updateAttribute(link: AttributeLink<Gl, UserCtx>, ctx: LinkContext<Gl, UserCtx>): void {
    const { location } = this.registry.attributes.get(link.id);
    const buffer = this.registry.buffer(link.bufferId);

    for (const vaoId of link.vaoIds) {
      const vao = this.registry.vao(vaoId);
      this.withAttributeBound(vao, buffer, location, () => {
        link.runUpdate({ ...ctx, location, buffer, vao, vaoId });
      });
    }
  }

  // First program that reports the attribute wins; GLSL drops unused inputs,
  // so -1 from every program means the name is wrong or the input is dead.
  private queryAttributeLocation(link: AttributeLink<Gl, UserCtx>): number {
    const programIds = link.programIds ?? this.registry.ids("program");
    for (const programId of programIds) {
      const location = this.gl.getAttribLocation(this.registry.program(programId), link.id);
      if (location !== -1) return location;
    }
    throw new LocationNotFoundError("attribute", link.id, programIds);
  }

  private withAttributeBound(
    vao: WebGLVertexArrayObject,
    buffer: WebGLBuffer,
    location: number,
    run: () => void
  ): void {
    const { gl } = this;
    gl.bindVertexArray(vao);
    gl.bindBuffer(gl.ARRAY_BUFFER, buffer);
    gl.enableVertexAttribArray(location);
    try {
      run();
    } finally {
      gl.bindVertexArray(null);
      gl.bindBuffer(gl.ARRAY_BUFFER, null);
    }
  }

  private createUniform(link: UniformLink<Gl, UserCtx>, ctx: LinkContext<Gl, UserCtx>): void {
    const { gl } = this;
    const locations = new Map<Id, WebGLUniformLocation>();

    for (const programId of link.programIds) {
      const program = this.registry.program(programId);
      const location = gl.getUniformLocation(program, link.id);
      if (location === null) throw new LocationNotFoundError("uniform", link.id, [programId]);

      this.withProgram(program, () => {
        link.create({ ...ctx, location, program, programId });
      });
      locations.set(programId, location);
    }

    this.registry.uniforms.set(link.id, { locations });
  }

  private updateUniform(link: UniformLink<Gl, UserCtx>, ctx: LinkContext<Gl, UserCtx>): void {
    const { locations } = this.registry.uniforms.get(link.id);

    for (const [programId, location] of locations) {
      const program = this.registry.program(programId);
      this.withProgram(program, () => {
        link.runUpdate({ ...ctx, location, program, programId });
      });
    }
  }

  private withProgram(program: WebGLProgram, run: () => void): void {
    const { gl } = this;
    gl.useProgram(program);
    try {
      run();
    } finally {
      gl.useProgram(null);
    }
  }
}
