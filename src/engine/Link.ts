// Link: the declarative half of every resource: an id, the resources it
// needs to exist first, and the caller's callbacks. The core decides when the
// callbacks run; the callbacks decide what the GPU calls are.

import type { Id, ResourceKind, ResourceRef } from "./Id";
import type { ContextTarget, GraphicsContext } from "./GraphicsContext";

/** O(1) handle lookups by id, one method per namespace. */
export interface ResourceLookup {
  vertexShader(id: Id): WebGLShader;
  fragmentShader(id: Id): WebGLShader;
  program(id: Id): WebGLProgram;
  vao(id: Id): WebGLVertexArrayObject;
  buffer(id: Id): WebGLBuffer;
  texture(id: Id): WebGLTexture;
  framebuffer(id: Id): WebGLFramebuffer;
  transformFeedback(id: Id): WebGLTransformFeedback;
  attributeLocation(id: Id): number;
  uniformLocation(id: Id, programId: Id): WebGLUniformLocation;
}

/** What every create/update callback receives. */
export interface LinkContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> {
  readonly gl: Gl;
  readonly canvas: ContextTarget<Gl>;
  readonly now: number;
  readonly userCtx: UserCtx | undefined;
  /** Handles of this link's declared dependencies; anything else is unknown. */
  readonly deps: ResourceLookup;
}

export interface UpdateOptions<Ctx> {
  /** Re-applies dynamic state on every updateAndRender(). */
  update?: (ctx: Ctx) => void;
  /** Gates each update; the update is skipped when this returns false. */
  shouldUpdate?: (ctx: Ctx) => boolean;
  /** Extra ordering edges on top of the references the link already makes. */
  dependencies?: readonly ResourceRef[];
}

export abstract class Link<K extends ResourceKind> {
  abstract readonly kind: K;

  constructor(
    readonly id: Id,
    private readonly extraDependencies: readonly ResourceRef[] = []
  ) {}

  /** References implied by the link's own fields (shader ids, buffer id, ...). */
  protected abstract ownDependencies(): ResourceRef[];

  dependencies(): ResourceRef[] {
    return [...this.ownDependencies(), ...this.extraDependencies];
  }
}

export abstract class UpdatableLink<K extends ResourceKind, UpdateCtx> extends Link<K> {
  protected readonly updateCallback: ((ctx: UpdateCtx) => void) | undefined;
  private readonly shouldUpdate: ((ctx: UpdateCtx) => boolean) | undefined;

  constructor(id: Id, options: UpdateOptions<UpdateCtx> = {}) {
    super(id, options.dependencies);
    this.updateCallback = options.update;
    this.shouldUpdate = options.shouldUpdate;
  }

  protected updater(): ((ctx: UpdateCtx) => void) | undefined {
    return this.updateCallback;
  }

  hasUpdate(): boolean {
    return this.updater() !== undefined;
  }

  /** Returns true when the update callback actually ran. */
  runUpdate(ctx: UpdateCtx): boolean {
    const update = this.updater();
    if (!update) return false;
    if (this.shouldUpdate && !this.shouldUpdate(ctx)) return false;
    update(ctx);
    return true;
  }
}
