import { ref } from "./Id";
import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

export type FramebufferContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & { readonly framebuffer: WebGLFramebuffer };

export type FramebufferCreateCallback<Gl extends GraphicsContext, UserCtx> = (
  ctx: LinkContext<Gl, UserCtx>
) => WebGLFramebuffer | null;

export interface FramebufferLinkOptions<Ctx> extends UpdateOptions<Ctx> {
  /** Textures attached by the create callback; read them via ctx.deps.texture(id). */
  textureIds?: readonly Id[];
}

export class FramebufferLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends UpdatableLink<
  "framebuffer",
  FramebufferContext<Gl, UserCtx>
> {
  readonly kind = "framebuffer";
  readonly textureIds: readonly Id[];

  constructor(
    id: Id,
    readonly create: FramebufferCreateCallback<Gl, UserCtx>,
    options: FramebufferLinkOptions<FramebufferContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
    this.textureIds = options.textureIds ?? [];
  }

  protected ownDependencies(): ResourceRef[] {
    return this.textureIds.map(ref.texture);
  }
}
