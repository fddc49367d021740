import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

export type BufferContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & { readonly buffer: WebGLBuffer };

export type BufferCreateCallback<Gl extends GraphicsContext, UserCtx> = (
  ctx: LinkContext<Gl, UserCtx>
) => WebGLBuffer | null;

export class BufferLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends UpdatableLink<
  "buffer",
  BufferContext<Gl, UserCtx>
> {
  readonly kind = "buffer";

  constructor(
    id: Id,
    readonly create: BufferCreateCallback<Gl, UserCtx>,
    options: UpdateOptions<BufferContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
  }

  protected ownDependencies(): ResourceRef[] {
    return [];
  }
}
