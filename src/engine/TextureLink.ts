import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

export type TextureContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & { readonly texture: WebGLTexture };

export type TextureCreateCallback<Gl extends GraphicsContext, UserCtx> = (
  ctx: LinkContext<Gl, UserCtx>
) => WebGLTexture | null;

export class TextureLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends UpdatableLink<
  "texture",
  TextureContext<Gl, UserCtx>
> {
  readonly kind = "texture";

  constructor(
    id: Id,
    readonly create: TextureCreateCallback<Gl, UserCtx>,
    options: UpdateOptions<TextureContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
  }

  protected ownDependencies(): ResourceRef[] {
    return [];
  }
}
