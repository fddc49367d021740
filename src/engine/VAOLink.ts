import type { Id, ResourceRef } from "./Id";
import { Link } from "./Link";
import type { LinkContext } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

export type VAOCreateCallback<Gl extends GraphicsContext, UserCtx> = (
  ctx: LinkContext<Gl, UserCtx>
) => WebGLVertexArrayObject | null;

/**
 * A vertex array object. Most need nothing beyond allocation, so the create
 * callback is optional and defaults to gl.createVertexArray().
 */
export class VAOLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends Link<"vao"> {
  readonly kind = "vao";

  constructor(
    id: Id,
    readonly create: VAOCreateCallback<Gl, UserCtx> = (ctx) => ctx.gl.createVertexArray(),
    options: { dependencies?: readonly ResourceRef[] } = {}
  ) {
    super(id, options.dependencies);
  }

  protected ownDependencies(): ResourceRef[] {
    return [];
  }
}
