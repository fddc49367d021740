import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

export type TransformFeedbackContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & { readonly transformFeedback: WebGLTransformFeedback };

export type TransformFeedbackCreateCallback<Gl extends GraphicsContext, UserCtx> = (
  ctx: LinkContext<Gl, UserCtx>
) => WebGLTransformFeedback | null;

export class TransformFeedbackLink<
  Gl extends GraphicsContext = WebGL2RenderingContext,
  UserCtx = unknown,
> extends UpdatableLink<"transformFeedback", TransformFeedbackContext<Gl, UserCtx>> {
  readonly kind = "transformFeedback";

  constructor(
    id: Id,
    readonly create: TransformFeedbackCreateCallback<Gl, UserCtx> = (ctx) => ctx.gl.createTransformFeedback(),
    options: UpdateOptions<TransformFeedbackContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
  }

  protected ownDependencies(): ResourceRef[] {
    return [];
  }
}
