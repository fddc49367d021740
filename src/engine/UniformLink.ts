import { ref } from "./Id";
import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

/** Passed once per program, with that program already in use. */
export type UniformContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & {
    readonly location: WebGLUniformLocation;
    readonly program: WebGLProgram;
    readonly programId: Id;
  };

export type UniformCallback<Gl extends GraphicsContext, UserCtx> = (ctx: UniformContext<Gl, UserCtx>) => void;

export interface UniformLinkOptions<Ctx> extends UpdateOptions<Ctx> {
  /** Re-run the create callback as the per-frame update. */
  useCreateCallbackForUpdate?: boolean;
}

/** A uniform named by its GLSL identifier, set in each of the listed programs. */
export class UniformLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends UpdatableLink<
  "uniform",
  UniformContext<Gl, UserCtx>
> {
  readonly kind = "uniform";
  readonly useCreateCallbackForUpdate: boolean;

  constructor(
    readonly programIds: readonly Id[],
    id: Id,
    readonly create: UniformCallback<Gl, UserCtx>,
    options: UniformLinkOptions<UniformContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
    this.useCreateCallbackForUpdate = options.useCreateCallbackForUpdate ?? false;
  }

  protected updater(): UniformCallback<Gl, UserCtx> | undefined {
    return this.updateCallback ?? (this.useCreateCallbackForUpdate ? this.create : undefined);
  }

  protected ownDependencies(): ResourceRef[] {
    return this.programIds.map(ref.program);
  }
}
