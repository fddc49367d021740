import { ref } from "./Id";
import type { Id, ResourceRef } from "./Id";
import { UpdatableLink } from "./Link";
import type { LinkContext, UpdateOptions } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";

/**
 * Passed once per VAO. The VAO and the buffer are already bound and the
 * attribute array enabled, so a create callback usually only has to call
 * vertexAttribPointer, which the VAO records.
 */
export type AttributeContext<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  LinkContext<Gl, UserCtx> & {
    readonly location: number;
    readonly buffer: WebGLBuffer;
    readonly vao: WebGLVertexArrayObject;
    readonly vaoId: Id;
  };

export type AttributeCallback<Gl extends GraphicsContext, UserCtx> = (ctx: AttributeContext<Gl, UserCtx>) => void;

export interface AttributeLinkOptions<Ctx> extends UpdateOptions<Ctx> {
  /** Fixed location (e.g. from a layout qualifier); skips the program query. */
  location?: number;
  /** Programs queried for the location. Defaults to every registered program. */
  programIds?: readonly Id[];
  /** Re-run the create callback as the per-frame update. */
  useCreateCallbackForUpdate?: boolean;
}

export class AttributeLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> extends UpdatableLink<
  "attribute",
  AttributeContext<Gl, UserCtx>
> {
  readonly kind = "attribute";
  readonly location: number | undefined;
  readonly programIds: readonly Id[] | undefined;
  readonly useCreateCallbackForUpdate: boolean;

  constructor(
    readonly vaoIds: readonly Id[],
    readonly bufferId: Id,
    id: Id,
    readonly create: AttributeCallback<Gl, UserCtx>,
    options: AttributeLinkOptions<AttributeContext<Gl, UserCtx>> = {}
  ) {
    super(id, options);
    this.location = options.location;
    this.programIds = options.programIds;
    this.useCreateCallbackForUpdate = options.useCreateCallbackForUpdate ?? false;
  }

  /** True when the location must be looked up in a program at build time. */
  needsLocationQuery(): boolean {
    return this.location === undefined;
  }

  protected updater(): AttributeCallback<Gl, UserCtx> | undefined {
    return this.updateCallback ?? (this.useCreateCallbackForUpdate ? this.create : undefined);
  }

  protected ownDependencies(): ResourceRef[] {
    const programs = this.location === undefined ? (this.programIds ?? []).map(ref.program) : [];
    return [...this.vaoIds.map(ref.vao), ref.buffer(this.bufferId), ...programs];
  }
}
