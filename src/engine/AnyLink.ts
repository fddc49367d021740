import type { ResourceRef } from "./Id";
import type { GraphicsContext } from "./GraphicsContext";
import type { ShaderLink } from "./ShaderLink";
import type { ProgramLink } from "./ProgramLink";
import type { VAOLink } from "./VAOLink";
import type { BufferLink } from "./BufferLink";
import type { AttributeLink } from "./AttributeLink";
import type { UniformLink } from "./UniformLink";
import type { TextureLink } from "./TextureLink";
import type { FramebufferLink } from "./FramebufferLink";
import type { TransformFeedbackLink } from "./TransformFeedbackLink";

/** The closed set of link kinds, discriminated by `kind`. */
export type AnyLink<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> =
  | ShaderLink
  | ProgramLink
  | VAOLink<Gl, UserCtx>
  | BufferLink<Gl, UserCtx>
  | AttributeLink<Gl, UserCtx>
  | UniformLink<Gl, UserCtx>
  | TextureLink<Gl, UserCtx>
  | FramebufferLink<Gl, UserCtx>
  | TransformFeedbackLink<Gl, UserCtx>;

export function linkRef<Gl extends GraphicsContext, UserCtx>(link: AnyLink<Gl, UserCtx>): ResourceRef {
  return { kind: link.kind, id: link.id };
}
