export { ref, refKey } from "./Id";
export type { Id, ResourceKind, ResourceRef } from "./Id";
export { animationFrameScheduler, performanceClock } from "./GraphicsContext";
export type { Clock, ContextTarget, FrameScheduler, GraphicsContext } from "./GraphicsContext";
export type { LinkContext, ResourceLookup, UpdateOptions } from "./Link";
export { ShaderLink } from "./ShaderLink";
export type { ShaderType } from "./ShaderLink";
export { ProgramLink } from "./ProgramLink";
export type { ProgramLinkOptions } from "./ProgramLink";
export { VAOLink } from "./VAOLink";
export { BufferLink } from "./BufferLink";
export type { BufferContext } from "./BufferLink";
export { AttributeLink } from "./AttributeLink";
export type { AttributeContext, AttributeLinkOptions } from "./AttributeLink";
export { UniformLink } from "./UniformLink";
export type { UniformContext, UniformLinkOptions } from "./UniformLink";
export { TextureLink } from "./TextureLink";
export type { TextureContext } from "./TextureLink";
export { FramebufferLink } from "./FramebufferLink";
export type { FramebufferContext, FramebufferLinkOptions } from "./FramebufferLink";
export { TransformFeedbackLink } from "./TransformFeedbackLink";
export type { TransformFeedbackContext } from "./TransformFeedbackLink";
export type { AnyLink } from "./AnyLink";
export { RendererBuilder } from "./RendererBuilder";
export { RendererData } from "./RendererData";
export type { RenderCallback, UpdateCallback } from "./RendererData";
export { Renderer } from "./Renderer";
export { AnimationDriver } from "./AnimationDriver";
export type { AnimationState } from "./AnimationDriver";
export { CanvasRecorder, downloadRecording, mediaRecorderCapture, recordingOptions } from "./CanvasRecorder";
export type { CaptureFactory, MediaCapture, RecordingOptions, RecordingSink } from "./CanvasRecorder";
export { createLogger, setLogLevel, Logger, LogLevel } from "./logger";
export {
  RendererError,
  DuplicateIdError,
  UnknownIdError,
  CyclicDependencyError,
  MissingRenderCallbackError,
  ContextAcquisitionError,
  ShaderCompileError,
  ProgramLinkError,
  HandleCreationError,
  LocationNotFoundError,
  UseAfterFreeError,
  RecordingError,
} from "./errors";
