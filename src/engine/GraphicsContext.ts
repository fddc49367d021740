// GraphicsContext: the narrow slice of WebGL2 the core calls itself, plus the
// host capabilities it borrows (canvas, frame scheduler, clock).
//
// Everything else (bufferData, texImage2D, drawArrays, ...) is called by the
// caller's own link and render callbacks, which receive the full context type.

export type GraphicsContext = Pick<
  WebGL2RenderingContext,
  | "VERTEX_SHADER"
  | "FRAGMENT_SHADER"
  | "COMPILE_STATUS"
  | "LINK_STATUS"
  | "ARRAY_BUFFER"
  | "INTERLEAVED_ATTRIBS"
  | "SEPARATE_ATTRIBS"
  | "createShader"
  | "shaderSource"
  | "compileShader"
  | "getShaderParameter"
  | "getShaderInfoLog"
  | "deleteShader"
  | "createProgram"
  | "attachShader"
  | "transformFeedbackVaryings"
  | "linkProgram"
  | "getProgramParameter"
  | "getProgramInfoLog"
  | "deleteProgram"
  | "useProgram"
  | "createVertexArray"
  | "bindVertexArray"
  | "deleteVertexArray"
  | "bindBuffer"
  | "deleteBuffer"
  | "enableVertexAttribArray"
  | "getAttribLocation"
  | "getUniformLocation"
  | "deleteTexture"
  | "deleteFramebuffer"
  | "createTransformFeedback"
  | "deleteTransformFeedback"
>;

/** Anything a WebGL2 context can be acquired from. HTMLCanvasElement fits. */
export interface ContextTarget<Gl extends GraphicsContext = WebGL2RenderingContext> {
  readonly width: number;
  readonly height: number;
  getContext(contextId: "webgl2", options?: WebGLContextAttributes): Gl | null;
}

/** "Run this once on the next display refresh", returning a cancel token. */
export interface FrameScheduler {
  request(callback: (time: number) => void): number;
  cancel(token: number): void;
}

export const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (token) => cancelAnimationFrame(token),
};

/** Monotonic time source handed to link callbacks as `now`. */
export type Clock = () => number;

export const performanceClock: Clock = () => performance.now();
